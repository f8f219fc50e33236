import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GenerationError, ImageFetchError } from '@shared/errors';
import type { EmptyImagePolicy, ImageCandidate, PipelineResult } from '@shared/types';
import {
    FakeImageSearch,
    FakeTextGenerator,
    candidate,
    createFakeFetch,
    pngResponse,
    scriptJson,
    type FakeRoute,
    type SearchScript,
} from '../testing/fakes';
import { ImageFetcher } from './imageFetcher';
import type { ImageSearchProvider } from './imageSearch';
import { PipelineOrchestrator } from './pipeline';
import { ScriptGenerator } from './scriptGeneration';

const TOPIC = 'Ocean Conservation';
const TITLES = ['Why Oceans Matter', 'Marine Plastic', 'Overfishing', 'Coral Reefs', 'Taking Action'];
const TEMPLATE_DIR = path.resolve(__dirname, '../../templates');
const noDelay = { initialDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };

const queryFor = (title: string) => `${title} ${TOPIC}`;
const imageFor = (index: number) => candidate(`slide-${index + 1}`);

function searchTable(resultFor: (index: number) => SearchScript): Record<string, SearchScript> {
    return Object.fromEntries(TITLES.map((title, i): [string, SearchScript] => [queryFor(title), resultFor(i)]));
}

type Success = Extract<PipelineResult, { status: 'success' | 'partial_success' }>;
type Failure = Extract<PipelineResult, { status: 'failure' }>;

function expectSuccess(result: PipelineResult): Success {
    if (result.status === 'failure') {
        throw new Error(`Expected a deck, got ${result.error.category}: ${result.error.message}`);
    }
    return result;
}

function expectFailure(result: PipelineResult): Failure {
    if (result.status !== 'failure') {
        throw new Error(`Expected a failure, got ${result.status}`);
    }
    return result;
}

interface SetupOptions {
    responses?: Array<string | Error>;
    search?: Record<string, SearchScript>;
    provider?: ImageSearchProvider;
    extraImages?: ImageCandidate[];
    concurrency?: number;
    emptyImagePolicy?: EmptyImagePolicy;
}

describe('PipelineOrchestrator', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'autodeck-pipeline-'));
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.rm(outputDir, { recursive: true, force: true });
    });

    function setup(options: SetupOptions = {}) {
        const text = new FakeTextGenerator(options.responses ?? [scriptJson(TITLES)]);
        const search = options.search ?? searchTable(i => [imageFor(i)]);
        const provider = options.provider ?? new FakeImageSearch(search);

        const routes: Record<string, FakeRoute> = {};
        [...TITLES.map((_, i) => imageFor(i)), ...(options.extraImages ?? [])].forEach(image => {
            routes[image.downloadUrl] = pngResponse;
        });
        const { fetchFn, requests } = createFakeFetch(routes);

        const pipeline = new PipelineOrchestrator({
            scriptGenerator: new ScriptGenerator(text, noDelay),
            imageFetcher: new ImageFetcher(provider, fetchFn, noDelay),
            templateDir: TEMPLATE_DIR,
            outputDir,
            imageFetchConcurrency: options.concurrency ?? 3,
            emptyImagePolicy: options.emptyImagePolicy ?? 'collapse',
        });
        return { pipeline, text, provider, requests };
    }

    it('builds a deck and reports the one slide without an image', async () => {
        const search = searchTable(i => (i === 1 ? [] : [imageFor(i)]));
        const { pipeline } = setup({ search });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5, tone: 'informative', images_per_slide: 1 }));

        expect(result.status).toBe('partial_success');
        expect(result.warnings).toEqual(['Slide 2: no image found for "Marine Plastic Ocean Conservation"']);
        expect(result.slides.map(slide => slide.title)).toEqual(TITLES);
        expect(result.slides.map(slide => slide.layout.mode)).toEqual(['split', 'full-text', 'split', 'split', 'split']);
        expect(result.fileName).toBe('ocean-conservation.pptx');
        expect(result.artifactPath).toBe(path.join(outputDir, 'ocean-conservation.pptx'));
        expect(result.downloadReference).toBe('/download/ocean-conservation.pptx');
        await expect(fs.stat(result.artifactPath)).resolves.toBeTruthy();
    });

    it('reports success when nothing was degraded', async () => {
        const { pipeline } = setup();

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.status).toBe('success');
        expect(result.warnings).toEqual([]);
    });

    it('keeps slide order whatever order the searches finish in', async () => {
        const search = searchTable(i => async () => {
            // Later slides answer first
            await new Promise(resolve => setTimeout(resolve, (TITLES.length - i) * 10));
            return [imageFor(i)];
        });
        const { pipeline } = setup({ search, concurrency: 5 });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.slides.map(slide => slide.index)).toEqual([0, 1, 2, 3, 4]);
        expect(result.slides.map(slide => slide.images[0]?.sourceUrl)).toEqual(TITLES.map((_, i) => imageFor(i).sourceUrl));
    });

    it('holds image searches to the concurrency limit', async () => {
        let inFlight = 0;
        let peak = 0;
        const search = searchTable(i => async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await new Promise(resolve => setTimeout(resolve, 5));
            inFlight--;
            return [imageFor(i)];
        });
        const { pipeline } = setup({ search, concurrency: 2 });

        expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(peak).toBe(2);
    });

    it('avoids reusing an image across slides while others are available', async () => {
        const shared = candidate('shared');
        const search = searchTable(i => [shared, imageFor(i)]);
        const { pipeline } = setup({ search, extraImages: [shared] });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.slides.map(slide => slide.images[0]?.sourceUrl)).toEqual([
            shared.sourceUrl,
            ...TITLES.slice(1).map((_, i) => imageFor(i + 1).sourceUrl),
        ]);
    });

    it('gives a later slide a fresh image when an earlier download fails', async () => {
        const [broken, first, second] = [candidate('broken'), candidate('first'), candidate('second')];
        const search = searchTable(i => (i === 0 ? [broken, first] : i === 1 ? [first, second] : [imageFor(i)]));
        // No route for the broken image, so its download gets a 404
        const { pipeline } = setup({ search, extraImages: [first, second] });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.slides.slice(0, 2).map(slide => slide.images.map(image => image.sourceUrl))).toEqual([
            [first.sourceUrl],
            [second.sourceUrl],
        ]);
        expect(result.warnings).toEqual([]);
    });

    it('still produces a deck when every image search fails', async () => {
        const provider: ImageSearchProvider = {
            name: 'unsplash',
            search: async () => {
                throw new ImageFetchError('Unsplash API error 401', 'HTTP_ERROR', false, 401);
            },
        };
        const { pipeline } = setup({ provider });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.status).toBe('partial_success');
        expect(result.warnings).toEqual(
            TITLES.map((_, i) => `Slide ${i + 1}: no image found (image search failed: Unsplash API error 401)`)
        );
        expect(result.slides.every(slide => slide.layout.mode === 'full-text')).toBe(true);
        await expect(fs.readdir(outputDir)).resolves.toEqual(['ocean-conservation.pptx']);
    });

    it('uses placeholders for missing images under the placeholder policy', async () => {
        const search = searchTable(i => (i === 1 ? [] : [imageFor(i)]));
        const { pipeline } = setup({ search, emptyImagePolicy: 'placeholder' });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.slides[1].images.map(image => image.kind)).toEqual(['placeholder']);
        expect(result.slides[1].layout.mode).toBe('split');
    });

    it('fails without an artifact when the script cannot be generated', async () => {
        const { pipeline, provider } = setup({ responses: [new GenerationError('Text generation rejected the API key', 'AUTH', false)] });

        const result = expectFailure(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.error).toEqual({ category: 'generation', message: 'Text generation rejected the API key' });
        expect(provider instanceof FakeImageSearch ? provider.calls : []).toEqual([]);
        await expect(fs.readdir(outputDir)).resolves.toEqual([]);
    });

    it('fails without an artifact when text generation stays unavailable through every retry', async () => {
        const unavailable = Object.assign(new Error('HTTP 503'), { status: 503 });
        const { pipeline, text } = setup({ responses: [unavailable] });

        const result = expectFailure(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.error).toEqual({ category: 'generation', message: 'Text generation failed: HTTP 503' });
        expect(text.prompts).toHaveLength(4);
        await expect(fs.readdir(outputDir)).resolves.toEqual([]);
    });

    it('rejects an invalid request before any external call', async () => {
        const { pipeline, text } = setup();

        const result = expectFailure(await pipeline.run({ topic: '', slide_count: 30 }));

        expect(result.error).toEqual({
            category: 'validation',
            message: "Invalid generation request: 'topic' must be a non-empty string; 'slide_count' must be between 1 and 20",
            details: ["'topic' must be a non-empty string", "'slide_count' must be between 1 and 20"],
        });
        expect(text.prompts).toHaveLength(0);
    });

    it('produces the same slides for the same input and never overwrites', async () => {
        const { pipeline } = setup();

        const first = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));
        const second = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(second.slides).toEqual(first.slides);
        expect([first.fileName, second.fileName]).toEqual(['ocean-conservation.pptx', 'ocean-conservation-2.pptx']);
    });

    it('skips image search when no images are requested', async () => {
        const { pipeline, provider, requests } = setup();

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5, images_per_slide: 0 }));

        expect(result.status).toBe('success');
        expect(result.slides.every(slide => slide.layout.mode === 'full-text' && slide.layout.image === null)).toBe(true);
        expect(provider instanceof FakeImageSearch ? provider.calls : []).toEqual([]);
        expect(requests).toEqual([]);
    });

    it('handles a single-slide deck', async () => {
        const { pipeline } = setup({ responses: [scriptJson(['Why Oceans Matter'])] });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 1 }));

        expect(result.slides).toHaveLength(1);
        expect(result.slides[0].images).toHaveLength(1);
    });

    it('pads a short script and says so', async () => {
        const { pipeline } = setup({ responses: [scriptJson(TITLES.slice(0, 4))] });

        const result = expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5 }));

        expect(result.slides[4].title).toBe('Ocean Conservation (5)');
        expect(result.warnings).toEqual([
            'Script returned 4 of 5 slides; padded the rest with placeholders',
            'Slide 5: no image found for "Ocean Conservation (5)"',
        ]);
    });

    it('applies a named template', async () => {
        const { pipeline } = setup();

        expectSuccess(await pipeline.run({ topic: TOPIC, slide_count: 5, template_reference: 'midnight' }));
    });

    it('fails with a composition error for an unknown template', async () => {
        const { pipeline, text } = setup();

        const result = expectFailure(await pipeline.run({ topic: TOPIC, slide_count: 5, template_reference: 'no-such-theme' }));

        expect(result.error.category).toBe('composition');
        expect(text.prompts).toHaveLength(0);
    });

    it('discards a run cancelled mid-flight', async () => {
        const controller = new AbortController();
        const search = searchTable(i => () => {
            controller.abort();
            return [imageFor(i)];
        });
        const { pipeline } = setup({ search });

        const result = expectFailure(await pipeline.run({ topic: TOPIC, slide_count: 5 }, controller.signal));

        expect(result.error.category).toBe('cancelled');
        await expect(fs.readdir(outputDir)).resolves.toEqual([]);
    });
});

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '@shared/errors';
import { FakeImageSearch, FakeTextGenerator, PNG_BASE64, candidate, createFakeFetch, pngResponse, scriptJson } from '../testing/fakes';
import { ImageFetcher } from './imageFetcher';
import { ScriptGenerator } from './scriptGeneration';
import { createToolRegistry, isToolName, type ToolDependencies } from './tools';

const noDelay = { initialDelayMs: 0, maxDelayMs: 0, jitterMs: 0 };
const reef = candidate('reef');

describe('tool registry', () => {
    let outputDir: string;
    let deps: ToolDependencies;
    let text: FakeTextGenerator;

    beforeEach(async () => {
        outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'autodeck-tools-'));
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);

        text = new FakeTextGenerator([scriptJson(['Tides', 'Currents'])]);
        const { fetchFn } = createFakeFetch({ [reef.downloadUrl]: pngResponse });
        deps = {
            scriptGenerator: new ScriptGenerator(text, noDelay),
            imageFetcher: new ImageFetcher(new FakeImageSearch({ 'coral reef': [reef] }), fetchFn, noDelay),
            templateDir: path.resolve(__dirname, '../../templates'),
            outputDir,
            emptyImagePolicy: 'collapse',
        };
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await fs.rm(outputDir, { recursive: true, force: true });
    });

    it('knows its tool names', () => {
        expect(isToolName('write_script')).toBe(true);
        expect(isToolName('export_pptx')).toBe(true);
        expect(isToolName('delete_everything')).toBe(false);
        expect(isToolName(42)).toBe(false);
    });

    it('write_script returns the entries for a topic', async () => {
        const tools = createToolRegistry(deps);

        await expect(tools.write_script({ topic: ' Oceans ', slide_count: 2, tone: 'calm' })).resolves.toEqual({
            topic: 'Oceans',
            slides: [
                { title: 'Tides', bullets: ['About Tides'], notes: 'Notes on Tides' },
                { title: 'Currents', bullets: ['About Currents'], notes: 'Notes on Currents' },
            ],
        });
    });

    it('write_script validates like the pipeline', async () => {
        const tools = createToolRegistry(deps);

        await expect(tools.write_script({ topic: 'Oceans', slide_count: '2' })).rejects.toBeInstanceOf(ValidationError);
        await expect(tools.write_script({ topic: '', slides: 2 })).rejects.toBeInstanceOf(ValidationError);
        expect(text.prompts).toHaveLength(0);
    });

    it('fetch_images returns downloaded assets', async () => {
        const tools = createToolRegistry(deps);

        await expect(tools.fetch_images({ query: 'coral reef', count: 1 })).resolves.toEqual([
            { kind: 'photo', sourceUrl: reef.sourceUrl, reference: `image/png;base64,${PNG_BASE64}`, attribution: reef.attribution },
        ]);
        await expect(tools.fetch_images({ query: 'coral reef', count: 99 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('create_slide composes one slide', async () => {
        const tools = createToolRegistry(deps);

        const composed = await tools.create_slide({ entry: { title: 'Tides', bullets: ['Moon pulls water'] }, images: [], index: 2 });

        expect(composed).toMatchObject({
            slide: { index: 2, title: 'Tides', bullets: ['Moon pulls water'], images: [], layout: { mode: 'full-text', image: null } },
            warnings: [],
        });
    });

    it('create_slide rejects a malformed entry', async () => {
        const tools = createToolRegistry(deps);

        await expect(tools.create_slide({ title: 7 })).rejects.toThrow("Slide 1: 'title' must be a string");
        await expect(tools.create_slide({ title: 'Tides', index: -1 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('export_artifact writes a deck named after the topic', async () => {
        const tools = createToolRegistry(deps);

        const result = await tools.export_artifact({
            topic: 'Ocean Basics',
            template_reference: 'midnight',
            slides: [
                { title: 'Tides', bullets: ['Moon pulls water'], images: [{ kind: 'photo', sourceUrl: reef.sourceUrl, reference: `image/png;base64,${PNG_BASE64}` }] },
                { title: 'Currents', bullets: ['x'.repeat(160)] },
            ],
        });

        expect(result).toEqual({
            artifactPath: path.join(outputDir, 'ocean-basics.pptx'),
            fileName: 'ocean-basics.pptx',
            warnings: ['Slide 2: bullet 1 truncated to 150 characters'],
        });
    });

    it('export_pptx is the same tool under its older name', async () => {
        const tools = createToolRegistry(deps);

        const result = await tools.export_pptx({ slides: [{ title: 'Only Slide' }] });

        expect(result).toMatchObject({ fileName: 'only-slide.pptx' });
    });

    it('export_artifact needs slides', async () => {
        const tools = createToolRegistry(deps);

        await expect(tools.export_artifact({ slides: [] })).rejects.toThrow("export_artifact: 'slides' must be a non-empty array");
        await expect(tools.export_artifact('slides')).rejects.toBeInstanceOf(ValidationError);
    });
});

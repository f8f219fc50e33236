import { CANDIDATES_PER_IMAGE } from '@shared/constants';
import { ValidationError, errorCategory } from '@shared/errors';
import type {
    EmptyImagePolicy,
    GenerationRequest,
    ImageAsset,
    ImageCandidate,
    PipelineResult,
    ScriptEntry,
    SlideSpec,
    TemplateTheme,
} from '@shared/types';
import { describeError, getErrorMessage } from '@shared/utils/errorMessage';
import { throwIfAborted } from '@shared/utils/retryLogic';
import { slugify } from '@shared/utils/slugify';
import { toGenerationRequest } from '@shared/utils/validation';
import { mapWithConcurrency } from '../utils/concurrency';
import { buildImageQuery, type ImageFetcher } from './imageFetcher';
import { assignCandidates, selectImages, uniqueByUrl } from './imageSelection';
import { exportPresentation } from './pptxExport';
import type { ScriptGenerator } from './scriptGeneration';
import { composeSlide } from './slideComposer';
import { resolveTheme } from './templateLoader';

export interface PipelineDependencies {
    scriptGenerator: ScriptGenerator;
    imageFetcher: ImageFetcher;
    templateDir: string;
    outputDir: string;
    imageFetchConcurrency: number;
    emptyImagePolicy: EmptyImagePolicy;
    defaultTheme?: TemplateTheme;
    downloadPrefix?: string;
}

interface ResolvedImages {
    images: ImageAsset[][];
    warnings: string[];
}

/**
 * Runs one generation request end to end: script, images, composition, export.
 * Holds no state between runs; everything a run creates is owned by that run.
 */
export class PipelineOrchestrator {
    constructor(private readonly deps: PipelineDependencies) {}

    async run(body: unknown, signal?: AbortSignal): Promise<PipelineResult> {
        const warnings: string[] = [];
        const startedAt = Date.now();

        try {
            const request = toGenerationRequest(body);
            console.log(`[PIPELINE] Starting "${request.topic}": ${request.slideCount} slides, ${request.imagesPerSlide} images each`);

            const theme = await resolveTheme(request.templateReference, this.deps.templateDir, this.deps.defaultTheme);

            // 1. Script must be complete before any image query can be built
            const script = await this.deps.scriptGenerator.generateWithReport(request.topic, request.slideCount, request.tone, signal);
            warnings.push(...script.warnings);

            // 2. Images, fetched concurrently and keyed by slide index
            const resolved = await this.resolveImages(script.entries, request, signal);
            warnings.push(...resolved.warnings);

            // 3. Composition in script order
            const slides: SlideSpec[] = script.entries.map((entry, index) => {
                const composed = composeSlide(entry, resolved.images[index], {
                    slideIndex: index,
                    requestedImages: request.imagesPerSlide,
                    emptyImagePolicy: this.deps.emptyImagePolicy,
                });
                warnings.push(...composed.warnings);
                return composed.slide;
            });

            throwIfAborted(signal);

            // 4. Export; the file only appears under its final name once fully written
            const artifact = await exportPresentation(
                { topic: request.topic, ...(request.templateReference ? { templateReference: request.templateReference } : {}), slides },
                theme,
                slugify(request.topic),
                this.deps.outputDir,
                signal
            );

            const status = warnings.length > 0 ? 'partial_success' : 'success';
            console.log(`[PIPELINE] Finished "${request.topic}" in ${Date.now() - startedAt}ms with status ${status} (${warnings.length} warnings)`);

            return {
                status,
                artifactPath: artifact.artifactPath,
                fileName: artifact.fileName,
                downloadReference: `${this.deps.downloadPrefix ?? '/download'}/${artifact.fileName}`,
                slides,
                warnings,
            };
        } catch (error: unknown) {
            const category = errorCategory(error);
            if (category === 'internal') {
                console.error('[PIPELINE] Unexpected failure:', error);
            } else {
                console.error(`[PIPELINE] Run aborted: ${describeError(error)}`);
            }
            return {
                status: 'failure',
                error: {
                    category,
                    message: getErrorMessage(error),
                    ...(error instanceof ValidationError ? { details: error.problems } : {}),
                },
                warnings,
            };
        }
    }

    private async resolveImages(entries: ScriptEntry[], request: GenerationRequest, signal?: AbortSignal): Promise<ResolvedImages> {
        const perSlide = request.imagesPerSlide;
        if (perSlide === 0) {
            return { images: entries.map(() => []), warnings: [] };
        }

        const queries = entries.map(entry => buildImageQuery(entry.title, request.topic));
        const { imageFetcher, imageFetchConcurrency } = this.deps;

        const searches = await mapWithConcurrency(queries, imageFetchConcurrency, query =>
            imageFetcher.searchCandidates(query, perSlide * CANDIDATES_PER_IMAGE, signal)
        );

        throwIfAborted(signal);

        // Dedupe across slides only once every search is in, walking slides in order
        const candidateLists: ImageCandidate[][] = searches.map(outcome => (outcome.ok ? outcome.candidates : []));

        // Each URL downloads at most once per run; a failure is remembered as null
        const downloaded = new Map<string, ImageAsset | null>();
        const attempt = async (candidate: ImageCandidate): Promise<ImageAsset | null> => {
            if (downloaded.has(candidate.downloadUrl)) return downloaded.get(candidate.downloadUrl) ?? null;
            const result = await imageFetcher.tryDownload(candidate, signal);
            const asset = result.ok ? result.asset : null;
            downloaded.set(candidate.downloadUrl, asset);
            return asset;
        };

        // Fetch the likely picks concurrently; the ordered walk below only waits on replacements
        const likely = uniqueByUrl(assignCandidates(candidateLists, perSlide).flatMap(ordered => ordered.slice(0, perSlide)));
        await mapWithConcurrency(likely, imageFetchConcurrency, attempt);
        const images = await selectImages(candidateLists, perSlide, attempt);
        throwIfAborted(signal);

        const warnings: string[] = [];
        images.forEach((assets, index) => {
            const label = `Slide ${index + 1}`;
            const search = searches[index];
            if (assets.length === 0) {
                const reason = search.ok ? `no image found for "${queries[index]}"` : `no image found (image search failed: ${search.error.message})`;
                warnings.push(`${label}: ${reason}`);
            } else if (assets.length < perSlide) {
                warnings.push(`${label}: found ${assets.length} of ${perSlide} requested images`);
            }
        });
        warnings.forEach(warning => console.warn(`[IMAGES] ${warning}`));

        return { images, warnings };
    }
}

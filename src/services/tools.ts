import { DEFAULT_TONE, MAX_IMAGES_PER_SLIDE } from '@shared/constants';
import { ValidationError } from '@shared/errors';
import type { EmptyImagePolicy, ExportedArtifact, ImageAsset, ScriptEntry, SlideSpec, TemplateTheme } from '@shared/types';
import { slugify } from '@shared/utils/slugify';
import { isRecord } from '@shared/utils/typeGuards';
import { toImageAssets, toScriptEntry } from '@shared/utils/validation';
import type { ImageFetcher } from './imageFetcher';
import { exportPresentation } from './pptxExport';
import type { ScriptGenerator } from './scriptGeneration';
import { composeSlide, type ComposedSlide } from './slideComposer';
import { resolveTheme } from './templateLoader';

export const TOOL_NAMES = ['write_script', 'fetch_images', 'create_slide', 'export_artifact', 'export_pptx'] as const;
export type ToolName = typeof TOOL_NAMES[number];

export type ToolHandler = (args: unknown, signal?: AbortSignal) => Promise<unknown>;

export interface ToolDependencies {
    scriptGenerator: ScriptGenerator;
    imageFetcher: ImageFetcher;
    templateDir: string;
    outputDir: string;
    emptyImagePolicy: EmptyImagePolicy;
    defaultTheme?: TemplateTheme;
}

export function isToolName(name: unknown): name is ToolName {
    return typeof name === 'string' && TOOL_NAMES.some(tool => tool === name);
}

function requireArgs(args: unknown, tool: string): Record<string, unknown> {
    if (args === undefined || args === null) return {};
    if (!isRecord(args)) {
        throw new ValidationError(`${tool}: 'args' must be an object`, [`'args' must be an object`]);
    }
    return args;
}

function requireNumber(value: unknown, name: string, tool: string): number {
    if (typeof value !== 'number') {
        throw new ValidationError(`${tool}: '${name}' must be a number`, [`'${name}' must be a number`]);
    }
    return value;
}

function optionalString(value: unknown, name: string, tool: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw new ValidationError(`${tool}: '${name}' must be a string`, [`'${name}' must be a string`]);
    }
    return value;
}

export async function writeScript(deps: ToolDependencies, args: unknown, signal?: AbortSignal): Promise<{ topic: string; slides: ScriptEntry[] }> {
    const input = requireArgs(args, 'write_script');
    const topic = optionalString(input.topic, 'topic', 'write_script') ?? '';
    const slideCount = requireNumber(input.slide_count ?? input.slides, 'slide_count', 'write_script');
    const tone = optionalString(input.tone, 'tone', 'write_script') ?? DEFAULT_TONE;

    const slides = await deps.scriptGenerator.generate(topic, slideCount, tone, signal);
    return { topic: topic.trim(), slides };
}

export async function fetchImages(deps: ToolDependencies, args: unknown, signal?: AbortSignal): Promise<ImageAsset[]> {
    const input = requireArgs(args, 'fetch_images');
    const query = optionalString(input.query, 'query', 'fetch_images') ?? '';
    const count = requireNumber(input.count ?? input.n ?? 1, 'count', 'fetch_images');
    return deps.imageFetcher.fetch(query, count, signal);
}

function composeFromInput(deps: ToolDependencies, value: unknown, index: number, requestedImages?: number): ComposedSlide {
    const entry = toScriptEntry(value, index);
    const images = toImageAssets(isRecord(value) ? value.images : undefined, `Slide ${index + 1}`);
    return composeSlide(entry, images, {
        slideIndex: index,
        ...(requestedImages !== undefined ? { requestedImages } : {}),
        emptyImagePolicy: deps.emptyImagePolicy,
    });
}

export async function createSlide(deps: ToolDependencies, args: unknown): Promise<ComposedSlide> {
    const input = requireArgs(args, 'create_slide');
    const source = isRecord(input.entry) ? { ...input.entry, images: input.images } : input;
    const index = input.index === undefined ? 0 : requireNumber(input.index, 'index', 'create_slide');
    if (!Number.isInteger(index) || index < 0) {
        throw new ValidationError(`create_slide: 'index' must be a non-negative integer`, [`'index' must be a non-negative integer`]);
    }

    let requested: number | undefined;
    if (input.images_per_slide !== undefined) {
        requested = requireNumber(input.images_per_slide, 'images_per_slide', 'create_slide');
        if (!Number.isInteger(requested) || requested < 0 || requested > MAX_IMAGES_PER_SLIDE) {
            throw new ValidationError(`create_slide: 'images_per_slide' must be between 0 and ${MAX_IMAGES_PER_SLIDE}`, [
                `'images_per_slide' must be between 0 and ${MAX_IMAGES_PER_SLIDE}`,
            ]);
        }
    }
    return composeFromInput(deps, source, index, requested);
}

/**
 * Export slides given as entries (title, bullets, notes, images). Each is re-composed so the
 * layout contract holds no matter what the caller sends.
 */
export async function exportArtifact(deps: ToolDependencies, args: unknown, signal?: AbortSignal): Promise<ExportedArtifact & { warnings: string[] }> {
    const input = requireArgs(args, 'export_artifact');
    if (!Array.isArray(input.slides) || input.slides.length === 0) {
        throw new ValidationError(`export_artifact: 'slides' must be a non-empty array`, [`'slides' must be a non-empty array`]);
    }

    const warnings: string[] = [];
    const slides: SlideSpec[] = input.slides.map((value: unknown, index: number) => {
        const composed = composeFromInput(deps, value, index);
        warnings.push(...composed.warnings);
        return composed.slide;
    });

    const templateReference = optionalString(input.template_reference, 'template_reference', 'export_artifact');
    const theme = await resolveTheme(templateReference, deps.templateDir, deps.defaultTheme);
    const topic = optionalString(input.topic, 'topic', 'export_artifact')?.trim() || slides[0].title;
    const baseName = slugify(optionalString(input.file_name ?? input.filename, 'file_name', 'export_artifact') ?? topic);

    const artifact = await exportPresentation(
        { topic, ...(templateReference ? { templateReference } : {}), slides },
        theme,
        baseName,
        deps.outputDir,
        signal
    );
    return { ...artifact, warnings };
}

/**
 * The tool-invocation contract: each operation callable on its own, with the same
 * validation and error behaviour as inside the pipeline.
 */
export function createToolRegistry(deps: ToolDependencies): Record<ToolName, ToolHandler> {
    return {
        write_script: (args, signal) => writeScript(deps, args, signal),
        fetch_images: (args, signal) => fetchImages(deps, args, signal),
        create_slide: args => createSlide(deps, args),
        export_artifact: (args, signal) => exportArtifact(deps, args, signal),
        // Name used by earlier clients
        export_pptx: (args, signal) => exportArtifact(deps, args, signal),
    };
}

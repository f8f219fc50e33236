export type EmptyImagePolicy = 'collapse' | 'placeholder';

export type ImageProviderName = 'unsplash' | 'brave';

/**
 * A validated generation request. Frozen once accepted; consumed by exactly one pipeline run.
 */
export interface GenerationRequest {
    readonly topic: string;
    readonly slideCount: number;
    readonly tone: string;
    readonly imagesPerSlide: number;
    readonly templateReference?: string;
}

export interface ScriptEntry {
    title: string;
    bullets: string[];
    notes?: string;
}

export type ScriptParseResult =
    | { kind: 'complete'; entries: ScriptEntry[]; warnings: string[] }
    | { kind: 'shortfall'; entries: ScriptEntry[]; missing: number; warnings: string[] }
    | { kind: 'invalid'; reason: string };

export interface ScriptReport {
    entries: ScriptEntry[];
    warnings: string[];
}

/**
 * A search hit that has not been downloaded yet.
 */
export interface ImageCandidate {
    sourceUrl: string;
    downloadUrl: string;
    attribution: string;
    provider: ImageProviderName;
    width?: number;
    height?: number;
}

export interface ImageAsset {
    kind: 'photo' | 'placeholder';
    sourceUrl: string;
    // pptxgenjs data reference: "<mime>;base64,<payload>"
    reference: string;
    attribution: string;
    width?: number;
    height?: number;
}

export interface Region {
    x: number;
    y: number;
    w: number;
    h: number;
}

export interface ImagePlacement extends Region {
    asset: ImageAsset;
}

export interface SlideLayout {
    mode: 'split' | 'full-text';
    title: Region;
    text: Region;
    image: Region | null;
    bulletFontSize: number;
    placements: ImagePlacement[];
}

export interface SlideSpec {
    index: number;
    title: string;
    bullets: string[];
    notes?: string;
    images: ImageAsset[];
    layout: SlideLayout;
}

export interface Presentation {
    topic: string;
    templateReference?: string;
    slides: SlideSpec[];
}

export interface TemplateTheme {
    name: string;
    background: string;
    titleColor: string;
    bodyColor: string;
    accentColor: string;
    fontFace: string;
    titleFontSize: number;
}

export type ErrorCategory =
    | 'validation'
    | 'configuration'
    | 'generation'
    | 'image_fetch'
    | 'composition'
    | 'export'
    | 'cancelled'
    | 'internal';

export interface ExportedArtifact {
    artifactPath: string;
    fileName: string;
}

export type PipelineResult =
    | {
        status: 'success' | 'partial_success';
        artifactPath: string;
        fileName: string;
        downloadReference: string;
        slides: SlideSpec[];
        warnings: string[];
    }
    | {
        status: 'failure';
        error: { category: ErrorCategory; message: string; details?: string[] };
        warnings: string[];
    };

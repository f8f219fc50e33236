import * as crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import PptxGenJS from 'pptxgenjs';
import { BULLET_PARA_SPACE_PT, PLACEHOLDER_LABEL, TEXT_INSET } from '@shared/constants';
import { CancelledError, ExportError } from '@shared/errors';
import type { ExportedArtifact, Presentation, SlideSpec, TemplateTheme } from '@shared/types';
import { getErrorMessage } from '@shared/utils/errorMessage';
import { throwIfAborted } from '@shared/utils/retryLogic';
import { artifactFileName } from '@shared/utils/slugify';

const MAX_NAME_ATTEMPTS = 1000;
const CAPTION_HEIGHT = 0.25;

function speakerNotes(slide: SlideSpec): string {
    const credits = slide.images
        .filter(image => image.kind === 'photo' && image.attribution)
        .map(image => `${image.attribution} (${image.sourceUrl})`);
    return [slide.notes, credits.length > 0 ? `Image credits:\n${credits.join('\n')}` : '']
        .filter(Boolean)
        .join('\n\n');
}

function addSlide(pptx: PptxGenJS, slideSpec: SlideSpec, theme: TemplateTheme): void {
    const slide = pptx.addSlide();
    const { layout } = slideSpec;
    slide.background = { color: theme.background };

    slide.addText(slideSpec.title, {
        ...layout.title,
        fontFace: theme.fontFace,
        fontSize: theme.titleFontSize,
        color: theme.titleColor,
        bold: true,
        align: 'left',
        valign: 'top',
        fit: 'shrink',
    });

    if (slideSpec.bullets.length > 0) {
        slide.addText(
            slideSpec.bullets.map(bullet => ({ text: bullet, options: { bullet: true, breakLine: true } })),
            {
                ...layout.text,
                fontFace: theme.fontFace,
                fontSize: layout.bulletFontSize,
                color: theme.bodyColor,
                align: 'left',
                valign: 'top',
                paraSpaceAfter: BULLET_PARA_SPACE_PT,
                inset: TEXT_INSET,
                fit: 'shrink',
            }
        );
    }

    for (const placement of layout.placements) {
        const { asset, x, y, w, h } = placement;
        if (asset.kind === 'placeholder') {
            slide.addText(PLACEHOLDER_LABEL, {
                x, y, w, h,
                fontFace: theme.fontFace,
                fontSize: 14,
                color: '6B7280',
                fill: { color: 'E5E7EB' },
                align: 'center',
                valign: 'middle',
            });
            continue;
        }

        slide.addImage({ data: asset.reference, x, y, w, h, sizing: { type: 'contain', w, h } });
        if (asset.attribution) {
            slide.addText(asset.attribution, {
                x, y: y + h, w, h: CAPTION_HEIGHT,
                fontFace: theme.fontFace,
                fontSize: 8,
                color: theme.accentColor,
                align: 'right',
                valign: 'top',
            });
        }
    }

    const notes = speakerNotes(slideSpec);
    if (notes) {
        slide.addNotes(notes);
    }
}

/**
 * Render the deck to pptx bytes. Only the rendering lives here; layout is decided by the composer.
 */
export async function renderPresentation(presentation: Presentation, theme: TemplateTheme): Promise<Buffer> {
    const pptx = new PptxGenJS();
    pptx.layout = 'LAYOUT_16x9';
    pptx.title = presentation.topic;

    presentation.slides.forEach(slide => addSlide(pptx, slide, theme));

    const output = await pptx.write({ outputType: 'nodebuffer' });
    if (!(output instanceof Uint8Array)) {
        throw new ExportError('pptx renderer did not return a buffer');
    }
    return Buffer.from(output);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * Publish bytes under `<baseName>.pptx`, or the first free `<baseName>-N.pptx`.
 *
 * The bytes go to a temp file first and are hard-linked into place; a link never
 * replaces an existing file, so a taken name moves on to the next suffix.
 */
export async function publishArtifact(data: Buffer, baseName: string, outputDir: string, signal?: AbortSignal): Promise<ExportedArtifact> {
    const tempPath = path.join(outputDir, `.${baseName}.${crypto.randomUUID()}.tmp`);

    try {
        await fs.mkdir(outputDir, { recursive: true });
        await fs.writeFile(tempPath, data);
        throwIfAborted(signal);

        for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
            const fileName = artifactFileName(baseName, attempt);
            const artifactPath = path.join(outputDir, fileName);
            try {
                await fs.link(tempPath, artifactPath);
                console.log(`[EXPORT] Wrote ${artifactPath}`);
                return { artifactPath, fileName };
            } catch (error: unknown) {
                if (isErrnoException(error) && error.code === 'EEXIST') continue;
                throw error;
            }
        }
        throw new ExportError(`No free file name for "${baseName}" after ${MAX_NAME_ATTEMPTS} attempts`);
    } catch (error: unknown) {
        if (error instanceof ExportError || error instanceof CancelledError) throw error;
        throw new ExportError(`Could not write deck: ${getErrorMessage(error)}`, error);
    } finally {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
            console.error(`[EXPORT] Failed to remove temp file ${tempPath}:`, cleanupError);
        });
    }
}

export async function exportPresentation(
    presentation: Presentation,
    theme: TemplateTheme,
    baseName: string,
    outputDir: string,
    signal?: AbortSignal
): Promise<ExportedArtifact> {
    let data: Buffer;
    try {
        data = await renderPresentation(presentation, theme);
    } catch (error: unknown) {
        if (error instanceof ExportError) throw error;
        throw new ExportError(`Could not render deck: ${getErrorMessage(error)}`, error);
    }
    return publishArtifact(data, baseName, outputDir, signal);
}

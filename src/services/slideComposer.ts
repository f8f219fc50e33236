import {
    AVG_CHAR_WIDTH_EM,
    BODY_TOP,
    BOTTOM_MARGIN,
    BULLET_INDENT,
    BULLET_LINE_SPACING,
    BULLET_PARA_SPACE_PT,
    IMAGE_GAP,
    IMAGE_MAX_H,
    IMAGE_MAX_W,
    MARGIN_X,
    MAX_BULLET_CHARS,
    MAX_IMAGES_PER_SLIDE,
    MIN_BULLET_FONT_SIZE,
    PLACEHOLDER_REFERENCE,
    SLIDE_HEIGHT,
    SLIDE_WIDTH,
    TEXT_INSET,
    TEXT_REGION_RATIO,
    TITLE_HEIGHT,
    TITLE_TOP,
} from '@shared/constants';
import type { EmptyImagePolicy, ImageAsset, ImagePlacement, Region, ScriptEntry, SlideLayout, SlideSpec } from '@shared/types';
import { truncateText } from '@shared/utils/text';

export interface ComposeOptions {
    /** Zero-based position in the deck */
    slideIndex?: number;
    /** Images the request asked for; decides whether an empty slide gets a placeholder */
    requestedImages?: number;
    emptyImagePolicy?: EmptyImagePolicy;
}

export interface ComposedSlide {
    slide: SlideSpec;
    warnings: string[];
}

export interface FittedBullets {
    bullets: string[];
    fontSize: number;
    warnings: string[];
}

const PT_PER_INCH = 72;

// Inches, rounded so layouts compare exactly
const round = (value: number): number => Math.round(value * 1000) / 1000;

export function placeholderAsset(): ImageAsset {
    return { kind: 'placeholder', sourceUrl: '', reference: PLACEHOLDER_REFERENCE, attribution: '' };
}

export function bulletFontSize(bulletCount: number): number {
    if (bulletCount <= 5) return 18;
    if (bulletCount <= 8) return 16;
    return 14;
}

export function charsPerLine(width: number, fontSize: number): number {
    return Math.max(1, Math.floor(((width - BULLET_INDENT) * PT_PER_INCH) / (fontSize * AVG_CHAR_WIDTH_EM)));
}

function linesFor(bullet: string, perLine: number): number {
    return Math.max(1, Math.ceil(Array.from(bullet).length / perLine));
}

/**
 * Estimated height in inches of the bullet list in a text box `width` inches wide, insets included.
 */
export function estimateBulletHeight(bullets: string[], fontSize: number, width: number): number {
    const perLine = charsPerLine(width, fontSize);
    const lines = bullets.reduce((total, bullet) => total + linesFor(bullet, perLine), 0);
    return (lines * fontSize * BULLET_LINE_SPACING + bullets.length * BULLET_PARA_SPACE_PT) / PT_PER_INCH + 2 * TEXT_INSET;
}

/**
 * Make bullets fit their region: step the font down to the minimum, then shorten trailing bullets,
 * and drop trailing bullets only when one line each still overflows. Every change is reported.
 */
export function fitBullets(bullets: string[], region: Region, label: string): FittedBullets {
    const warnings: string[] = [];
    const initialSize = bulletFontSize(bullets.length);
    let fontSize = initialSize;
    const fits = (items: string[]): boolean => estimateBulletHeight(items, fontSize, region.w) <= region.h;

    while (!fits(bullets) && fontSize > MIN_BULLET_FONT_SIZE) {
        fontSize = Math.max(MIN_BULLET_FONT_SIZE, fontSize - 2);
    }
    if (fontSize < initialSize) {
        warnings.push(`${label}: bullet font reduced from ${initialSize}pt to ${fontSize}pt to fit the text region`);
    }

    const fitted = [...bullets];
    const perLine = charsPerLine(region.w, fontSize);
    const availablePt = (region.h - 2 * TEXT_INSET) * PT_PER_INCH - fitted.length * BULLET_PARA_SPACE_PT;
    const lineBudget = Math.floor(availablePt / (fontSize * BULLET_LINE_SPACING));
    let excess = fitted.reduce((total, bullet) => total + linesFor(bullet, perLine), 0) - lineBudget;

    const shortened: number[] = [];
    for (let i = fitted.length - 1; i >= 0 && excess > 0; i--) {
        const lines = linesFor(fitted[i], perLine);
        const cut = Math.min(lines - 1, excess);
        if (cut === 0) continue;
        fitted[i] = truncateText(fitted[i], (lines - cut) * perLine).text;
        excess -= cut;
        shortened.unshift(i);
    }
    shortened.forEach(i => warnings.push(`${label}: bullet ${i + 1} shortened to fit the text region`));

    const total = fitted.length;
    while (fitted.length > 0 && !fits(fitted)) {
        fitted.pop();
    }
    if (fitted.length < total) {
        warnings.push(`${label}: ${total - fitted.length} trailing bullets dropped to fit the text region`);
    }

    return { bullets: fitted, fontSize, warnings };
}

function placeImages(images: ImageAsset[], region: Region): ImagePlacement[] {
    const cols = images.length === 1 ? 1 : 2;
    const rows = Math.ceil(images.length / cols);
    const w = Math.min(IMAGE_MAX_W, (region.w - (cols - 1) * IMAGE_GAP) / cols);
    const h = Math.min(IMAGE_MAX_H, (region.h - (rows - 1) * IMAGE_GAP) / rows);

    return images.map((asset, i) => {
        const col = i % cols;
        const row = Math.floor(i / cols);
        return {
            asset,
            x: round(region.x + col * (w + IMAGE_GAP)),
            y: round(region.y + row * (h + IMAGE_GAP)),
            w: round(w),
            h: round(h),
        };
    });
}

/**
 * Fixed region contract: title band across the top, text on the left ~55%, images on the right ~45%.
 * With no images the image region collapses and the text spans the full width.
 */
export function computeLayout(images: ImageAsset[], bulletCount: number): SlideLayout {
    const bodyHeight = round(SLIDE_HEIGHT - BODY_TOP - BOTTOM_MARGIN);
    const fullWidth = round(SLIDE_WIDTH - 2 * MARGIN_X);
    const title: Region = { x: MARGIN_X, y: TITLE_TOP, w: fullWidth, h: TITLE_HEIGHT };

    if (images.length === 0) {
        return {
            mode: 'full-text',
            title,
            text: { x: MARGIN_X, y: BODY_TOP, w: fullWidth, h: bodyHeight },
            image: null,
            bulletFontSize: bulletFontSize(bulletCount),
            placements: [],
        };
    }

    const splitAt = SLIDE_WIDTH * TEXT_REGION_RATIO;
    const imageLeft = round(splitAt + MARGIN_X);
    const image: Region = { x: imageLeft, y: BODY_TOP, w: round(SLIDE_WIDTH - imageLeft - MARGIN_X), h: bodyHeight };

    return {
        mode: 'split',
        title,
        text: { x: MARGIN_X, y: BODY_TOP, w: round(splitAt - 2 * MARGIN_X), h: bodyHeight },
        image,
        bulletFontSize: bulletFontSize(bulletCount),
        placements: placeImages(images, image),
    };
}

/**
 * Lay out one script entry with its resolved images. Pure: the same input always yields the same slide.
 */
export function composeSlide(entry: ScriptEntry, images: ImageAsset[], options: ComposeOptions = {}): ComposedSlide {
    const index = options.slideIndex ?? 0;
    const label = `Slide ${index + 1}`;
    const warnings: string[] = [];

    let title = entry.title.trim();
    if (!title) {
        title = label;
        warnings.push(`${label}: empty title replaced with "${title}"`);
    }

    const bullets = entry.bullets.map((bullet, i) => {
        const { text, truncated } = truncateText(bullet.trim());
        if (truncated) {
            warnings.push(`${label}: bullet ${i + 1} truncated to ${MAX_BULLET_CHARS} characters`);
        }
        return text;
    });

    let placed = images;
    if (images.length > MAX_IMAGES_PER_SLIDE) {
        placed = images.slice(0, MAX_IMAGES_PER_SLIDE);
        warnings.push(`${label}: only the first ${MAX_IMAGES_PER_SLIDE} of ${images.length} images were placed`);
    }
    const requested = options.requestedImages ?? images.length;
    if (placed.length === 0 && requested > 0 && options.emptyImagePolicy === 'placeholder') {
        placed = [placeholderAsset()];
    }

    const layout = computeLayout(placed, bullets.length);
    const fitted = fitBullets(bullets, layout.text, label);
    warnings.push(...fitted.warnings);

    const notes = entry.notes?.trim();
    const slide: SlideSpec = {
        index,
        title,
        bullets: fitted.bullets,
        ...(notes ? { notes } : {}),
        images: placed,
        layout: { ...layout, bulletFontSize: fitted.fontSize },
    };

    warnings.forEach(warning => console.warn(`[COMPOSER] ${warning}`));
    return { slide, warnings };
}

import { FALLBACK_ARTIFACT_NAME, MAX_ARTIFACT_NAME_LENGTH } from '../constants';

const SEPARATORS = new Set([' ', '-', '_', '.']);

/**
 * Filesystem-safe base name for a topic: "Energía solar: 2025" -> "energia-solar-2025".
 * Pure; the same topic always yields the same name.
 */
export function slugify(text: string, maxLength = MAX_ARTIFACT_NAME_LENGTH): string {
    const stripped = text.normalize('NFKD').replace(/\p{M}/gu, '');

    let slug = '';
    for (const ch of stripped.toLowerCase()) {
        if (/^[a-z0-9]$/.test(ch)) {
            slug += ch;
        } else if (SEPARATORS.has(ch) || /\s/.test(ch)) {
            slug += '-';
        }
    }

    slug = slug.replace(/-{2,}/g, '-').replace(/^-+|-+$/g, '');
    if (slug.length > maxLength) {
        slug = slug.substring(0, maxLength).replace(/-+$/, '');
    }
    return slug || FALLBACK_ARTIFACT_NAME;
}

/**
 * Candidate file name for the n-th deck sharing a base name (1 = no suffix).
 */
export function artifactFileName(baseName: string, attempt: number): string {
    return attempt <= 1 ? `${baseName}.pptx` : `${baseName}-${attempt}.pptx`;
}

export const ARTIFACT_FILE_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*\.pptx$/;

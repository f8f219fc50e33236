import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_THEME } from '@shared/constants';
import { CompositionError, ValidationError } from '@shared/errors';
import type { TemplateTheme } from '@shared/types';
import { isRecord } from '@shared/utils/typeGuards';

const COLOR_KEYS = ['background', 'titleColor', 'bodyColor', 'accentColor'] as const;
const HEX_COLOR = /^#?[0-9a-fA-F]{6}$/;

/**
 * Parse a JSON theme file. Keys left out fall back to the default theme.
 */
export function parseTemplateTheme(raw: string, source: string): TemplateTheme {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        throw new CompositionError(`Template ${path.basename(source)} is not valid JSON`, source);
    }
    if (!isRecord(data)) {
        throw new CompositionError(`Template ${path.basename(source)} must be a JSON object`, source);
    }

    const theme: TemplateTheme = { ...DEFAULT_THEME, name: path.basename(source, path.extname(source)) };

    if (data.name !== undefined) {
        if (typeof data.name !== 'string' || !data.name.trim()) {
            throw new CompositionError(`Template ${theme.name}: 'name' must be a non-empty string`, source);
        }
        theme.name = data.name.trim();
    }

    for (const key of COLOR_KEYS) {
        const value = data[key];
        if (value === undefined) continue;
        if (typeof value !== 'string' || !HEX_COLOR.test(value)) {
            throw new CompositionError(`Template ${theme.name}: '${key}' must be a 6-digit hex colour`, source);
        }
        theme[key] = value.replace('#', '').toUpperCase();
    }

    if (data.fontFace !== undefined) {
        if (typeof data.fontFace !== 'string' || !data.fontFace.trim()) {
            throw new CompositionError(`Template ${theme.name}: 'fontFace' must be a non-empty string`, source);
        }
        theme.fontFace = data.fontFace.trim();
    }

    if (data.titleFontSize !== undefined) {
        if (typeof data.titleFontSize !== 'number' || data.titleFontSize < 12 || data.titleFontSize > 60) {
            throw new CompositionError(`Template ${theme.name}: 'titleFontSize' must be a number between 12 and 60`, source);
        }
        theme.titleFontSize = data.titleFontSize;
    }

    return theme;
}

/**
 * Resolve a request's template reference inside the template directory.
 * A bare name gets a .json extension.
 */
export function resolveTemplatePath(reference: string, templateDir: string): string {
    const fileName = path.extname(reference) ? reference : `${reference}.json`;
    const root = path.resolve(templateDir);
    const resolved = path.resolve(root, fileName);
    if (resolved !== root && !resolved.startsWith(root + path.sep)) {
        throw new ValidationError(`template_reference escapes the template directory: ${reference}`, [
            `'template_reference' must name a file inside the template directory`,
        ]);
    }
    return resolved;
}

export async function loadTemplate(reference: string, templateDir: string): Promise<TemplateTheme> {
    const templatePath = resolveTemplatePath(reference, templateDir);
    let raw: string;
    try {
        raw = await fs.readFile(templatePath, 'utf8');
    } catch (error) {
        console.error(`[COMPOSER] Cannot read template ${templatePath}:`, error);
        throw new CompositionError(`Template "${reference}" could not be read`, templatePath);
    }
    return parseTemplateTheme(raw, templatePath);
}

/**
 * Theme for a run: the named template, else the configured default, else the built-in one.
 */
export async function resolveTheme(reference: string | undefined, templateDir: string, fallback?: TemplateTheme): Promise<TemplateTheme> {
    if (reference) {
        return loadTemplate(reference, templateDir);
    }
    return fallback ?? DEFAULT_THEME;
}

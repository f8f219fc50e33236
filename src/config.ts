import fs from 'fs';
import path from 'path';
import { MODEL_SCRIPT_GENERATION } from '@shared/constants';
import { CompositionError, ConfigurationError } from '@shared/errors';
import type { EmptyImagePolicy, ImageProviderName, TemplateTheme } from '@shared/types';
import { parseTemplateTheme } from './services/templateLoader';

export interface AppConfig {
    geminiApiKey: string;
    geminiModel: string;
    imageProvider: ImageProviderName;
    imageApiKey: string;
    templateDir: string;
    /** Theme used when a request names no template */
    defaultTheme?: TemplateTheme;
    outputDir: string;
    port: number;
    imageFetchConcurrency: number;
    scriptTimeoutMs: number;
    imageTimeoutMs: number;
    emptyImagePolicy: EmptyImagePolicy;
}

type Env = Record<string, string | undefined>;

function required(env: Env, key: string, hint: string): string {
    const value = env[key]?.trim();
    if (!value) {
        throw new ConfigurationError(`${key} is not set. ${hint}`, key);
    }
    return value;
}

function integer(env: Env, key: string, fallback: number, min: number, max: number): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ConfigurationError(`${key} must be an integer between ${min} and ${max}, got "${raw}"`, key);
    }
    return value;
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const match = allowed.find(option => option === raw);
    if (!match) {
        throw new ConfigurationError(`${key} must be one of ${allowed.join(', ')}, got "${raw}"`, key);
    }
    return match;
}

function loadDefaultTheme(templatePath: string): TemplateTheme {
    let raw: string;
    try {
        raw = fs.readFileSync(templatePath, 'utf8');
    } catch {
        throw new ConfigurationError(`SLIDE_TEMPLATE points to an unreadable file: ${templatePath}`, 'SLIDE_TEMPLATE');
    }
    try {
        return parseTemplateTheme(raw, templatePath);
    } catch (error) {
        if (error instanceof CompositionError) {
            throw new ConfigurationError(`SLIDE_TEMPLATE is invalid: ${error.message}`, 'SLIDE_TEMPLATE');
        }
        throw error;
    }
}

/**
 * Build the process-wide configuration. Missing credentials fail here, at startup.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
    const geminiApiKey = required(env, 'GEMINI_API_KEY', 'Create a key in Google AI Studio and export it.');

    const imageProvider = oneOf<ImageProviderName>(env, 'IMAGE_PROVIDER', ['unsplash', 'brave'], 'unsplash');
    const imageApiKey = imageProvider === 'unsplash'
        ? required(env, 'UNSPLASH_ACCESS_KEY', 'Create an application at unsplash.com/developers and export its access key.')
        : required(env, 'BRAVE_API_KEY', 'Export a Brave Search API subscription token.');

    const templatePath = env.SLIDE_TEMPLATE?.trim();
    const defaultTemplatePath = templatePath ? path.resolve(cwd, templatePath) : undefined;

    return {
        geminiApiKey,
        geminiModel: env.GEMINI_MODEL?.trim() || MODEL_SCRIPT_GENERATION,
        imageProvider,
        imageApiKey,
        templateDir: path.resolve(cwd, env.TEMPLATE_DIR?.trim() || 'templates'),
        ...(defaultTemplatePath ? { defaultTheme: loadDefaultTheme(defaultTemplatePath) } : {}),
        outputDir: path.resolve(cwd, env.OUTPUT_DIR?.trim() || 'slides'),
        port: integer(env, 'PORT', 8000, 1, 65535),
        imageFetchConcurrency: integer(env, 'IMAGE_FETCH_CONCURRENCY', 3, 1, 10),
        scriptTimeoutMs: integer(env, 'SCRIPT_TIMEOUT_MS', 60000, 1000, 600000),
        imageTimeoutMs: integer(env, 'IMAGE_TIMEOUT_MS', 10000, 500, 120000),
        emptyImagePolicy: oneOf<EmptyImagePolicy>(env, 'EMPTY_IMAGE_POLICY', ['collapse', 'placeholder'], 'collapse'),
    };
}

import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_THEME } from '@shared/constants';
import { ConfigurationError } from '@shared/errors';
import { loadConfig } from './config';

describe('loadConfig', () => {
    let cwd: string;
    const base = { GEMINI_API_KEY: 'test-gemini-key', UNSPLASH_ACCESS_KEY: 'test-unsplash-key' };

    beforeEach(() => {
        cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'autodeck-config-'));
    });

    afterEach(() => {
        fs.rmSync(cwd, { recursive: true, force: true });
    });

    it('applies defaults', () => {
        expect(loadConfig(base, cwd)).toEqual({
            geminiApiKey: 'test-gemini-key',
            geminiModel: 'gemini-2.5-flash',
            imageProvider: 'unsplash',
            imageApiKey: 'test-unsplash-key',
            templateDir: path.join(cwd, 'templates'),
            outputDir: path.join(cwd, 'slides'),
            port: 8000,
            imageFetchConcurrency: 3,
            scriptTimeoutMs: 60000,
            imageTimeoutMs: 10000,
            emptyImagePolicy: 'collapse',
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            GEMINI_API_KEY: 'test-gemini-key',
            IMAGE_PROVIDER: 'brave',
            BRAVE_API_KEY: 'test-brave-key',
            OUTPUT_DIR: 'out',
            PORT: '9100',
            IMAGE_FETCH_CONCURRENCY: '5',
            EMPTY_IMAGE_POLICY: 'placeholder',
        }, cwd);

        expect(config).toMatchObject({
            imageProvider: 'brave',
            imageApiKey: 'test-brave-key',
            outputDir: path.join(cwd, 'out'),
            port: 9100,
            imageFetchConcurrency: 5,
            emptyImagePolicy: 'placeholder',
        });
    });

    it('fails at startup on missing credentials', () => {
        expect(() => loadConfig({}, cwd)).toThrow(ConfigurationError);
        expect(() => loadConfig({ GEMINI_API_KEY: 'test-gemini-key' }, cwd)).toThrow(/^UNSPLASH_ACCESS_KEY is not set/);
        expect(() => loadConfig({ GEMINI_API_KEY: 'test-gemini-key', IMAGE_PROVIDER: 'brave' }, cwd)).toThrow(/^BRAVE_API_KEY is not set/);
    });

    it('rejects malformed values', () => {
        expect(() => loadConfig({ ...base, PORT: 'eighty' }, cwd)).toThrow('PORT must be an integer between 1 and 65535, got "eighty"');
        expect(() => loadConfig({ ...base, IMAGE_FETCH_CONCURRENCY: '0' }, cwd)).toThrow(ConfigurationError);
        expect(() => loadConfig({ ...base, IMAGE_PROVIDER: 'bing' }, cwd)).toThrow('IMAGE_PROVIDER must be one of unsplash, brave, got "bing"');
    });

    it('loads the default slide template', () => {
        fs.writeFileSync(path.join(cwd, 'brand.json'), JSON.stringify({ accentColor: '10B981' }));

        const config = loadConfig({ ...base, SLIDE_TEMPLATE: 'brand.json' }, cwd);

        expect(config.defaultTheme).toEqual({ ...DEFAULT_THEME, name: 'brand', accentColor: '10B981' });
    });

    it('rejects an unusable slide template', () => {
        fs.writeFileSync(path.join(cwd, 'broken.json'), '{');

        expect(() => loadConfig({ ...base, SLIDE_TEMPLATE: 'missing.json' }, cwd)).toThrow(ConfigurationError);
        expect(() => loadConfig({ ...base, SLIDE_TEMPLATE: 'broken.json' }, cwd)).toThrow(/^SLIDE_TEMPLATE is invalid/);
    });
});

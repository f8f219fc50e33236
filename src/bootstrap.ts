import type { AppConfig } from './config';
import type { AppServices } from './app';
import { ImageFetcher } from './services/imageFetcher';
import { BraveImageSearch, UnsplashImageSearch, type FetchFn, type ImageSearchProvider } from './services/imageSearch';
import { PipelineOrchestrator } from './services/pipeline';
import { ScriptGenerator } from './services/scriptGeneration';
import { createToolRegistry } from './services/tools';
import { GeminiTextGenerator, type TextGenerator } from './utils/geminiClient';

/** Seams swapped out by tests */
export interface ServiceOverrides {
    textGenerator?: TextGenerator;
    imageProvider?: ImageSearchProvider;
    fetchFn?: FetchFn;
}

function createImageProvider(config: AppConfig, fetchFn: FetchFn): ImageSearchProvider {
    switch (config.imageProvider) {
        case 'brave':
            return new BraveImageSearch(config.imageApiKey, fetchFn);
        case 'unsplash':
            return new UnsplashImageSearch(config.imageApiKey, fetchFn);
    }
}

/**
 * Wire every service from the loaded configuration.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
    const fetchFn = overrides.fetchFn ?? fetch;
    const textGenerator = overrides.textGenerator ?? new GeminiTextGenerator(config.geminiApiKey, config.geminiModel);

    const scriptGenerator = new ScriptGenerator(textGenerator, { attemptTimeoutMs: config.scriptTimeoutMs });
    const imageFetcher = new ImageFetcher(overrides.imageProvider ?? createImageProvider(config, fetchFn), fetchFn, {
        attemptTimeoutMs: config.imageTimeoutMs,
    });

    const shared = {
        scriptGenerator,
        imageFetcher,
        templateDir: config.templateDir,
        outputDir: config.outputDir,
        emptyImagePolicy: config.emptyImagePolicy,
        ...(config.defaultTheme ? { defaultTheme: config.defaultTheme } : {}),
    };

    return {
        pipeline: new PipelineOrchestrator({ ...shared, imageFetchConcurrency: config.imageFetchConcurrency }),
        tools: createToolRegistry(shared),
        outputDir: config.outputDir,
    };
}

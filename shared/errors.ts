import type { ErrorCategory } from './types';

export class ConfigurationError extends Error {
    public readonly isRetryable = false;

    constructor(message: string, public key?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class ValidationError extends Error {
    public readonly isRetryable = false;

    constructor(message: string, public problems: string[] = []) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class GenerationError extends Error {
    constructor(
        message: string,
        public code: 'TIMEOUT' | 'RATE_LIMIT' | 'INVALID_RESPONSE' | 'EMPTY_RESPONSE' | 'AUTH' | 'API_ERROR' | 'UNKNOWN',
        public isRetryable: boolean,
        public cause?: unknown
    ) {
        super(message);
        this.name = 'GenerationError';
    }
}

export class ImageFetchError extends Error {
    constructor(
        message: string,
        public code: 'RATE_LIMIT' | 'HTTP_ERROR' | 'NETWORK' | 'TIMEOUT' | 'INVALID_CONTENT' | 'TOO_LARGE' | 'UNKNOWN',
        public isRetryable: boolean,
        public status?: number,
        public retryAfterMs?: number
    ) {
        super(message);
        this.name = 'ImageFetchError';
    }
}

export class CompositionError extends Error {
    public readonly isRetryable = false;

    constructor(message: string, public templatePath?: string) {
        super(message);
        this.name = 'CompositionError';
    }
}

export class ExportError extends Error {
    public readonly isRetryable = false;

    constructor(message: string, public cause?: unknown) {
        super(message);
        this.name = 'ExportError';
    }
}

export class CancelledError extends Error {
    public readonly isRetryable = false;

    constructor(message = 'Operation cancelled') {
        super(message);
        this.name = 'CancelledError';
    }
}

/**
 * Timeout of a single attempt. Retryable: the next attempt gets a fresh budget.
 */
export class AttemptTimeoutError extends Error {
    public readonly isRetryable = true;

    constructor(public timeoutMs: number) {
        super(`Request timed out after ${timeoutMs}ms`);
        this.name = 'AttemptTimeoutError';
    }
}

export function errorCategory(error: unknown): ErrorCategory {
    if (error instanceof ValidationError) return 'validation';
    if (error instanceof ConfigurationError) return 'configuration';
    if (error instanceof GenerationError) return 'generation';
    if (error instanceof ImageFetchError) return 'image_fetch';
    if (error instanceof CompositionError) return 'composition';
    if (error instanceof ExportError) return 'export';
    if (error instanceof CancelledError) return 'cancelled';
    return 'internal';
}

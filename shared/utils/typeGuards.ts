/**
 * Type guard to check if error carries an isRetryable flag
 */
export function isRetryableError(error: unknown): error is Error & { isRetryable: boolean } {
    return error instanceof Error && 'isRetryable' in error && typeof error.isRetryable === 'boolean';
}

/**
 * HTTP status attached to an SDK or fetch error, if any
 */
export function getErrorStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('status' in error && typeof error.status === 'number') return error.status;
    if ('response' in error && typeof error.response === 'object' && error.response !== null) {
        const response = error.response;
        if ('status' in response && typeof response.status === 'number') return response.status;
    }
    return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

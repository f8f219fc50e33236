/**
 * Message of an unknown caught value. Use in catch (error: unknown) blocks.
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * "<name>[<code>]: <message>" for log lines; falls back to the bare message.
 */
export function describeError(error: unknown): string {
    if (!(error instanceof Error)) return String(error);
    const code = 'code' in error && typeof error.code === 'string' ? `[${error.code}]` : '';
    return `${error.name}${code}: ${error.message}`;
}

import { AttemptTimeoutError, CancelledError } from '../errors';
import { getErrorMessage } from './errorMessage';
import { getErrorStatus, isRetryableError } from './typeGuards';

const MAX_RETRIES = 3;
const INITIAL_DELAY_MS = 1000;
const MAX_DELAY_MS = 10000;
const ATTEMPT_TIMEOUT_MS = 60000;
const JITTER_MS = 200;

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const TRANSIENT_MESSAGES = ['network', 'timeout', 'timed out', 'econnreset', 'etimedout', 'socket hang up', 'fetch failed'];

export interface RetryOptions {
    /** Retries after the first attempt */
    retries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    /** Hard ceiling for each attempt; a timed-out attempt is retried */
    attemptTimeoutMs?: number;
    jitterMs?: number;
    signal?: AbortSignal;
    label?: string;
    isRetryable?: (error: unknown) => boolean;
}

export function isTransientError(error: unknown): boolean {
    if (error instanceof CancelledError) return false;
    if (isRetryableError(error)) return error.isRetryable;

    const status = getErrorStatus(error);
    if (status !== undefined) return RETRYABLE_STATUSES.has(status);

    const message = getErrorMessage(error).toLowerCase();
    return TRANSIENT_MESSAGES.some(fragment => message.includes(fragment));
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Runs one attempt with its own abort signal, raced against the attempt timeout.
 * The attempt signal fires when the caller cancels or the attempt times out.
 */
async function runAttempt<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number, outer?: AbortSignal): Promise<T> {
    throwIfAborted(outer);

    const controller = new AbortController();
    const onOuterAbort = () => controller.abort();
    outer?.addEventListener('abort', onOuterAbort, { once: true });

    let timeoutId: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
            controller.abort();
            reject(new AttemptTimeoutError(timeoutMs));
        }, timeoutMs);
    });
    const cancelPromise = new Promise<never>((_, reject) => {
        controller.signal.addEventListener('abort', () => {
            if (outer?.aborted) reject(new CancelledError());
        }, { once: true });
    });
    // Only one of these ever settles the race; keep the losers from surfacing as unhandled.
    timeoutPromise.catch(() => undefined);
    cancelPromise.catch(() => undefined);

    try {
        return await Promise.race([fn(controller.signal), timeoutPromise, cancelPromise]);
    } finally {
        if (timeoutId) clearTimeout(timeoutId);
        outer?.removeEventListener('abort', onOuterAbort);
    }
}

/**
 * Exponential backoff around an external call. Each call owns its counters, so
 * concurrent callers never share retry state.
 */
export async function retryWithBackoff<T>(fn: (signal: AbortSignal) => Promise<T>, options: RetryOptions = {}): Promise<T> {
    const retries = options.retries ?? MAX_RETRIES;
    const maxDelay = options.maxDelayMs ?? MAX_DELAY_MS;
    const timeoutMs = options.attemptTimeoutMs ?? ATTEMPT_TIMEOUT_MS;
    const jitter = options.jitterMs ?? JITTER_MS;
    const isRetryable = options.isRetryable ?? isTransientError;
    const label = options.label ?? 'request';

    const attempt = async (retriesLeft: number, delay: number): Promise<T> => {
        try {
            return await runAttempt(fn, timeoutMs, options.signal);
        } catch (error: unknown) {
            if (error instanceof CancelledError || options.signal?.aborted) {
                throw error instanceof CancelledError ? error : new CancelledError();
            }
            if (retriesLeft <= 0 || !isRetryable(error)) {
                throw error;
            }

            // Authoritative hint from the server wins over the backoff curve
            const hint = typeof error === 'object' && error !== null && 'retryAfterMs' in error && typeof error.retryAfterMs === 'number'
                ? error.retryAfterMs
                : undefined;
            const nextDelay = Math.min(hint ?? delay, maxDelay) + Math.random() * jitter;

            console.warn(`[RETRY] ${label} failed (${getErrorMessage(error)}). Attempts left: ${retriesLeft}. Delay: ${Math.round(nextDelay)}ms`);
            await sleep(nextDelay, options.signal);

            return attempt(retriesLeft - 1, Math.min(delay * 2, maxDelay));
        }
    };

    return attempt(retries, options.initialDelayMs ?? INITIAL_DELAY_MS);
}

// Helper to extract JSON array safely
export function extractFirstJsonArray(text: string): unknown[] {
    const cleanText = text.trim();

    // Look for the first '[' that is followed by a '{' before any closing ']'
    let firstBracket = -1;
    for (let i = 0; i < cleanText.length; i++) {
        if (cleanText[i] === '[') {
            const nextOpenBrace = cleanText.indexOf('{', i);
            const nextCloseBracket = cleanText.indexOf(']', i);

            if (nextOpenBrace !== -1 && (nextCloseBracket === -1 || nextOpenBrace < nextCloseBracket)) {
                firstBracket = i;
                break;
            }
        }
    }

    if (firstBracket === -1) {
        firstBracket = cleanText.indexOf('[');
        if (firstBracket === -1) {
            throw new Error('No JSON array found in response');
        }
    }

    // Bracket matching that ignores brackets inside strings
    let openCount = 0;
    let endIndex = -1;
    let inString = false;
    let escape = false;

    for (let i = firstBracket; i < cleanText.length; i++) {
        const char = cleanText[i];

        if (escape) {
            escape = false;
            continue;
        }
        if (char === '\\') {
            escape = true;
            continue;
        }
        if (char === '"') {
            inString = !inString;
            continue;
        }

        if (!inString) {
            if (char === '[') {
                openCount++;
            } else if (char === ']') {
                openCount--;
                if (openCount === 0) {
                    endIndex = i;
                    break;
                }
            }
        }
    }

    if (endIndex === -1) {
        throw new Error('Found start of JSON array but could not find matching end bracket');
    }

    const jsonString = cleanText.substring(firstBracket, endIndex + 1);

    let parsed: unknown;
    try {
        parsed = JSON.parse(jsonString);
    } catch {
        // Trailing commas are the usual model slip
        try {
            parsed = JSON.parse(jsonString.replace(/,\s*([\]}])/g, '$1'));
        } catch {
            console.warn('[SCRIPT] JSON extraction failed (snippet):', jsonString.substring(0, 150) + '...');
            throw new Error('Failed to parse extracted JSON array');
        }
    }

    if (!Array.isArray(parsed)) {
        throw new Error('Extracted JSON is not an array');
    }
    return parsed;
}

import { CANDIDATES_PER_IMAGE, MAX_IMAGES_PER_QUERY } from '@shared/constants';
import { AttemptTimeoutError, CancelledError, ImageFetchError, ValidationError } from '@shared/errors';
import type { ImageAsset, ImageCandidate } from '@shared/types';
import { describeError, getErrorMessage } from '@shared/utils/errorMessage';
import { retryWithBackoff, throwIfAborted } from '@shared/utils/retryLogic';
import type { FetchFn, ImageSearchProvider } from './imageSearch';

const MAX_FILE_SIZE = 5 * 1024 * 1024; // 5MB
const MAX_QUERY_LENGTH = 100;

export interface ImageFetcherOptions {
    retries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    jitterMs?: number;
    /** Per search call */
    attemptTimeoutMs?: number;
    /** Per image download */
    downloadTimeoutMs?: number;
    maxImageBytes?: number;
}

export type ImageSearchOutcome =
    | { ok: true; candidates: ImageCandidate[] }
    | { ok: false; error: ImageFetchError };

export type ImageDownloadResult =
    | { ok: true; asset: ImageAsset }
    | { ok: false; reason: string };

export interface ImageDownloadOutcome {
    assets: ImageAsset[];
    failures: string[];
}

const words = (text: string): string[] => text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

// Whole-word match, so a short topic like "AI" is not found inside "Maintaining"
function mentions(text: string, phrase: string): boolean {
    const haystack = words(text);
    const needle = words(phrase);
    if (needle.length === 0) return true;
    for (let start = 0; start + needle.length <= haystack.length; start++) {
        if (needle.every((word, offset) => haystack[start + offset] === word)) return true;
    }
    return false;
}

/**
 * Search query for a slide: its title, plus the deck topic when the title does not already mention it.
 */
export function buildImageQuery(title: string, topic: string): string {
    const cleanTitle = title.trim();
    const cleanTopic = topic.trim();
    const query = !cleanTopic || mentions(cleanTitle, cleanTopic)
        ? cleanTitle
        : `${cleanTitle} ${cleanTopic}`;
    return query.substring(0, MAX_QUERY_LENGTH).trim();
}

function toImageFetchError(error: unknown): ImageFetchError {
    if (error instanceof ImageFetchError) return error;
    const message = getErrorMessage(error);
    if (error instanceof AttemptTimeoutError) {
        return new ImageFetchError(message, 'TIMEOUT', true);
    }
    return new ImageFetchError(message, 'NETWORK', true);
}

export class ImageFetcher {
    constructor(
        private readonly provider: ImageSearchProvider,
        private readonly fetchFn: FetchFn = fetch,
        private readonly options: ImageFetcherOptions = {}
    ) {}

    /**
     * Up to `count` downloaded images for a query. Never throws for service failures:
     * an exhausted search or failed downloads yield fewer (or zero) assets.
     */
    async fetch(query: string, count: number, signal?: AbortSignal): Promise<ImageAsset[]> {
        const errors: string[] = [];
        if (typeof query !== 'string' || !query.trim()) errors.push("'query' must be a non-empty string");
        if (!Number.isInteger(count) || count < 0 || count > MAX_IMAGES_PER_QUERY) {
            errors.push(`'count' must be an integer between 0 and ${MAX_IMAGES_PER_QUERY}`);
        }
        if (errors.length > 0) {
            throw new ValidationError(`Invalid image request: ${errors.join('; ')}`, errors);
        }
        if (count === 0) return [];

        const outcome = await this.searchCandidates(query, Math.min(count * CANDIDATES_PER_IMAGE, MAX_IMAGES_PER_QUERY), signal);
        if (!outcome.ok) return [];

        const { assets } = await this.downloadFirst(outcome.candidates, count, signal);
        return assets;
    }

    async searchCandidates(query: string, limit: number, signal?: AbortSignal): Promise<ImageSearchOutcome> {
        try {
            const candidates = await retryWithBackoff(
                attemptSignal => this.provider.search(query.trim(), limit, attemptSignal),
                {
                    retries: this.options.retries ?? 3,
                    initialDelayMs: this.options.initialDelayMs,
                    maxDelayMs: this.options.maxDelayMs,
                    jitterMs: this.options.jitterMs,
                    attemptTimeoutMs: this.options.attemptTimeoutMs ?? 10000,
                    signal,
                    label: `${this.provider.name} search "${query}"`,
                }
            );
            return { ok: true, candidates };
        } catch (error: unknown) {
            if (error instanceof CancelledError) throw error;
            const failure = toImageFetchError(error);
            console.warn(`[IMAGES] Search for "${query}" failed, continuing without images: ${describeError(failure)}`);
            return { ok: false, error: failure };
        }
    }

    /**
     * Download candidates in order until `count` succeed. A failed download moves on to the next candidate.
     */
    async downloadFirst(candidates: ImageCandidate[], count: number, signal?: AbortSignal): Promise<ImageDownloadOutcome> {
        const assets: ImageAsset[] = [];
        const failures: string[] = [];
        const seen = new Set<string>();

        for (const candidate of candidates) {
            if (assets.length >= count) break;
            if (seen.has(candidate.downloadUrl)) continue;
            seen.add(candidate.downloadUrl);

            const result = await this.tryDownload(candidate, signal);
            if (result.ok) {
                assets.push(result.asset);
            } else {
                failures.push(`${candidate.downloadUrl}: ${result.reason}`);
            }
        }

        return { assets, failures };
    }

    /**
     * Like `download`, but a failed download is logged and reported instead of thrown. Cancellation still throws.
     */
    async tryDownload(candidate: ImageCandidate, signal?: AbortSignal): Promise<ImageDownloadResult> {
        try {
            return { ok: true, asset: await this.download(candidate, signal) };
        } catch (error: unknown) {
            if (error instanceof CancelledError) throw error;
            const reason = getErrorMessage(error);
            console.warn(`[IMAGES] Could not download ${candidate.downloadUrl}: ${reason}`);
            return { ok: false, reason };
        }
    }

    async download(candidate: ImageCandidate, signal?: AbortSignal): Promise<ImageAsset> {
        throwIfAborted(signal);
        const maxBytes = this.options.maxImageBytes ?? MAX_FILE_SIZE;

        const downloadFn = async (attemptSignal: AbortSignal): Promise<ImageAsset> => {
            const response = await this.fetchFn(candidate.downloadUrl, { signal: attemptSignal });
            if (!response.ok) {
                throw new ImageFetchError(`HTTP ${response.status}`, 'HTTP_ERROR', response.status >= 500 || response.status === 429, response.status);
            }

            const contentType = (response.headers.get('content-type') || '').split(';')[0].trim().toLowerCase();
            if (!contentType.startsWith('image/')) {
                throw new ImageFetchError(`Invalid content-type: ${contentType || 'none'}`, 'INVALID_CONTENT', false);
            }

            const contentLength = response.headers.get('content-length');
            if (contentLength && parseInt(contentLength, 10) > maxBytes) {
                throw new ImageFetchError(`Image too large (${contentLength} bytes)`, 'TOO_LARGE', false);
            }

            const buffer = Buffer.from(await response.arrayBuffer());
            if (buffer.length === 0) {
                throw new ImageFetchError('Empty image body', 'INVALID_CONTENT', false);
            }
            if (buffer.length > maxBytes) {
                throw new ImageFetchError(`Image too large (${buffer.length} bytes)`, 'TOO_LARGE', false);
            }

            return {
                kind: 'photo',
                sourceUrl: candidate.sourceUrl,
                reference: `${contentType};base64,${buffer.toString('base64')}`,
                attribution: candidate.attribution,
                ...(candidate.width !== undefined ? { width: candidate.width } : {}),
                ...(candidate.height !== undefined ? { height: candidate.height } : {}),
            };
        };

        return retryWithBackoff(downloadFn, {
            retries: 1,
            initialDelayMs: this.options.initialDelayMs,
            jitterMs: this.options.jitterMs,
            attemptTimeoutMs: this.options.downloadTimeoutMs ?? 15000,
            signal,
            label: `Image download ${candidate.downloadUrl}`,
        });
    }
}

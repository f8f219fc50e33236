import { ImageFetchError } from '@shared/errors';
import type { ImageCandidate, ImageProviderName } from '@shared/types';

export type FetchFn = typeof fetch;

/**
 * An external image-search service. Implementations throw ImageFetchError on HTTP failure.
 */
export interface ImageSearchProvider {
    readonly name: ImageProviderName;
    search(query: string, limit: number, signal?: AbortSignal): Promise<ImageCandidate[]>;
}

interface UnsplashPhoto {
    id?: string;
    width?: number;
    height?: number;
    alt_description?: string | null;
    urls?: { regular?: string };
    links?: { html?: string };
    user?: { name?: string };
}

interface UnsplashSearchResponse {
    results?: UnsplashPhoto[];
    total_pages?: number;
}

interface BraveImageResult {
    url?: string;
    title?: string;
    source?: string;
    thumbnail?: { src?: string };
    properties?: { url?: string; width?: number; height?: number };
}

interface BraveImageSearchResponse {
    results?: BraveImageResult[];
}

function parseRetryAfter(header: string | null): number | undefined {
    if (!header) return undefined;
    const seconds = Number(header);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Map a non-OK search response to an ImageFetchError; rate limits and 5xx are retryable.
 */
export async function toSearchError(provider: string, response: Response): Promise<ImageFetchError> {
    const text = await response.text().catch(() => '');
    const message = `${provider} API error ${response.status}${text ? `: ${text.substring(0, 200)}` : ''}`;
    if (response.status === 429) {
        return new ImageFetchError(message, 'RATE_LIMIT', true, 429, parseRetryAfter(response.headers.get('retry-after')));
    }
    const retryable = response.status === 408 || response.status >= 500;
    return new ImageFetchError(message, 'HTTP_ERROR', retryable, response.status);
}

export class UnsplashImageSearch implements ImageSearchProvider {
    readonly name = 'unsplash' as const;
    private static readonly BASE_URL = 'https://api.unsplash.com';
    // Unsplash caps per_page at 30
    private static readonly MAX_PER_PAGE = 30;

    constructor(private readonly accessKey: string, private readonly fetchFn: FetchFn = fetch, private readonly orientation = 'landscape') {}

    async search(query: string, limit: number, signal?: AbortSignal): Promise<ImageCandidate[]> {
        const perPage = Math.min(UnsplashImageSearch.MAX_PER_PAGE, limit);
        const collected: ImageCandidate[] = [];
        let page = 1;

        while (collected.length < limit) {
            const url = new URL('/search/photos', UnsplashImageSearch.BASE_URL);
            url.searchParams.set('query', query);
            url.searchParams.set('page', String(page));
            url.searchParams.set('per_page', String(perPage));
            url.searchParams.set('orientation', this.orientation);

            const response = await this.fetchFn(url.toString(), {
                headers: {
                    'Accept-Version': 'v1',
                    Authorization: `Client-ID ${this.accessKey}`,
                },
                signal,
            });
            if (!response.ok) {
                throw await toSearchError('Unsplash', response);
            }

            const data = await response.json() as UnsplashSearchResponse;
            const photos = data.results ?? [];
            if (photos.length === 0) break;

            for (const photo of photos) {
                const imageUrl = photo.urls?.regular;
                if (!imageUrl) continue;
                const author = photo.user?.name?.trim();
                collected.push({
                    sourceUrl: photo.links?.html || imageUrl,
                    downloadUrl: imageUrl,
                    attribution: author ? `Photo by ${author} on Unsplash` : 'Photo from Unsplash',
                    provider: this.name,
                    ...(typeof photo.width === 'number' ? { width: photo.width } : {}),
                    ...(typeof photo.height === 'number' ? { height: photo.height } : {}),
                });
            }

            page++;
            if (page > (data.total_pages ?? 0)) break;
        }

        return collected.slice(0, limit);
    }
}

export class BraveImageSearch implements ImageSearchProvider {
    readonly name = 'brave' as const;
    private static readonly MIN_WIDTH = 600;
    private static readonly MIN_HEIGHT = 400;

    constructor(private readonly apiKey: string, private readonly fetchFn: FetchFn = fetch) {}

    async search(query: string, limit: number, signal?: AbortSignal): Promise<ImageCandidate[]> {
        const url = new URL('https://api.search.brave.com/res/v1/images/search');
        url.searchParams.set('q', query);
        url.searchParams.set('count', String(Math.min(Math.max(limit * 2, 1), 200)));
        url.searchParams.set('safesearch', 'strict');

        const response = await this.fetchFn(url.toString(), {
            headers: { 'X-Subscription-Token': this.apiKey },
            signal,
        });
        if (!response.ok) {
            throw await toSearchError('Brave Search', response);
        }

        const data = await response.json() as BraveImageSearchResponse;

        const candidates = (data.results ?? []).flatMap((entry): ImageCandidate[] => {
            const imageUrl = entry.properties?.url;
            if (!imageUrl) return [];
            const width = entry.properties?.width;
            const height = entry.properties?.height;
            if (typeof width === 'number' && typeof height === 'number') {
                if (width < BraveImageSearch.MIN_WIDTH || height < BraveImageSearch.MIN_HEIGHT) {
                    return [];
                }
            }
            const origin = entry.source || entry.url;
            return [{
                sourceUrl: entry.url || imageUrl,
                downloadUrl: imageUrl,
                attribution: [entry.title?.trim(), origin].filter(Boolean).join(' | ') || 'Image via Brave Search',
                provider: this.name,
                ...(typeof width === 'number' ? { width } : {}),
                ...(typeof height === 'number' ? { height } : {}),
            }];
        });

        return candidates.slice(0, limit);
    }
}

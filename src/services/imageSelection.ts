import type { ImageAsset, ImageCandidate } from '@shared/types';

export type DownloadAttempt = (candidate: ImageCandidate) => Promise<ImageAsset | null>;

export function uniqueByUrl(candidates: ImageCandidate[]): ImageCandidate[] {
    const seen = new Set<string>();
    return candidates.filter(candidate => {
        if (seen.has(candidate.downloadUrl)) return false;
        seen.add(candidate.downloadUrl);
        return true;
    });
}

function freshFirst(candidates: ImageCandidate[], taken: Set<string>): ImageCandidate[] {
    const unique = uniqueByUrl(candidates);
    return [
        ...unique.filter(candidate => !taken.has(candidate.downloadUrl)),
        ...unique.filter(candidate => taken.has(candidate.downloadUrl)),
    ];
}

/**
 * Order each slide's candidates so images not yet claimed by an earlier slide come first.
 * Assumes every claimed image downloads; `selectImages` settles the real assignment.
 */
export function assignCandidates(candidateLists: ImageCandidate[][], perSlide: number): ImageCandidate[][] {
    const claimed = new Set<string>();

    return candidateLists.map(candidates => {
        const ordered = freshFirst(candidates, claimed);
        ordered.slice(0, perSlide).forEach(candidate => claimed.add(candidate.downloadUrl));
        return ordered;
    });
}

/**
 * Give each slide the first `perSlide` candidates that actually download, walking slides in index order.
 *
 * An image counts as used only once it has downloaded for an earlier slide, so a failed download
 * never pushes a slide onto another slide's image while a fresh one is left. A slide falls back to
 * a used image only when it has no fresh candidate that downloads.
 */
export async function selectImages(candidateLists: ImageCandidate[][], perSlide: number, attempt: DownloadAttempt): Promise<ImageAsset[][]> {
    const used = new Set<string>();
    const selected: ImageAsset[][] = [];

    for (const candidates of candidateLists) {
        const assets: ImageAsset[] = [];
        for (const candidate of freshFirst(candidates, used)) {
            if (assets.length >= perSlide) break;
            const asset = await attempt(candidate);
            if (!asset) continue;
            assets.push(asset);
            used.add(candidate.downloadUrl);
        }
        selected.push(assets);
    }

    return selected;
}

import { Router } from 'express';
import type { PipelineResult, SlideSpec } from '@shared/types';
import { sendError } from '../middleware/errorHandler';
import type { PipelineOrchestrator } from '../services/pipeline';
import { abortOnClientClose } from '../utils/requestSignal';

interface SlideSummary {
    index: number;
    title: string;
    bullets: string[];
    notes?: string;
    layout: SlideSpec['layout']['mode'];
    images: Array<{ kind: string; source_url: string; attribution: string }>;
}

// Image bytes stay in the deck; the response only describes them
function summarizeSlide(slide: SlideSpec): SlideSummary {
    return {
        index: slide.index,
        title: slide.title,
        bullets: slide.bullets,
        ...(slide.notes ? { notes: slide.notes } : {}),
        layout: slide.layout.mode,
        images: slide.images.map(image => ({ kind: image.kind, source_url: image.sourceUrl, attribution: image.attribution })),
    };
}

export function toResponseBody(result: Extract<PipelineResult, { status: 'success' | 'partial_success' }>) {
    return {
        status: result.status,
        artifact_path: result.artifactPath,
        download_reference: result.downloadReference,
        warnings: result.warnings,
        slides: result.slides.map(summarizeSlide),
    };
}

export function createGenerateRouter(pipeline: PipelineOrchestrator): Router {
    const router = Router();

    router.post('/generate', async (req, res, next) => {
        try {
            const signal = abortOnClientClose(res);
            const result = await pipeline.run(req.body, signal);

            if (result.status === 'failure') {
                if (signal.aborted) return;
                sendError(res, result.error.category, result.error.message, result.error.details);
                return;
            }
            res.json(toResponseBody(result));
        } catch (error) {
            next(error);
        }
    });

    return router;
}

import type { Response } from 'express';

/**
 * Signal aborted when the client goes away before the response is written.
 */
export function abortOnClientClose(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            console.warn('[SERVER] Client disconnected; cancelling run');
            controller.abort();
        }
    });
    return controller.signal;
}

import type { NextFunction, Request, Response } from 'express';
import { ValidationError, errorCategory } from '@shared/errors';
import type { ErrorCategory } from '@shared/types';
import { describeError, getErrorMessage } from '@shared/utils/errorMessage';

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
    validation: 400,
    configuration: 500,
    generation: 502,
    image_fetch: 502,
    composition: 500,
    export: 500,
    // Client closed the request
    cancelled: 499,
    internal: 500,
};

export interface ErrorBody {
    error: string;
    category: ErrorCategory;
    details?: string[];
}

export function httpStatusFor(category: ErrorCategory): number {
    return STATUS_BY_CATEGORY[category];
}

export function toErrorBody(category: ErrorCategory, message: string, details?: string[]): ErrorBody {
    return {
        // Internal messages are not echoed back
        error: category === 'internal' ? 'Internal Server Error' : message,
        category,
        ...(details && details.length > 0 ? { details } : {}),
    };
}

export function sendError(res: Response, category: ErrorCategory, message: string, details?: string[]): void {
    if (res.headersSent) return;
    res.status(httpStatusFor(category)).json(toErrorBody(category, message, details));
}

/**
 * Last middleware in the chain. Handlers pass thrown errors here through `next`.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(error);
        return;
    }

    // Body parser failures carry their own status
    if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
        sendError(res, 'validation', 'Request body is not valid JSON', [getErrorMessage(error)]);
        return;
    }

    const category = errorCategory(error);
    if (category === 'internal') {
        console.error(`[SERVER] ${req.method} ${req.path} failed:`, error);
    } else {
        console.warn(`[SERVER] ${req.method} ${req.path} -> ${describeError(error)}`);
    }
    sendError(res, category, getErrorMessage(error), error instanceof ValidationError ? error.problems : undefined);
}

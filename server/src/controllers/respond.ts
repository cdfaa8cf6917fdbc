import type { Response } from 'express';
import { HttpError, errorMessage } from '../utils/errors';

/**
 * Answer with the status an HttpError carries, or 500 with the operation name.
 */
export function sendError(res: Response, operation: string, error: unknown): void {
    if (error instanceof HttpError) {
        res.status(error.statusCode).json({ error: error.message });
        return;
    }

    console.error(`Error in ${operation}:`, error);
    res.status(500).json({ error: `${operation} failed: ${errorMessage(error)}` });
}

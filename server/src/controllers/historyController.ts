import type { Request, Response } from 'express';
import type { HistoryStore } from '../services/historyStore';
import { NotFoundError, errorMessage } from '../utils/errors';
import { sendError } from './respond';

function parseId(value: string): number | null {
    return /^\d+$/.test(value) ? Number.parseInt(value, 10) : null;
}

export class HistoryController {
    constructor(private readonly store: HistoryStore) {}

    /**
     * Get download history, newest first
     * GET /history?limit=200
     */
    getHistory = async (req: Request, res: Response): Promise<void> => {
        try {
            const limit = typeof req.query.limit === 'string' ? parseId(req.query.limit) : null;
            const items = await this.store.list(limit ?? undefined);
            res.json({ items });
        } catch (error) {
            // The history view expects an items array even when the store is down
            console.error('Error in getHistory:', error);
            res.json({ items: [], error: errorMessage(error) });
        }
    };

    /**
     * Delete a history entry; unknown ids succeed
     * DELETE /history/:id
     */
    deleteHistory = async (req: Request, res: Response): Promise<void> => {
        try {
            const id = parseId(req.params.id);
            if (id !== null) {
                await this.store.delete(id);
            }
            res.json({ ok: true });
        } catch (error) {
            sendError(res, 'Deleting history entry', error);
        }
    };

    /**
     * Get the progress of a single download
     * GET /progress/:id
     */
    getProgress = async (req: Request, res: Response): Promise<void> => {
        try {
            const id = parseId(req.params.id);
            const record = id === null ? null : await this.store.get(id);
            if (!record) {
                throw new NotFoundError('Download not found');
            }

            res.json({
                id: record.id,
                status: record.status,
                progress: record.progress,
                total_size: record.total_size,
                downloaded_size: record.downloaded_size,
                book_title: record.book_title,
                author: record.author,
                youtube_title: record.youtube_title,
                youtube_url: record.youtube_url,
            });
        } catch (error) {
            sendError(res, 'Getting download progress', error);
        }
    };

    /**
     * Drop and recreate the history table
     * POST /init-db
     */
    initDatabase = async (_req: Request, res: Response): Promise<void> => {
        try {
            await this.store.reset();
            res.json({ message: 'Database initialized successfully' });
        } catch (error) {
            sendError(res, 'Initializing database', error);
        }
    };
}

import type { Request, Response } from 'express';
import { z } from 'zod';
import type { DirectoryConfig, DirectorySettings } from '../config/directories';
import { ValidationError } from '../utils/errors';
import { sendError } from './respond';

const configBodySchema = z.object({
    books_dir: z.string().trim().min(1).optional(),
    download_dir: z.string().trim().min(1).optional(),
});

function toResponse(config: DirectoryConfig) {
    return {
        books_dir: config.booksDir,
        download_dir: config.downloadDir,
    };
}

export class ConfigController {
    constructor(private readonly settings: DirectorySettings) {}

    /**
     * Get the current books and download directories
     * GET /config
     */
    getConfig = (_req: Request, res: Response): void => {
        res.json(toResponse(this.settings.current()));
    };

    /**
     * Change the books and/or download directory, creating them if needed
     * POST /config
     */
    setConfig = async (req: Request, res: Response): Promise<void> => {
        try {
            const parsed = configBodySchema.safeParse(req.body ?? {});
            if (!parsed.success) {
                throw new ValidationError('books_dir and download_dir must be non-empty strings');
            }

            const updated = await this.settings.update({
                booksDir: parsed.data.books_dir,
                downloadDir: parsed.data.download_dir,
            });

            res.json({ ok: true, ...toResponse(updated) });
        } catch (error) {
            sendError(res, 'Updating configuration', error);
        }
    };
}

import type { Request, Response } from 'express';
import type { DirectorySettings } from '../config/directories';
import type { BookScannerService } from '../services/bookScannerService';
import { sendError } from './respond';

export class BooksController {
    constructor(
        private readonly scanner: BookScannerService,
        private readonly settings: DirectorySettings
    ) {}

    /**
     * List book files and folders in the configured books directory
     * GET /books
     */
    getBooks = async (_req: Request, res: Response): Promise<void> => {
        try {
            const books = await this.scanner.scanBooks(this.settings.current().booksDir);
            res.json({ books });
        } catch (error) {
            sendError(res, 'Scanning book files and folders', error);
        }
    };
}

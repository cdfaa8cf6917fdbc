import { Router } from 'express';
import type { DownloadController } from '../controllers/downloadController';
import type { HistoryController } from '../controllers/historyController';
import type { SearchController } from '../controllers/searchController';

export function createDownloadRoutes(
    search: SearchController,
    download: DownloadController,
    history: HistoryController
): Router {
    const router = Router();

    // Search YouTube for a book
    router.post('/search', search.search);

    // Start a background download
    router.post('/download', download.startDownload);

    // Poll a single download
    router.get('/progress/:id', history.getProgress);

    // Download history
    router.get('/history', history.getHistory);
    router.delete('/history/:id', history.deleteHistory);

    // Recreate the history table
    router.post('/init-db', history.initDatabase);

    return router;
}

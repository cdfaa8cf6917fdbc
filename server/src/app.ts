import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import type { DirectorySettings } from './config/directories';
import { BooksController } from './controllers/booksController';
import { ConfigController } from './controllers/configController';
import { DownloadController } from './controllers/downloadController';
import { HistoryController } from './controllers/historyController';
import { SearchController } from './controllers/searchController';
import { createBookRoutes } from './routes/bookRoutes';
import { createDownloadRoutes } from './routes/downloadRoutes';
import type { BookScannerService } from './services/bookScannerService';
import type { DownloadService } from './services/downloadService';
import type { HistoryStore } from './services/historyStore';
import type { SearchService } from './services/searchService';
import { errorMessage } from './utils/errors';

export interface AppDependencies {
    settings: DirectorySettings;
    historyStore: HistoryStore;
    scanner: BookScannerService;
    searchService: SearchService;
    downloadService: DownloadService;
}

export function createApp(deps: AppDependencies): Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Basic route
    app.get('/', (_req: Request, res: Response) => {
        res.json({ message: 'Audiobook Finder API is running' });
    });

    // Health check route - tests database connection
    app.get('/health', async (_req: Request, res: Response) => {
        try {
            await deps.historyStore.ping();
            res.json({ ok: true, database: 'connected' });
        } catch (error) {
            res.status(500).json({
                ok: false,
                database: 'disconnected',
                error: errorMessage(error),
            });
        }
    });

    app.use(
        createBookRoutes(
            new BooksController(deps.scanner, deps.settings),
            new ConfigController(deps.settings)
        )
    );
    app.use(
        createDownloadRoutes(
            new SearchController(deps.searchService),
            new DownloadController(deps.downloadService),
            new HistoryController(deps.historyStore)
        )
    );

    return app;
}

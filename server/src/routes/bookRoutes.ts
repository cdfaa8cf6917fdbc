import { Router } from 'express';
import type { BooksController } from '../controllers/booksController';
import type { ConfigController } from '../controllers/configController';

export function createBookRoutes(books: BooksController, config: ConfigController): Router {
    const router = Router();

    // Current books/download directories
    router.get('/config', config.getConfig);
    router.post('/config', config.setConfig);

    // Scan the books directory
    router.get('/books', books.getBooks);

    return router;
}

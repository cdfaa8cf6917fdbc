import type { Request, Response } from 'express';
import { z } from 'zod';
import { DEFAULT_MAX_RESULTS, type SearchService } from '../services/searchService';
import { ValidationError } from '../utils/errors';
import { sendError } from './respond';

const searchBodySchema = z.object({
    query: z.string().default(''),
    maxResults: z.number().int().positive().default(DEFAULT_MAX_RESULTS),
});

export class SearchController {
    constructor(private readonly searchService: SearchService) {}

    /**
     * Search YouTube for audiobooks matching a query
     * POST /search
     */
    search = async (req: Request, res: Response): Promise<void> => {
        try {
            const parsed = searchBodySchema.safeParse(req.body ?? {});
            if (!parsed.success) {
                throw new ValidationError('query must be a string and maxResults a positive integer');
            }

            const { query, maxResults } = parsed.data;
            console.log(`Searching YouTube for: '${query}'`);

            const results = await this.searchService.searchAudiobooks(query, maxResults);
            console.log(`Found ${results.length} results for: '${query}'`);

            res.json({ results, query });
        } catch (error) {
            sendError(res, 'YouTube search', error);
        }
    };
}

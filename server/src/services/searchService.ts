import { NOT_AVAILABLE, type RawSearchResult, type SearchResult } from '../models/SearchResult';
import type { SearchProvider } from './youtubeSearchProvider';

export const DEFAULT_MAX_RESULTS = 10;

export function toSearchResult(raw: RawSearchResult): SearchResult {
    return {
        id: raw.id,
        title: raw.title,
        channel: raw.channel,
        duration: raw.duration ?? NOT_AVAILABLE,
        publish_time: raw.publish_time ?? NOT_AVAILABLE,
        view_count: raw.view_count ?? NOT_AVAILABLE,
        url: `https://www.youtube.com/watch?v=${raw.id}`,
        thumbnail: `https://i.ytimg.com/vi/${raw.id}/hqdefault.jpg`,
    };
}

export class SearchService {
    constructor(private readonly provider: SearchProvider) {}

    /**
     * Search for audiobook videos. Provider failures are logged and
     * reported as an empty result list.
     */
    async searchAudiobooks(query: string, maxResults: number = DEFAULT_MAX_RESULTS): Promise<SearchResult[]> {
        try {
            const results = await this.provider.search(query, maxResults);
            return results.map(toSearchResult);
        } catch (error) {
            console.error(`Error searching YouTube for '${query}':`, error);
            return [];
        }
    }
}

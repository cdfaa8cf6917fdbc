import axios from 'axios';
import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { RawSearchResult } from '../models/SearchResult';

export interface SearchProvider {
    search(query: string, maxResults: number): Promise<RawSearchResult[]>;
}

const RESULTS_URL = 'https://www.youtube.com/results';
const INITIAL_DATA_MARKER = 'ytInitialData';
const USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const runsSchema = z.object({
    runs: z.array(z.object({ text: z.string() })).min(1),
});

const simpleTextSchema = z.object({ simpleText: z.string() });

const videoRendererSchema = z.object({
    videoId: z.string().min(1),
    title: runsSchema,
    longBylineText: runsSchema.optional(),
    ownerText: runsSchema.optional(),
    lengthText: simpleTextSchema.optional(),
    publishedTimeText: simpleTextSchema.optional(),
    viewCountText: simpleTextSchema.optional(),
});

type VideoRenderer = z.infer<typeof videoRendererSchema>;

/**
 * Cut the JSON object literal assigned to `ytInitialData` out of a script body.
 */
export function extractInitialDataJson(source: string): string | null {
    const markerIndex = source.indexOf(INITIAL_DATA_MARKER);
    if (markerIndex === -1) return null;

    const start = source.indexOf('{', markerIndex);
    if (start === -1) return null;

    // Match braces outside string literals; titles may contain `{`, `}` or `};`
    let depth = 0;
    let inString = false;
    for (let i = start; i < source.length; i++) {
        const char = source[i];
        if (inString) {
            if (char === '\\') i++;
            else if (char === '"') inString = false;
        } else if (char === '"') {
            inString = true;
        } else if (char === '{') {
            depth++;
        } else if (char === '}') {
            depth--;
            if (depth === 0) return source.slice(start, i + 1);
        }
    }

    return null;
}

function collectVideoRenderers(node: unknown, found: unknown[]): void {
    if (Array.isArray(node)) {
        for (const child of node) {
            collectVideoRenderers(child, found);
        }
        return;
    }
    if (typeof node !== 'object' || node === null) return;

    const entries: Array<[string, unknown]> = Object.entries(node);
    for (const [key, value] of entries) {
        if (key === 'videoRenderer') {
            found.push(value);
        } else {
            collectVideoRenderers(value, found);
        }
    }
}

function toRawResult(renderer: VideoRenderer): RawSearchResult {
    const byline = renderer.longBylineText ?? renderer.ownerText;
    return {
        id: renderer.videoId,
        title: renderer.title.runs.map((run) => run.text).join(''),
        channel: byline ? byline.runs[0].text : '',
        duration: renderer.lengthText?.simpleText,
        publish_time: renderer.publishedTimeText?.simpleText,
        view_count: renderer.viewCountText?.simpleText,
    };
}

/**
 * Parse video results out of a YouTube results page, in page order.
 */
export function parseSearchResults(html: string, maxResults: number): RawSearchResult[] {
    const $ = cheerio.load(html);
    let json: string | null = null;

    for (const element of $('script').toArray()) {
        const body = $(element).text();
        if (body.includes(INITIAL_DATA_MARKER)) {
            json = extractInitialDataJson(body);
            break;
        }
    }

    // Fall back to the raw page when the data is not inside a script element
    const payload = json ?? extractInitialDataJson(html);
    if (payload === null) {
        throw new Error('Search results page did not contain ytInitialData');
    }

    const data: unknown = JSON.parse(payload);
    const renderers: unknown[] = [];
    collectVideoRenderers(data, renderers);

    const results: RawSearchResult[] = [];
    for (const candidate of renderers) {
        const parsed = videoRendererSchema.safeParse(candidate);
        if (parsed.success) {
            results.push(toRawResult(parsed.data));
        }
        if (results.length >= maxResults) break;
    }

    return results;
}

export class YoutubeSearchProvider implements SearchProvider {
    constructor(private readonly timeoutMs: number = 15000) {}

    async search(query: string, maxResults: number): Promise<RawSearchResult[]> {
        const response = await axios.get<string>(RESULTS_URL, {
            params: { search_query: query, hl: 'en' },
            timeout: this.timeoutMs,
            responseType: 'text',
            headers: {
                'User-Agent': USER_AGENT,
                'Accept-Language': 'en-US,en;q=0.9',
            },
        });

        return parseSearchResults(response.data, maxResults);
    }
}

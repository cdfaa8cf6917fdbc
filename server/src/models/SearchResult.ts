// Substituted for optional provider fields that are absent
export const NOT_AVAILABLE = 'N/A';

export interface RawSearchResult {
    id: string;
    title: string;
    channel: string;
    duration?: string;
    publish_time?: string;
    view_count?: string;
}

export interface SearchResult {
    id: string;
    title: string;
    channel: string;
    duration: string;
    publish_time: string;
    view_count: string;
    url: string;
    thumbnail: string;
}

export type DownloadStatus = 'pending' | 'downloading' | 'completed' | 'failed';

export interface HistoryRecord {
    id: number;
    book_title: string;
    author: string;
    youtube_title: string;
    youtube_url: string;
    download_path: string;
    added_at: string;
    status: DownloadStatus;
    progress: number;
    total_size: number;
    downloaded_size: number;
}

// Fields supplied by the caller; id and added_at are assigned by the store
export type NewHistoryRecord = Omit<HistoryRecord, 'id' | 'added_at'>;

export type HistoryUpdate = Partial<Omit<HistoryRecord, 'id' | 'added_at'>>;

export const DEFAULT_HISTORY_LIMIT = 200;

const TRANSITIONS: Record<DownloadStatus, readonly DownloadStatus[]> = {
    pending: ['downloading', 'failed'],
    downloading: ['completed', 'failed'],
    completed: [],
    failed: [],
};

export function canTransition(from: DownloadStatus, to: DownloadStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

/**
 * UTC timestamp in the `YYYY-MM-DD HH:MM:SS` form stored in `added_at`.
 */
export function formatTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}

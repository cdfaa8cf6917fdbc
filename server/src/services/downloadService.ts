import path from 'path';
import { z } from 'zod';
import type { DirectoryConfig } from '../config/directories';
import { canTransition, type DownloadStatus, type HistoryUpdate } from '../models/HistoryRecord';
import { ValidationError, errorMessage } from '../utils/errors';
import type { HistoryStore } from './historyStore';
import type { AudioDownloader, DownloadProgressEvent } from './ytDlpService';

export interface DownloadRequest {
    book_title: string;
    author: string;
    youtube_url: string;
    youtube_title: string;
}

export interface StartedDownload {
    downloadId: number;
    /** Settles once the record reaches a terminal status; never rejects. */
    completion: Promise<void>;
}

export type ProgressSnapshot = Required<Pick<HistoryUpdate, 'progress' | 'total_size' | 'downloaded_size'>>;

const downloadBodySchema = z.object({
    book_title: z.string().nullish(),
    author: z.string().nullish(),
    youtube_url: z.string().nullish(),
    youtube_title: z.string().nullish(),
});

const REQUIRED_FIELDS = ['book_title', 'youtube_url', 'youtube_title'] as const;

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

function isBlank(value: string | null | undefined): boolean {
    return !value || value.trim() === '';
}

/**
 * Validate a download request body. Author may be blank; the other fields
 * must be present and contain more than whitespace.
 */
export function parseDownloadRequest(body: unknown): DownloadRequest {
    if (typeof body !== 'object' || body === null) {
        throw new ValidationError('No JSON data provided');
    }

    const parsed = downloadBodySchema.safeParse(body);
    if (!parsed.success) {
        const field = parsed.error.issues[0]?.path.join('.') ?? 'body';
        throw new ValidationError(`Invalid value for field: ${field}`);
    }

    const data = parsed.data;
    for (const field of REQUIRED_FIELDS) {
        if (isBlank(data[field])) {
            throw new ValidationError(`Missing required field: ${field}`);
        }
    }

    return {
        book_title: data.book_title ?? '',
        author: data.author ?? '',
        youtube_url: data.youtube_url ?? '',
        youtube_title: data.youtube_title ?? '',
    };
}

export function displayAuthor(author: string): string {
    return isBlank(author) ? 'Unknown' : author;
}

export function sanitizeFilename(name: string): string {
    return name.replace(UNSAFE_FILENAME_CHARS, '_');
}

export function buildOutputPath(downloadDir: string, request: DownloadRequest): string {
    const name = sanitizeFilename(
        `${displayAuthor(request.author)} - ${request.book_title} - ${request.youtube_title}`
    );
    return path.join(downloadDir, `${name}.mp3`);
}

/**
 * Map a tool progress event onto the record's progress fields. Without a
 * known or estimated total the percentage is 0 but the byte count is kept.
 */
export function toProgressSnapshot(event: DownloadProgressEvent): ProgressSnapshot {
    const downloaded = Math.round(event.downloaded_bytes ?? 0);

    for (const total of [event.total_bytes, event.total_bytes_estimate]) {
        if (total !== undefined && total > 0) {
            return {
                progress: ((event.downloaded_bytes ?? 0) / total) * 100,
                total_size: Math.round(total),
                downloaded_size: downloaded,
            };
        }
    }

    return { progress: 0, total_size: 0, downloaded_size: downloaded };
}

/**
 * Starts background download jobs and keeps their history records current.
 *
 * Each job owns exactly one record and is the only writer to it. Progress
 * writes are chained so one write per record is in flight at a time, and the
 * chain is drained before the terminal status is written, so a late progress
 * update cannot overwrite `completed` or `failed`. There is no queue and no
 * cancellation: every started job runs until the tool returns.
 */
export class DownloadService {
    constructor(
        private readonly store: HistoryStore,
        private readonly downloader: AudioDownloader,
        private readonly directories: () => DirectoryConfig
    ) {}

    async startDownload(request: DownloadRequest): Promise<StartedDownload> {
        const outputPath = buildOutputPath(this.directories().downloadDir, request);
        console.log(`Starting download: ${request.book_title} by ${displayAuthor(request.author)} from ${request.youtube_url}`);

        const downloadId = await this.store.create({
            book_title: request.book_title,
            author: request.author,
            youtube_title: request.youtube_title,
            youtube_url: request.youtube_url,
            download_path: outputPath,
            status: 'pending',
            progress: 0,
            total_size: 0,
            downloaded_size: 0,
        });
        console.log(`Added download to history with ID: ${downloadId}`);

        const completion = this.runJob(downloadId, request, outputPath).catch((error: unknown) => {
            console.error(`Unhandled error in download job ${downloadId}:`, error);
        });

        return { downloadId, completion };
    }

    private async runJob(id: number, request: DownloadRequest, outputPath: string): Promise<void> {
        let status: DownloadStatus = 'pending';
        let acceptingProgress = false;
        let progressError: unknown;
        let writes: Promise<void> = Promise.resolve();

        const transition = async (next: DownloadStatus, fields: HistoryUpdate): Promise<void> => {
            if (!canTransition(status, next)) {
                throw new Error(`Invalid status transition for download ${id}: ${status} -> ${next}`);
            }
            await this.store.update(id, { ...fields, status: next });
            status = next;
        };

        const onProgress = (event: DownloadProgressEvent): void => {
            if (!acceptingProgress || event.status !== 'downloading') return;
            const snapshot = toProgressSnapshot(event);
            writes = writes
                .then(() => (progressError === undefined ? this.store.update(id, snapshot) : undefined))
                .catch((error: unknown) => {
                    console.error(`Error updating progress for download ${id}:`, error);
                    progressError = error;
                });
        };

        try {
            await transition('downloading', {
                download_path: outputPath,
                progress: 0,
                total_size: 0,
                downloaded_size: 0,
            });

            acceptingProgress = true;
            const success = await this.downloader.downloadAudio(
                {
                    url: request.youtube_url,
                    outputPath,
                    title: `${request.book_title} by ${displayAuthor(request.author)}`,
                },
                onProgress
            );
            acceptingProgress = false;
            await writes;

            if (progressError !== undefined) {
                throw progressError;
            }

            if (success) {
                await transition('completed', { progress: 100 });
            } else {
                await transition('failed', {});
            }
        } catch (error) {
            acceptingProgress = false;
            await writes;
            console.error(`Error in async download for ${request.youtube_url}:`, errorMessage(error));
            await this.markFailed(id, status);
        }
    }

    private async markFailed(id: number, status: DownloadStatus): Promise<void> {
        if (!canTransition(status, 'failed')) return;
        try {
            await this.store.update(id, { status: 'failed', progress: 0 });
        } catch (error) {
            console.error(`Error marking download ${id} as failed:`, error);
        }
    }
}

import type { QueryResult, QueryResultRow } from 'pg';
import {
    DEFAULT_HISTORY_LIMIT,
    formatTimestamp,
    type DownloadStatus,
    type HistoryRecord,
    type HistoryUpdate,
    type NewHistoryRecord,
} from '../models/HistoryRecord';

/**
 * CRUD and ordered listing over download history records. The job runner and
 * the read endpoints only ever reach records through this interface.
 */
export interface HistoryStore {
    initialize(): Promise<void>;
    reset(): Promise<void>;
    ping(): Promise<void>;
    create(record: NewHistoryRecord): Promise<number>;
    get(id: number): Promise<HistoryRecord | null>;
    /** Merge fields into an existing record; unknown ids are ignored. */
    update(id: number, fields: HistoryUpdate): Promise<void>;
    /** Remove a record if present; unknown ids are ignored. */
    delete(id: number): Promise<void>;
    /** Newest id first, never more than `limit` records. */
    list(limit?: number): Promise<HistoryRecord[]>;
}

/** The part of a `pg` Pool or PoolClient the store needs. */
export interface Queryable {
    query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

interface HistoryRow {
    id: number;
    book_title: string | null;
    author: string | null;
    youtube_title: string | null;
    youtube_url: string | null;
    download_path: string | null;
    added_at: string | null;
    status: string | null;
    progress: number | null;
    // BIGINT columns arrive as strings
    total_size: string | number | null;
    downloaded_size: string | number | null;
}

const CREATE_TABLE_SQL = `CREATE TABLE IF NOT EXISTS history (
    id SERIAL PRIMARY KEY,
    book_title VARCHAR(500),
    author VARCHAR(500),
    youtube_title VARCHAR(500),
    youtube_url VARCHAR(500),
    download_path VARCHAR(1000),
    added_at VARCHAR(50),
    status VARCHAR(20) DEFAULT 'pending',
    progress DOUBLE PRECISION DEFAULT 0,
    total_size BIGINT DEFAULT 0,
    downloaded_size BIGINT DEFAULT 0
)`;

const UPDATABLE_COLUMNS = [
    'book_title',
    'author',
    'youtube_title',
    'youtube_url',
    'download_path',
    'status',
    'progress',
    'total_size',
    'downloaded_size',
] as const satisfies ReadonlyArray<keyof HistoryUpdate>;

const STATUSES: readonly DownloadStatus[] = ['pending', 'downloading', 'completed', 'failed'];

function toStatus(value: string | null): DownloadStatus {
    return STATUSES.find((status) => status === value) ?? 'pending';
}

function toRecord(row: HistoryRow): HistoryRecord {
    return {
        id: row.id,
        book_title: row.book_title ?? '',
        author: row.author ?? '',
        youtube_title: row.youtube_title ?? '',
        youtube_url: row.youtube_url ?? '',
        download_path: row.download_path ?? '',
        added_at: row.added_at ?? '',
        status: toStatus(row.status),
        progress: row.progress ?? 0,
        total_size: Number(row.total_size ?? 0),
        downloaded_size: Number(row.downloaded_size ?? 0),
    };
}

export function clampLimit(limit: number | undefined): number {
    if (limit === undefined || !Number.isInteger(limit) || limit <= 0) {
        return DEFAULT_HISTORY_LIMIT;
    }
    return Math.min(limit, DEFAULT_HISTORY_LIMIT);
}

export class PgHistoryStore implements HistoryStore {
    constructor(private readonly db: Queryable) {}

    async initialize(): Promise<void> {
        try {
            await this.db.query(CREATE_TABLE_SQL);
            console.log('✅ History table ready');
        } catch (error) {
            console.error('Error creating history table:', error);
            throw error;
        }
    }

    async reset(): Promise<void> {
        try {
            await this.db.query('DROP TABLE IF EXISTS history');
            await this.db.query(CREATE_TABLE_SQL);
            console.log('✅ History table recreated');
        } catch (error) {
            console.error('Error recreating history table:', error);
            throw error;
        }
    }

    async ping(): Promise<void> {
        await this.db.query('SELECT 1');
    }

    async create(record: NewHistoryRecord): Promise<number> {
        const result = await this.db.query<{ id: number }>(
            `INSERT INTO history
         (book_title, author, youtube_title, youtube_url, download_path, added_at,
          status, progress, total_size, downloaded_size)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING id`,
            [
                record.book_title,
                record.author,
                record.youtube_title,
                record.youtube_url,
                record.download_path,
                formatTimestamp(new Date()),
                record.status,
                record.progress,
                record.total_size,
                record.downloaded_size,
            ]
        );
        return result.rows[0].id;
    }

    async get(id: number): Promise<HistoryRecord | null> {
        const result = await this.db.query<HistoryRow>('SELECT * FROM history WHERE id = $1', [id]);
        return result.rows.length > 0 ? toRecord(result.rows[0]) : null;
    }

    async update(id: number, fields: HistoryUpdate): Promise<void> {
        const updates: string[] = [];
        const values: unknown[] = [];
        let paramCount = 1;

        for (const column of UPDATABLE_COLUMNS) {
            const value = fields[column];
            if (value !== undefined) {
                updates.push(`${column} = $${paramCount++}`);
                values.push(value);
            }
        }

        if (updates.length === 0) return;

        values.push(id);

        await this.db.query(
            `UPDATE history SET ${updates.join(', ')} WHERE id = $${paramCount}`,
            values
        );
    }

    async delete(id: number): Promise<void> {
        await this.db.query('DELETE FROM history WHERE id = $1', [id]);
    }

    async list(limit?: number): Promise<HistoryRecord[]> {
        const result = await this.db.query<HistoryRow>(
            'SELECT * FROM history ORDER BY id DESC LIMIT $1',
            [clampLimit(limit)]
        );
        return result.rows.map(toRecord);
    }
}

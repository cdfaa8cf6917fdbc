import { mkdir, stat } from 'fs/promises';
import { ValidationError, errorMessage } from '../utils/errors';

export interface DirectoryConfig {
    readonly booksDir: string;
    readonly downloadDir: string;
}

async function ensureDirectory(dir: string, label: string): Promise<void> {
    try {
        await mkdir(dir, { recursive: true });
        const info = await stat(dir);
        if (info.isDirectory()) {
            return;
        }
    } catch (error) {
        console.warn(`Could not create ${label.toLowerCase()} directory ${dir}: ${errorMessage(error)}`);
    }

    throw new ValidationError(`${label} directory does not exist and could not be created: ${dir}`);
}

/**
 * Current books and download directories. Readers take a snapshot per call;
 * an update replaces the snapshot only after both paths exist.
 */
export class DirectorySettings {
    private snapshot: DirectoryConfig;

    constructor(initial: DirectoryConfig) {
        this.snapshot = Object.freeze({ ...initial });
    }

    current(): DirectoryConfig {
        return this.snapshot;
    }

    async ensureDownloadDir(): Promise<void> {
        await ensureDirectory(this.snapshot.downloadDir, 'Download');
    }

    async update(changes: Partial<DirectoryConfig>): Promise<DirectoryConfig> {
        const next: DirectoryConfig = Object.freeze({
            booksDir: changes.booksDir ?? this.snapshot.booksDir,
            downloadDir: changes.downloadDir ?? this.snapshot.downloadDir,
        });

        await ensureDirectory(next.booksDir, 'Books');
        await ensureDirectory(next.downloadDir, 'Download');

        this.snapshot = next;
        console.log(`Updated directories - books: ${next.booksDir}, downloads: ${next.downloadDir}`);
        return next;
    }
}

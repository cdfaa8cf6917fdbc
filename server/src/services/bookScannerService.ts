import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import type { BookItem, BookItemType } from '../models/BookItem';
import { hasErrorCode } from '../utils/errors';
import { buildSearchQuery, parseAuthorTitle } from '../utils/titleParser';

// stat failures that mean the link does not lead to a usable entry
const UNREACHABLE_LINK_CODES = ['ENOENT', 'ENOTDIR', 'ELOOP', 'EBADF'];

export const BOOK_EXTENSIONS: ReadonlySet<string> = new Set([
    '.pdf', '.epub', '.mobi', '.azw', '.azw3', '.djvu', '.fb2', '.html',
    '.lit', '.lrf', '.odt', '.prc', '.rb', '.rtf', '.txt',
]);

class BookScannerService {
    /**
     * List book folders and recognised book files in a directory.
     * A missing directory yields an empty list.
     */
    async scanBooks(booksDir: string): Promise<BookItem[]> {
        let entries: Dirent[];
        try {
            entries = await readdir(booksDir, { withFileTypes: true });
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                console.warn(`Books directory does not exist: ${booksDir}`);
                return [];
            }
            throw error;
        }

        const items: BookItem[] = [];

        for (const entry of entries) {
            const fullPath = path.resolve(booksDir, entry.name);
            const kind = await this.classify(entry, fullPath);

            if (kind === 'folder') {
                items.push(this.toBookItem(entry.name, entry.name, fullPath, 'folder'));
                continue;
            }

            const extension = path.extname(entry.name);
            if (kind === 'file' && BOOK_EXTENSIONS.has(extension.toLowerCase())) {
                const stem = path.basename(entry.name, extension);
                items.push(this.toBookItem(entry.name, stem, fullPath, 'file'));
            }
        }

        return items;
    }

    private async classify(entry: Dirent, fullPath: string): Promise<BookItemType | null> {
        if (entry.isDirectory()) return 'folder';
        if (entry.isFile()) return 'file';
        if (!entry.isSymbolicLink()) return null;

        try {
            const target = await stat(fullPath);
            if (target.isDirectory()) return 'folder';
            return target.isFile() ? 'file' : null;
        } catch (error) {
            if (UNREACHABLE_LINK_CODES.some((code) => hasErrorCode(error, code))) {
                return null;
            }
            throw error;
        }
    }

    private toBookItem(itemName: string, parsedName: string, fullPath: string, type: BookItemType): BookItem {
        const parsed = parseAuthorTitle(parsedName);
        return {
            item_name: itemName,
            full_path: fullPath,
            author: parsed.author,
            title: parsed.title,
            search_query: buildSearchQuery(parsed),
            type,
        };
    }
}

export { BookScannerService };

export default new BookScannerService();

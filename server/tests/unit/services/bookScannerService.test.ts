/**
 * Directory scanner tests
 * Uses a real temporary directory per test
 */

import { mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BookScannerService } from '../../../src/services/bookScannerService';

describe('BookScannerService', () => {
    const scanner = new BookScannerService();
    let booksDir: string;

    beforeEach(async () => {
        booksDir = await mkdtemp(path.join(os.tmpdir(), 'books-'));
    });

    afterEach(async () => {
        await rm(booksDir, { recursive: true, force: true });
    });

    const byName = (name: string) => (item: { item_name: string }) => item.item_name === name;

    it('returns an empty list and warns when the directory is missing', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const missing = path.join(booksDir, 'does-not-exist');

        await expect(scanner.scanBooks(missing)).resolves.toEqual([]);
        expect(warn).toHaveBeenCalledWith(`Books directory does not exist: ${missing}`);
    });

    it('parses folder names into author and title', async () => {
        await mkdir(path.join(booksDir, 'Tolkien - The Hobbit'));

        const items = await scanner.scanBooks(booksDir);

        expect(items).toEqual([
            {
                item_name: 'Tolkien - The Hobbit',
                full_path: path.join(booksDir, 'Tolkien - The Hobbit'),
                author: 'Tolkien',
                title: 'The Hobbit',
                search_query: 'The Hobbit Tolkien',
                type: 'folder',
            },
        ]);
    });

    it('parses file names without their extension', async () => {
        await writeFile(path.join(booksDir, 'Dune by Frank Herbert.EPUB'), '');

        const [item] = await scanner.scanBooks(booksDir);

        expect(item).toEqual({
            item_name: 'Dune by Frank Herbert.EPUB',
            full_path: path.join(booksDir, 'Dune by Frank Herbert.EPUB'),
            author: 'Frank Herbert',
            title: 'Dune',
            search_query: 'Dune Frank Herbert',
            type: 'file',
        });
    });

    it('includes only recognised book extensions', async () => {
        await writeFile(path.join(booksDir, 'notes.pdf'), '');
        await writeFile(path.join(booksDir, 'notes.docx'), '');
        await writeFile(path.join(booksDir, 'cover.jpg'), '');
        await writeFile(path.join(booksDir, 'README'), '');

        const items = await scanner.scanBooks(booksDir);

        expect(items.map((item) => item.item_name)).toEqual(['notes.pdf']);
        expect(items[0]).toMatchObject({ author: '', title: 'notes', search_query: 'notes' });
    });

    it('lists folders and files together', async () => {
        await mkdir(path.join(booksDir, 'Asimov - Foundation'));
        await writeFile(path.join(booksDir, 'Herbert - Dune.mobi'), '');

        const items = await scanner.scanBooks(booksDir);

        expect(items).toHaveLength(2);
        expect(items.find(byName('Asimov - Foundation'))?.type).toBe('folder');
        expect(items.find(byName('Herbert - Dune.mobi'))?.type).toBe('file');
    });

    it('follows symbolic links and skips dangling ones', async () => {
        const target = path.join(booksDir, 'target');
        await mkdir(target);
        await writeFile(path.join(target, 'Orwell - 1984.txt'), '');
        const library = path.join(booksDir, 'library');
        await mkdir(library);
        await symlink(path.join(target, 'Orwell - 1984.txt'), path.join(library, 'Orwell - 1984.txt'));
        await symlink(path.join(target, 'gone.pdf'), path.join(library, 'gone.pdf'));

        const items = await scanner.scanBooks(library);

        expect(items).toHaveLength(1);
        expect(items[0]).toMatchObject({ author: 'Orwell', title: '1984', type: 'file' });
    });

    it('skips looping links and links through a file', async () => {
        await mkdir(path.join(booksDir, 'Tolkien - The Hobbit'));
        await writeFile(path.join(booksDir, 'plain.txt'), '');
        await symlink(path.join(booksDir, 'loop.pdf'), path.join(booksDir, 'loop.pdf'));
        await symlink(path.join(booksDir, 'plain.txt', 'inner.pdf'), path.join(booksDir, 'through.pdf'));

        const items = await scanner.scanBooks(booksDir);

        expect(items.map((item) => item.item_name).sort()).toEqual(['Tolkien - The Hobbit', 'plain.txt']);
    });
});

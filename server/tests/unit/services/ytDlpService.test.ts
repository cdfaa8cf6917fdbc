/**
 * yt-dlp adapter tests
 * The child process is replaced by an EventEmitter with PassThrough stdio
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { describe, expect, it, vi } from 'vitest';
import {
    YtDlpService,
    buildYtDlpArgs,
    parseProgressLine,
    toOutputTemplate,
    type DownloadProgressEvent,
} from '../../../src/services/ytDlpService';

class FakeProcess extends EventEmitter {
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
    readonly kill = vi.fn((_signal?: NodeJS.Signals) => true);

    /** Write stdout lines, close the streams, then report the exit code. */
    finish(lines: string[], code: number | null, stderr: string[] = []): void {
        this.stdout.end(lines.map((line) => `${line}\n`).join(''));
        this.stderr.end(stderr.map((line) => `${line}\n`).join(''));
        setTimeout(() => this.emit('close', code), 20);
    }
}

function serviceWith(child: FakeProcess) {
    const spawnProcess = vi.fn((_command: string, _args: string[]) => child);
    const service = new YtDlpService({ binaryPath: '/opt/yt-dlp', spawnProcess });
    return { service, spawnProcess };
}

const request = {
    url: 'https://www.youtube.com/watch?v=abc123',
    outputPath: '/downloads/Tolkien - The Hobbit - Full.mp3',
    title: 'The Hobbit by Tolkien',
};

describe('parseProgressLine', () => {
    it('reads downloaded and total bytes', () => {
        expect(parseProgressLine('__progress__ downloading|50|200|NA')).toEqual({
            status: 'downloading',
            downloaded_bytes: 50,
            total_bytes: 200,
            total_bytes_estimate: undefined,
        });
    });

    it('reads a fractional estimate', () => {
        expect(parseProgressLine('__progress__ downloading|1024|NA|4096.5')).toEqual({
            status: 'downloading',
            downloaded_bytes: 1024,
            total_bytes: undefined,
            total_bytes_estimate: 4096.5,
        });
    });

    it('ignores other output', () => {
        expect(parseProgressLine('[youtube] abc123: Downloading webpage')).toBeNull();
        expect(parseProgressLine('')).toBeNull();
    });
});

describe('toOutputTemplate', () => {
    it('swaps the mp3 extension for the ext field', () => {
        expect(toOutputTemplate('/downloads/Book.mp3')).toBe('/downloads/Book.%(ext)s');
    });

    it('escapes percent signs', () => {
        expect(toOutputTemplate('/downloads/100% Book.mp3')).toBe('/downloads/100%% Book.%(ext)s');
    });
});

describe('buildYtDlpArgs', () => {
    it('asks for 192k stereo 44.1kHz mp3 without video', () => {
        const args = buildYtDlpArgs(request);

        expect(args.slice(0, 10)).toEqual([
            '-f', 'bestaudio/best',
            '--extract-audio',
            '--audio-format', 'mp3',
            '--audio-quality', '192K',
            '--postprocessor-args', 'ffmpeg:-ar 44100 -ac 2 -b:a 192k -vn',
            '--no-playlist',
        ]);
        expect(args).toContain('--newline');
        expect(args[args.indexOf('-o') + 1]).toBe('/downloads/Tolkien - The Hobbit - Full.%(ext)s');
        expect(args[args.length - 1]).toBe(request.url);
        expect(args).not.toContain('--ffmpeg-location');
    });

    it('passes the ffmpeg location when configured', () => {
        const args = buildYtDlpArgs(request, '/usr/local/bin');

        expect(args[args.indexOf('--ffmpeg-location') + 1]).toBe('/usr/local/bin');
        expect(args[args.length - 1]).toBe(request.url);
    });
});

describe('YtDlpService.downloadAudio', () => {
    it('forwards progress events and resolves true on exit code 0', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const child = new FakeProcess();
        const { service, spawnProcess } = serviceWith(child);
        const events: DownloadProgressEvent[] = [];

        const result = service.downloadAudio(request, (event) => events.push(event));
        child.finish(
            [
                '[youtube] abc123: Downloading webpage',
                '__progress__ downloading|50|200|NA',
                '__progress__ downloading|200|200|NA',
                '__progress__ finished|200|200|NA',
            ],
            0
        );

        await expect(result).resolves.toBe(true);
        expect(spawnProcess).toHaveBeenCalledWith('/opt/yt-dlp', buildYtDlpArgs(request));
        expect(events.map((e) => [e.status, e.downloaded_bytes])).toEqual([
            ['downloading', 50],
            ['downloading', 200],
            ['finished', 200],
        ]);
    });

    it('resolves false on a non-zero exit code', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const child = new FakeProcess();
        const { service } = serviceWith(child);

        const result = service.downloadAudio(request, () => {});
        child.finish([], 1, ['ERROR: Unsupported URL']);

        await expect(result).resolves.toBe(false);
        expect(String(error.mock.calls[0][0])).toContain('ERROR: Unsupported URL');
    });

    it('resolves false when the binary cannot be spawned', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'error').mockImplementation(() => {});
        const child = new FakeProcess();
        const { service } = serviceWith(child);

        const result = service.downloadAudio(request, () => {});
        child.emit('error', new Error('spawn /opt/yt-dlp ENOENT'));

        await expect(result).resolves.toBe(false);
    });

    it('kills the process and rejects when the progress sink throws', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        const child = new FakeProcess();
        const { service } = serviceWith(child);
        const onProgress = vi.fn(() => {
            throw new Error('sink failed');
        });

        const result = service.downloadAudio(request, onProgress);
        child.finish(['__progress__ downloading|1|2|NA', '__progress__ downloading|2|2|NA'], null);

        await expect(result).rejects.toThrow('sink failed');
        expect(child.kill).toHaveBeenCalledWith('SIGTERM');
        expect(onProgress).toHaveBeenCalledTimes(1);
    });
});

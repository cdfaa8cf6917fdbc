import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import { createInterface } from 'readline';
import type { Readable } from 'stream';

export interface DownloadProgressEvent {
    status: string;
    downloaded_bytes?: number;
    total_bytes?: number;
    total_bytes_estimate?: number;
}

export type ProgressSink = (event: DownloadProgressEvent) => void;

export interface AudioDownloadRequest {
    url: string;
    /** Target file, ending in `.mp3`. */
    outputPath: string;
    /** Human-readable name used in log lines. */
    title: string;
}

/**
 * Downloads the best audio stream of a video and transcodes it to MP3.
 * Resolves `true` on success and `false` when the tool reports failure;
 * rejects only if the progress sink throws.
 */
export interface AudioDownloader {
    downloadAudio(request: AudioDownloadRequest, onProgress: ProgressSink): Promise<boolean>;
}

export type SpawnedProcess = EventEmitter & {
    stdout: Readable;
    stderr: Readable;
    kill(signal?: NodeJS.Signals): boolean;
};

export type SpawnProcess = (command: string, args: string[]) => SpawnedProcess;

export interface YtDlpOptions {
    binaryPath: string;
    ffmpegLocation?: string;
    spawnProcess?: SpawnProcess;
}

const PROGRESS_PREFIX = '__progress__';
const PROGRESS_TEMPLATE =
    `download:${PROGRESS_PREFIX} %(progress.status)s|%(progress.downloaded_bytes)s` +
    '|%(progress.total_bytes)s|%(progress.total_bytes_estimate)s';
const PROGRESS_LINE = /^__progress__ (\w+)\|([^|]*)\|([^|]*)\|([^|]*)$/;
const STDERR_TAIL = 20;

function toByteCount(field: string): number | undefined {
    const value = Number.parseFloat(field);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse one stdout line written through the progress template.
 * Fields yt-dlp does not know are printed as `NA` and come back absent.
 */
export function parseProgressLine(line: string): DownloadProgressEvent | null {
    const match = PROGRESS_LINE.exec(line.trim());
    if (!match) return null;

    return {
        status: match[1],
        downloaded_bytes: toByteCount(match[2]),
        total_bytes: toByteCount(match[3]),
        total_bytes_estimate: toByteCount(match[4]),
    };
}

/**
 * yt-dlp writes the transcoded file next to the template with the codec's
 * extension, so the template is the target with `.mp3` swapped for `.%(ext)s`.
 */
export function toOutputTemplate(outputPath: string): string {
    const base = outputPath.toLowerCase().endsWith('.mp3') ? outputPath.slice(0, -4) : outputPath;
    return `${base.replace(/%/g, '%%')}.%(ext)s`;
}

export function buildYtDlpArgs(request: AudioDownloadRequest, ffmpegLocation?: string): string[] {
    const args = [
        '-f', 'bestaudio/best',
        '--extract-audio',
        '--audio-format', 'mp3',
        '--audio-quality', '192K',
        '--postprocessor-args', 'ffmpeg:-ar 44100 -ac 2 -b:a 192k -vn',
        '--no-playlist',
        '--newline',
        '--quiet',
        '--progress',
        '--progress-template', PROGRESS_TEMPLATE,
        '-o', toOutputTemplate(request.outputPath),
    ];

    if (ffmpegLocation) {
        args.push('--ffmpeg-location', ffmpegLocation);
    }

    args.push(request.url);
    return args;
}

export class YtDlpService implements AudioDownloader {
    private readonly binaryPath: string;
    private readonly ffmpegLocation?: string;
    private readonly spawnProcess: SpawnProcess;

    constructor(options: YtDlpOptions) {
        this.binaryPath = options.binaryPath;
        this.ffmpegLocation = options.ffmpegLocation;
        this.spawnProcess = options.spawnProcess ?? ((command, args) => spawn(command, args));
    }

    downloadAudio(request: AudioDownloadRequest, onProgress: ProgressSink): Promise<boolean> {
        const args = buildYtDlpArgs(request, this.ffmpegLocation);
        console.log(`[yt-dlp] Downloading "${request.title}" from ${request.url}`);

        return new Promise<boolean>((resolve, reject) => {
            const child = this.spawnProcess(this.binaryPath, args);
            const stderrTail: string[] = [];
            let sinkError: unknown;
            let settled = false;

            const settle = (finish: () => void) => {
                if (settled) return;
                settled = true;
                finish();
            };

            createInterface({ input: child.stdout }).on('line', (line) => {
                if (sinkError !== undefined) return;
                const event = parseProgressLine(line);
                if (!event) return;
                try {
                    onProgress(event);
                } catch (error) {
                    sinkError = error;
                    child.kill('SIGTERM');
                }
            });

            createInterface({ input: child.stderr }).on('line', (line) => {
                stderrTail.push(line);
                if (stderrTail.length > STDERR_TAIL) stderrTail.shift();
            });

            child.on('error', (error: Error) => {
                console.error(`Error downloading ${request.url}:`, error.message);
                settle(() => resolve(false));
            });

            child.on('close', (code: number | null) => {
                settle(() => {
                    if (sinkError !== undefined) {
                        reject(sinkError);
                    } else if (code === 0) {
                        console.log(`✅ Successfully downloaded and converted: ${request.title}`);
                        resolve(true);
                    } else {
                        console.error(
                            `Error downloading ${request.url}: yt-dlp exited with code ${code}\n${stderrTail.join('\n')}`
                        );
                        resolve(false);
                    }
                });
            });
        });
    }
}

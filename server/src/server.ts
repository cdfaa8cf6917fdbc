import { createApp } from './app';
import { DirectorySettings } from './config/directories';
import pool from './config/database';
import { env } from './config/env';
import scanner from './services/bookScannerService';
import { DownloadService } from './services/downloadService';
import { PgHistoryStore } from './services/historyStore';
import { SearchService } from './services/searchService';
import { YoutubeSearchProvider } from './services/youtubeSearchProvider';
import { YtDlpService } from './services/ytDlpService';

async function main(): Promise<void> {
    const settings = new DirectorySettings({
        booksDir: env.BOOKS_DIR,
        downloadDir: env.DOWNLOAD_DIR,
    });
    await settings.ensureDownloadDir();

    const historyStore = new PgHistoryStore(pool);
    await historyStore.initialize();

    const downloader = new YtDlpService({
        binaryPath: env.YT_DLP_PATH,
        ffmpegLocation: env.FFMPEG_LOCATION,
    });

    const app = createApp({
        settings,
        historyStore,
        scanner,
        searchService: new SearchService(new YoutubeSearchProvider(env.SEARCH_TIMEOUT_MS)),
        downloadService: new DownloadService(historyStore, downloader, () => settings.current()),
    });

    // Start server
    app.listen(env.PORT, () => {
        console.log(`🚀 Server running on http://localhost:${env.PORT}`);
    });
}

main().catch((error: unknown) => {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
});

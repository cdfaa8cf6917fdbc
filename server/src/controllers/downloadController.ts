import type { Request, Response } from 'express';
import { parseDownloadRequest, type DownloadService } from '../services/downloadService';
import { sendError } from './respond';

export class DownloadController {
    constructor(private readonly downloadService: DownloadService) {}

    /**
     * Queue a YouTube video for MP3 download and add it to the history.
     * Answers as soon as the pending record exists; the download runs on.
     * POST /download
     */
    startDownload = async (req: Request, res: Response): Promise<void> => {
        try {
            const request = parseDownloadRequest(req.body);
            const { downloadId } = await this.downloadService.startDownload(request);
            console.log(`Started download job for ID: ${downloadId}`);

            res.json({ ok: true, download_id: downloadId });
        } catch (error) {
            sendError(res, 'Starting download', error);
        }
    };
}

import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(8080),
    DATABASE_URL: z.string().min(1).optional(),
    BOOKS_DIR: z.string().min(1).default('./books'),
    DOWNLOAD_DIR: z.string().min(1).default('./downloads'),
    YT_DLP_PATH: z.string().min(1).default('yt-dlp'),
    FFMPEG_LOCATION: z.string().min(1).optional(),
    SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate environment variables, applying defaults for anything unset.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const parsed = envSchema.safeParse(source);

    if (!parsed.success) {
        console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
        throw new Error('Invalid environment variables');
    }

    return parsed.data;
}

dotenv.config();

export const env = loadEnv();

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import { errorMessage, log } from './logger.js';
import type { FetchLike } from './providers/types.js';
import { isPlaceholder } from './providers/types.js';

const MODULE = 'posters';
const TARGET_WIDTH = 300;
const JPEG_QUALITY = 70;
const NAME_PATTERN = /^[0-9a-f]{24}\.jpg$/;

export interface PosterCacheOptions {
    timeoutMs: number;
    fetch?: FetchLike;
}

/** Stable cache file name for a poster URL: 24 hex chars of its SHA-256. */
export function posterFileName(url: string): string {
    const hash = crypto.createHash('sha256').update(url, 'utf8').digest('hex').slice(0, 24);
    return `${hash}.jpg`;
}

/**
 * Content-addressed poster store. Files are written once per URL and never
 * refreshed; a second request for the same URL is served from disk.
 */
export class PosterCache {
    private readonly fetchImpl: FetchLike;

    constructor(readonly dir: string, private readonly options: PosterCacheOptions) {
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    /**
     * Download, downsize and compress the poster at `sourceUrl`.
     * Returns the cached file name, or null for placeholders and on any failure.
     */
    async ensureCached(sourceUrl: string | null | undefined): Promise<string | null> {
        if (!sourceUrl || isPlaceholder(sourceUrl)) return null;

        const fileName = posterFileName(sourceUrl);
        const target = path.join(this.dir, fileName);
        if (fs.existsSync(target)) return fileName;

        try {
            const res = await this.fetchImpl(sourceUrl, { signal: AbortSignal.timeout(this.options.timeoutMs) });
            if (!res.ok) {
                log.warn(MODULE, 'Poster download failed', { url: sourceUrl, status: res.status });
                return null;
            }
            const original = Buffer.from(await res.arrayBuffer());

            const jpeg = await sharp(original)
                .flatten({ background: '#000000' })
                .resize({ width: TARGET_WIDTH, withoutEnlargement: true, kernel: sharp.kernel.lanczos3 })
                .jpeg({ quality: JPEG_QUALITY, mozjpeg: true })
                .toBuffer();

            await fs.promises.mkdir(this.dir, { recursive: true });
            await fs.promises.writeFile(target, jpeg);
            log.debug(MODULE, 'Cached poster', { url: sourceUrl, file: fileName, bytes: jpeg.length });
            return fileName;
        } catch (err) {
            log.warn(MODULE, 'Could not cache poster', { url: sourceUrl, error: errorMessage(err) });
            return null;
        }
    }

    /** Absolute path of a cached file, or null for names this cache never produces. */
    pathFor(fileName: string): string | null {
        if (!NAME_PATTERN.test(fileName)) return null;
        const full = path.join(this.dir, fileName);
        return fs.existsSync(full) ? full : null;
    }
}

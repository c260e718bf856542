import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { PosterCache, posterFileName } from './posters.js';
import type { FetchLike } from './providers/types.js';

async function pngOf(width: number, height: number): Promise<Buffer> {
    return sharp({ create: { width, height, channels: 4, background: { r: 200, g: 40, b: 40, alpha: 1 } } })
        .png()
        .toBuffer();
}

describe('PosterCache', () => {
    let dir: string;
    let fetchStub: Mock<FetchLike>;
    let cache: PosterCache;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shelf-posters-'));
        fetchStub = vi.fn<FetchLike>();
        cache = new PosterCache(path.join(dir, 'posters'), { timeoutMs: 1000, fetch: fetchStub });
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('names files by a 24-character hex digest of the URL', () => {
        const name = posterFileName('https://img.test/a.jpg');
        expect(name).toMatch(/^[0-9a-f]{24}\.jpg$/);
        expect(posterFileName('https://img.test/a.jpg')).toBe(name);
        expect(posterFileName('https://img.test/b.jpg')).not.toBe(name);
    });

    it('downloads once and serves the second call from disk', async () => {
        const png = await pngOf(600, 900);
        fetchStub.mockImplementation(async () => new Response(png));
        const url = 'https://img.test/poster.png';

        const first = await cache.ensureCached(url);
        const second = await cache.ensureCached(url);

        expect(first).toBe(posterFileName(url));
        expect(second).toBe(first);
        expect(fetchStub).toHaveBeenCalledTimes(1);
    });

    it('downsizes wide images to 300px keeping the aspect ratio and writes JPEG', async () => {
        fetchStub.mockResolvedValue(new Response(await pngOf(600, 900)));

        const name = await cache.ensureCached('https://img.test/wide.png');
        const meta = await sharp(path.join(dir, 'posters', String(name))).metadata();

        expect(meta.format).toBe('jpeg');
        expect(meta.width).toBe(300);
        expect(meta.height).toBe(450);
    });

    it('does not enlarge narrow images', async () => {
        fetchStub.mockResolvedValue(new Response(await pngOf(200, 300)));

        const name = await cache.ensureCached('https://img.test/narrow.png');
        const meta = await sharp(path.join(dir, 'posters', String(name))).metadata();

        expect(meta.width).toBe(200);
    });

    it.each(['', 'N/A', 'na', '  None  '])('returns null for %j without any network call', async (url) => {
        expect(await cache.ensureCached(url)).toBeNull();
        expect(fetchStub).not.toHaveBeenCalled();
    });

    it('returns null when the download fails', async () => {
        fetchStub.mockRejectedValue(new Error('timeout'));
        expect(await cache.ensureCached('https://img.test/slow.png')).toBeNull();
    });

    it('returns null on an HTTP error status', async () => {
        fetchStub.mockResolvedValue(new Response('missing', { status: 404 }));
        expect(await cache.ensureCached('https://img.test/missing.png')).toBeNull();
    });

    it('returns null when the body is not an image', async () => {
        fetchStub.mockResolvedValue(new Response('<html>nope</html>'));
        expect(await cache.ensureCached('https://img.test/page.html')).toBeNull();
        expect(fs.existsSync(path.join(dir, 'posters', posterFileName('https://img.test/page.html')))).toBe(false);
    });

    it('resolves only names it produces', async () => {
        fetchStub.mockResolvedValue(new Response(await pngOf(100, 150)));
        const name = await cache.ensureCached('https://img.test/small.png');

        expect(cache.pathFor(String(name))).toBe(path.join(dir, 'posters', String(name)));
        expect(cache.pathFor('../library.db')).toBeNull();
        expect(cache.pathFor('0123456789abcdef01234567.jpg')).toBeNull();
    });
});

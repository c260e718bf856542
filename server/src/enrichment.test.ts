import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { SQLiteCatalogRepository } from './db/sqlite.js';
import { EnrichmentPipeline } from './enrichment.js';
import { LookupFailure } from './errors.js';
import { Library } from './library.js';
import { PosterCache } from './posters.js';
import type { BarcodeDecoder } from './providers/barcode.js';
import type { FetchLike, MetadataProvider, MetadataRecord } from './providers/types.js';
import { ProductLookupClient } from './providers/upc.js';
import { MetadataResolver } from './resolver.js';

const HEAT: MetadataRecord = {
    title: 'Heat',
    year: 1995,
    plot: 'A group of professional bank robbers...',
    posterUrl: null,
    source: 'omdb',
    sourceId: 'tt0113277',
};

function films(records: Record<string, MetadataRecord>, configured = true): MetadataProvider {
    return {
        tag: 'omdb',
        configured,
        search: async () => [],
        getById: async (id) => records[id] ?? null,
    };
}

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status });
}

describe('EnrichmentPipeline', () => {
    let dir: string;
    let repo: SQLiteCatalogRepository;
    let library: Library;
    let productFetch: Mock<FetchLike>;
    let decoded: string | null;

    const decoder: BarcodeDecoder = { decode: async () => decoded };

    function products(apiKey: string | null = 'test-key'): ProductLookupClient {
        return new ProductLookupClient({
            apiKey,
            baseUrl: 'https://upc.test',
            paths: ['/product/{code}'],
            keyParam: 'apikey',
            timeoutMs: 1000,
            fetch: productFetch,
        });
    }

    function pipeline(provider = films({ tt0113277: HEAT }), productKey: string | null = 'test-key') {
        return new EnrichmentPipeline(library, new MetadataResolver(provider, products(productKey), decoder));
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shelf-enrich-'));
        repo = new SQLiteCatalogRepository(path.join(dir, 'library.db'));
        library = new Library(repo, new PosterCache(path.join(dir, 'posters'), { timeoutMs: 1000, fetch: vi.fn<FetchLike>() }));
        productFetch = vi.fn<FetchLike>();
        decoded = null;
    });

    afterEach(() => {
        repo.close();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('addFromSearchResult', () => {
        it('adds the film with the shelf fields the user chose', async () => {
            const id = await pipeline().addFromSearchResult('tt0113277', { format: '4K', location: 'Shelf B' });

            expect(library.getItem(id)).toMatchObject({
                title: 'Heat',
                year: 1995,
                format: '4K',
                location: 'Shelf B',
                watched: false,
                source: 'omdb',
                sourceId: 'tt0113277',
            });
        });

        it('fails without adding anything when the record cannot be fetched', async () => {
            await expect(pipeline().addFromSearchResult('tt0000000', {})).rejects.toBeInstanceOf(LookupFailure);
            expect(library.getItems()).toEqual([]);
        });
    });

    describe('addFromScan', () => {
        it('prefers the film database when the product names a film id', async () => {
            productFetch.mockResolvedValueOnce(json({ product: { title: 'HEAT (DVD)', imdb_id: 'tt0113277' } }));

            const outcome = await pipeline().addFromScan(' 0123 ', { format: 'DVD' });

            expect(outcome).toMatchObject({ status: 'added', source: 'omdb' });
            const [item] = library.getItems();
            expect(item).toMatchObject({ title: 'Heat', year: 1995, format: 'DVD', notes: 'Scanned code: 0123' });
        });

        it('falls back to the product title when the film database is not configured', async () => {
            productFetch.mockResolvedValueOnce(json({ title: 'HEAT (DVD)', imdb_id: 'tt0113277', year: 2005 }));

            const outcome = await pipeline(films({ tt0113277: HEAT }, false)).addFromScan('0123', { notes: 'gift' });

            expect(outcome).toMatchObject({ status: 'added', source: 'upc' });
            const [item] = library.getItems();
            expect(item).toMatchObject({
                title: 'HEAT (DVD)',
                year: 2005,
                notes: 'gift\nScanned code: 0123',
                source: 'upc',
                sourceId: '0123',
            });
        });

        it('falls back to the product title when the film id does not resolve', async () => {
            productFetch.mockResolvedValueOnce(json({ title: 'Mystery Box', imdb: 'tt9999999' }));

            const outcome = await pipeline().addFromScan('0123', {});

            expect(outcome).toMatchObject({ status: 'added', source: 'upc' });
            expect(library.getItems().map((i) => i.title)).toEqual(['Mystery Box']);
        });

        it('returns the payload for inspection when nothing identifies the product', async () => {
            const payload = { product: { brand: 'Acme' } };
            productFetch.mockResolvedValueOnce(json(payload));

            expect(await pipeline().addFromScan('0123', {})).toEqual({ status: 'unresolved', code: '0123', payload });
            expect(library.getItems()).toEqual([]);
        });

        it('returns unresolved when only an unresolvable film id is present', async () => {
            const payload = { imdb_id: 'tt9999999' };
            productFetch.mockResolvedValueOnce(json(payload));

            expect(await pipeline().addFromScan('0123', {})).toEqual({ status: 'unresolved', code: '0123', payload });
        });

        it('reports lookup failures and missing configuration without adding', async () => {
            productFetch.mockResolvedValueOnce(json({}, 503));
            expect(await pipeline().addFromScan('0123', {})).toEqual({
                status: 'failed',
                code: '0123',
                error: '/product/{code}: HTTP 503',
            });

            expect(await pipeline(undefined, null).addFromScan('0123', {})).toEqual({ status: 'unavailable', code: '0123' });
            expect(library.getItems()).toEqual([]);
        });
    });

    describe('decodeAndAdd', () => {
        it('reports a picture without a readable code', async () => {
            expect(await pipeline().decodeAndAdd(Buffer.from('img'), {})).toEqual({ status: 'no_code' });
            expect(productFetch).not.toHaveBeenCalled();
        });

        it('looks up the decoded code', async () => {
            decoded = '0123';
            productFetch.mockResolvedValueOnce(json({ title: 'Ronin' }));

            expect(await pipeline().decodeAndAdd(Buffer.from('img'), { watched: true })).toMatchObject({ status: 'added' });
            expect(library.getItems()[0]).toMatchObject({ title: 'Ronin', watched: true, notes: 'Scanned code: 0123' });
        });
    });
});

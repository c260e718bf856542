import { describe, expect, it, vi } from 'vitest';
import { OmdbClient } from './omdb.js';
import type { FetchLike } from './types.js';
import { parseYear } from './types.js';

function json(body: unknown): Response {
    return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('parseYear', () => {
    it.each<[string | null, number | null]>([
        ['1999', 1999],
        ['2019–2021', 2019],
        ['2019-', 2019],
        ['N/A', null],
        ['', null],
        ['19999', null],
        [null, null],
    ])('parses %j as %j', (input, expected) => {
        expect(parseYear(input)).toBe(expected);
    });
});

describe('OmdbClient', () => {
    it('returns nothing and makes no request without a key', async () => {
        const fetchStub = vi.fn<FetchLike>();
        const omdb = new OmdbClient({ apiKey: null, timeoutMs: 1000, fetch: fetchStub });

        expect(omdb.configured).toBe(false);
        expect(await omdb.search('Alien')).toEqual([]);
        expect(await omdb.getById('tt0078748')).toBeNull();
        expect(fetchStub).not.toHaveBeenCalled();
    });

    it('passes search results through in provider order and caches them', async () => {
        const fetchStub = vi.fn<FetchLike>().mockResolvedValueOnce(json({
            Response: 'True',
            Search: [
                { Title: 'Aliens', Year: '1986', imdbID: 'tt0090605', Type: 'movie' },
                { Title: 'Alien', Year: '1979', imdbID: 'tt0078748', Type: 'movie' },
            ],
        }));
        const omdb = new OmdbClient({ apiKey: 'test-key', timeoutMs: 1000, fetch: fetchStub });

        const expected = [
            { title: 'Aliens', yearText: '1986', externalId: 'tt0090605' },
            { title: 'Alien', yearText: '1979', externalId: 'tt0078748' },
        ];
        expect(await omdb.search('alien')).toEqual(expected);
        expect(await omdb.search('ALIEN ')).toEqual(expected);
        expect(fetchStub).toHaveBeenCalledTimes(1);

        const url = new URL(fetchStub.mock.calls[0][0]);
        expect(url.searchParams.get('s')).toBe('alien');
        expect(url.searchParams.get('apikey')).toBe('test-key');
    });

    it('returns an empty list when the provider reports no match', async () => {
        const fetchStub = vi.fn<FetchLike>().mockResolvedValueOnce(json({ Response: 'False', Error: 'Movie not found!' }));
        const omdb = new OmdbClient({ apiKey: 'test-key', timeoutMs: 1000, fetch: fetchStub });

        expect(await omdb.search('zzzz')).toEqual([]);
    });

    it('normalizes a detail record', async () => {
        const fetchStub = vi.fn<FetchLike>().mockResolvedValueOnce(json({
            Response: 'True',
            Title: 'Twin Peaks',
            Year: '1990–1991',
            Plot: 'N/A',
            Poster: 'https://img.test/tp.jpg',
            imdbID: 'tt0098936',
        }));
        const omdb = new OmdbClient({ apiKey: 'test-key', timeoutMs: 1000, fetch: fetchStub });

        expect(await omdb.getById('tt0098936')).toEqual({
            title: 'Twin Peaks',
            year: 1990,
            plot: null,
            posterUrl: 'https://img.test/tp.jpg',
            source: 'omdb',
            sourceId: 'tt0098936',
        });
        expect(new URL(fetchStub.mock.calls[0][0]).searchParams.get('i')).toBe('tt0098936');
    });

    it('degrades to null when the request fails', async () => {
        const fetchStub = vi.fn<FetchLike>().mockRejectedValueOnce(new Error('socket hang up'));
        const omdb = new OmdbClient({ apiKey: 'test-key', timeoutMs: 1000, fetch: fetchStub });

        expect(await omdb.getById('tt0098936')).toBeNull();
    });
});

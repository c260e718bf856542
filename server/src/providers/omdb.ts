import { z } from 'zod';
import { Cache } from '../cache.js';
import { errorMessage, log } from '../logger.js';
import type { FetchLike, MetadataProvider, MetadataRecord, SearchResult } from './types.js';
import { isPlaceholder, parseYear } from './types.js';

const OMDB_BASE = 'https://www.omdbapi.com/';
const CACHE_TTL_SEARCH = 600;   // 10 min
const MODULE = 'omdb';

const searchResponseSchema = z.object({
    Response: z.string(),
    Search: z.array(z.object({
        Title: z.string().default(''),
        Year: z.string().default(''),
        imdbID: z.string().default(''),
    })).default([]),
});

const detailResponseSchema = z.object({
    Response: z.string(),
    Title: z.string().optional(),
    Year: z.string().optional(),
    Plot: z.string().optional(),
    Poster: z.string().optional(),
    imdbID: z.string().optional(),
});

export interface OmdbOptions {
    apiKey: string | null;
    timeoutMs: number;
    fetch?: FetchLike;
    cache?: Cache<SearchResult[]>;
}

function textOrNull(value: string | undefined): string | null {
    return value === undefined || isPlaceholder(value) ? null : value.trim();
}

/**
 * OMDb film database client. Every failure (no key, HTTP error, bad JSON,
 * "Response": "False") degrades to an empty result and is logged.
 */
export class OmdbClient implements MetadataProvider {
    readonly tag = 'omdb';
    private readonly fetchImpl: FetchLike;
    private readonly cache: Cache<SearchResult[]>;

    constructor(private readonly options: OmdbOptions) {
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
        this.cache = options.cache ?? new Cache<SearchResult[]>();
    }

    get configured(): boolean {
        return this.options.apiKey !== null;
    }

    /** Title search → (title, year text, imdb id) in provider order. */
    async search(query: string): Promise<SearchResult[]> {
        const q = query.trim();
        if (!this.configured || !q) return [];

        const cacheKey = `omdb:search:${q.toLowerCase()}`;
        const cached = this.cache.get(cacheKey);
        if (cached) return cached;

        const body = await this.request({ s: q });
        const parsed = searchResponseSchema.safeParse(body);
        if (!parsed.success) {
            if (body !== null) log.warn(MODULE, 'Unexpected search response shape', { query: q });
            return [];
        }
        if (parsed.data.Response !== 'True') return [];

        const results = parsed.data.Search.map((r) => ({
            title: r.Title,
            yearText: r.Year,
            externalId: r.imdbID,
        }));
        this.cache.set(cacheKey, results, CACHE_TTL_SEARCH);
        return results;
    }

    /** Full record for an imdb id, or null when unknown or unreachable. */
    async getById(imdbId: string): Promise<MetadataRecord | null> {
        const id = imdbId.trim();
        if (!this.configured || !id) return null;

        const body = await this.request({ i: id, plot: 'short' });
        const parsed = detailResponseSchema.safeParse(body);
        if (!parsed.success || parsed.data.Response !== 'True') {
            log.debug(MODULE, 'No detail record', { imdbId: id });
            return null;
        }

        const data = parsed.data;
        return {
            title: data.Title?.trim() ?? '',
            year: parseYear(data.Year),
            plot: textOrNull(data.Plot),
            posterUrl: textOrNull(data.Poster),
            source: this.tag,
            sourceId: textOrNull(data.imdbID) ?? id,
        };
    }

    /** GET with the api key; null on any transport or parse failure. */
    private async request(params: Record<string, string>): Promise<unknown> {
        const url = new URL(OMDB_BASE);
        url.searchParams.set('apikey', this.options.apiKey ?? '');
        for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

        try {
            const res = await this.fetchImpl(url.toString(), {
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });
            if (!res.ok) {
                log.warn(MODULE, 'OMDb request failed', { status: res.status });
                return null;
            }
            const json: unknown = await res.json();
            return json;
        } catch (err) {
            log.warn(MODULE, 'OMDb request error', { error: errorMessage(err) });
            return null;
        }
    }
}

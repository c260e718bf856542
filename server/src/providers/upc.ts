import { errorMessage, log } from '../logger.js';
import type { CodeLookup, FetchLike } from './types.js';
import { isPlaceholder, parseYear } from './types.js';

const MODULE = 'upc';

/**
 * Product databases disagree on response shape, so each field is read from an
 * ordered list of key paths: every alias at the top level first, then the same
 * aliases one level under the usual wrapper objects. An array met on the way
 * contributes its first element.
 */
const WRAPPER_KEYS = ['data', 'result', 'item', 'movie', 'product'];

type KeyPath = string[];

function candidatePaths(aliases: string[]): KeyPath[] {
    return [
        ...aliases.map((key) => [key]),
        ...WRAPPER_KEYS.flatMap((wrapper) => aliases.map((key) => [wrapper, key])),
    ];
}

const TITLE_PATHS = candidatePaths(['title', 'name']);
const IMDB_PATHS = candidatePaths(['imdb_id', 'imdb', 'imdbId']);
const YEAR_PATHS = candidatePaths(['year', 'release_year']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAt(payload: unknown, keyPath: KeyPath): unknown {
    let current = payload;
    for (const key of keyPath) {
        if (Array.isArray(current)) current = current[0];
        if (!isRecord(current)) return undefined;
        current = current[key];
    }
    return current;
}

function firstMatch<T>(payload: unknown, paths: KeyPath[], extract: (value: unknown) => T | null): T | null {
    for (const keyPath of paths) {
        const value = extract(valueAt(payload, keyPath));
        if (value !== null) return value;
    }
    return null;
}

function asText(value: unknown): string | null {
    if (typeof value !== 'string' || isPlaceholder(value)) return null;
    return value.trim();
}

function asImdbId(value: unknown): string | null {
    const text = asText(value);
    return text && /^tt\d+$/i.test(text) ? text.toLowerCase() : null;
}

function asYear(value: unknown): number | null {
    if (typeof value === 'number') return Number.isInteger(value) && value > 0 ? value : null;
    if (typeof value === 'string') return parseYear(value);
    return null;
}

/** Pull title / imdb id / year out of a parsed product payload. */
export function extractProduct(payload: unknown): CodeLookup {
    const title = firstMatch(payload, TITLE_PATHS, asText);
    const imdbId = firstMatch(payload, IMDB_PATHS, asImdbId);
    const year = firstMatch(payload, YEAR_PATHS, asYear);

    if (title === null && imdbId === null) {
        return { status: 'unresolved', payload };
    }
    return { status: 'found', title, year, imdbId, payload };
}

export interface ProductLookupOptions {
    apiKey: string | null;
    baseUrl: string;
    /** Path templates tried in order; `{code}` is replaced by the code. */
    paths: string[];
    /** Query parameter carrying the key when bearer auth is refused. */
    keyParam: string;
    timeoutMs: number;
    fetch?: FetchLike;
}

/**
 * Barcode → product record client for a product-lookup service whose exact
 * endpoint is not known in advance.
 */
export class ProductLookupClient {
    readonly tag = 'upc';
    private readonly fetchImpl: FetchLike;

    constructor(private readonly options: ProductLookupOptions) {
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    get configured(): boolean {
        return this.options.apiKey !== null;
    }

    /**
     * Try each candidate path: bearer token first, the same path again with
     * the key as a query parameter on 401/403. The first 200 with a JSON body
     * wins; when every path fails the last error is reported.
     */
    async lookup(code: string): Promise<CodeLookup> {
        const apiKey = this.options.apiKey;
        if (apiKey === null) return { status: 'unavailable' };

        let lastError = 'no lookup paths configured';
        for (const template of this.options.paths) {
            const url = this.buildUrl(template, code);
            try {
                let res = await this.get(url, { Authorization: `Bearer ${apiKey}` });

                if (res.status === 401 || res.status === 403) {
                    log.debug(MODULE, 'Bearer auth refused, retrying with query key', { path: template });
                    await res.body?.cancel();
                    const withKey = new URL(url);
                    withKey.searchParams.set(this.options.keyParam, apiKey);
                    res = await this.get(withKey.toString(), {});
                }

                if (res.status !== 200) {
                    await res.body?.cancel();
                    lastError = `${template}: HTTP ${res.status}`;
                    log.debug(MODULE, 'Candidate path failed', { path: template, status: res.status });
                    continue;
                }

                const payload: unknown = await res.json();
                log.info(MODULE, 'Product lookup succeeded', { path: template, code });
                return extractProduct(payload);
            } catch (err) {
                lastError = `${template}: ${errorMessage(err)}`;
                log.debug(MODULE, 'Candidate path error', { path: template, error: errorMessage(err) });
            }
        }

        log.warn(MODULE, 'Product lookup failed on every path', { code, lastError });
        return { status: 'failed', error: lastError };
    }

    private buildUrl(template: string, code: string): string {
        const path = template.replace('{code}', encodeURIComponent(code));
        return new URL(`${this.options.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`).toString();
    }

    private get(url: string, headers: Record<string, string>): Promise<Response> {
        return this.fetchImpl(url, {
            headers: { Accept: 'application/json', ...headers },
            signal: AbortSignal.timeout(this.options.timeoutMs),
        });
    }
}

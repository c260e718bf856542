/** The subset of `fetch` the providers use; tests pass a stub. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** One title-search hit, passed through in provider order. */
export interface SearchResult {
    title: string;
    /** Year exactly as the provider reports it, e.g. "2019–2021". */
    yearText: string;
    externalId: string;
}

/** Normalized film metadata, whatever provider produced it. */
export interface MetadataRecord {
    title: string;
    year: number | null;
    plot: string | null;
    posterUrl: string | null;
    /** Provenance tag of the provider, stored on the item as `source`. */
    source: string;
    sourceId: string | null;
}

/**
 * Outcome of a product-code lookup.
 * `payload` is the provider's body as parsed, kept for manual inspection.
 */
export type CodeLookup =
    | { status: 'found'; title: string | null; year: number | null; imdbId: string | null; payload: unknown }
    | { status: 'unresolved'; payload: unknown }
    | { status: 'failed'; error: string }
    | { status: 'unavailable' };

export interface MetadataProvider {
    readonly tag: string;
    readonly configured: boolean;
    search(query: string): Promise<SearchResult[]>;
    getById(externalId: string): Promise<MetadataRecord | null>;
}

const PLACEHOLDERS = new Set(['n/a', 'na', 'none']);

/** True for blank strings and the placeholder tokens providers use for "no value". */
export function isPlaceholder(value: string): boolean {
    const v = value.trim().toLowerCase();
    return v === '' || PLACEHOLDERS.has(v);
}

/**
 * Leading 4-digit year before any non-numeric separator:
 * "1999" → 1999, "2019–2021" → 2019, "N/A" → null, "19999" → null.
 */
export function parseYear(text: string | null | undefined): number | null {
    if (!text) return null;
    const match = /^\s*(\d{4})(?!\d)/.exec(text);
    if (!match) return null;
    const year = parseInt(match[1], 10);
    return year > 0 ? year : null;
}

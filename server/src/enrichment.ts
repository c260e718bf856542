import { LookupFailure } from './errors.js';
import type { Library, ShelfFields } from './library.js';
import { log } from './logger.js';
import type { MetadataResolver } from './resolver.js';

const MODULE = 'enrichment';

export type ScanOutcome =
    | { status: 'added'; itemId: number; source: string }
    | { status: 'unresolved'; code: string; payload: unknown }
    | { status: 'failed'; code: string; error: string }
    | { status: 'unavailable'; code: string }
    | { status: 'no_code' };

function withScanNote(notes: string | null | undefined, code: string): string {
    const line = `Scanned code: ${code}`;
    const existing = notes?.trim();
    return existing ? `${existing}\n${line}` : line;
}

/**
 * EnrichmentPipeline: adds one item from external metadata: a title-search
 * pick, or a scanned product code. The film database wins over the product
 * database whenever it can resolve the film.
 */
export class EnrichmentPipeline {
    constructor(
        private readonly library: Library,
        private readonly resolver: MetadataResolver,
    ) {}

    async addFromSearchResult(externalId: string, fields: ShelfFields): Promise<number> {
        const meta = await this.resolver.fetchById(externalId);
        if (!meta || !meta.title.trim()) {
            throw new LookupFailure(`Could not fetch details for ${externalId}`);
        }
        return this.library.addItem({
            ...fields,
            title: meta.title,
            year: meta.year,
            plot: meta.plot,
            posterUrl: meta.posterUrl,
            source: meta.source,
            sourceId: meta.sourceId,
        });
    }

    async addFromScan(rawCode: string, fields: ShelfFields): Promise<ScanOutcome> {
        const code = rawCode.trim();
        const lookup = await this.resolver.fetchByCode(code);
        const notes = withScanNote(fields.notes, code);

        switch (lookup.status) {
            case 'unavailable':
                return { status: 'unavailable', code };
            case 'failed':
                return { status: 'failed', code, error: lookup.error };
            case 'unresolved':
                log.info(MODULE, 'Scan payload has no title or film id', { code });
                return { status: 'unresolved', code, payload: lookup.payload };
            case 'found':
                break;
        }

        if (lookup.imdbId && this.resolver.films.configured) {
            const meta = await this.resolver.fetchById(lookup.imdbId);
            if (meta && meta.title.trim()) {
                const itemId = await this.library.addItem({
                    ...fields,
                    notes,
                    title: meta.title,
                    year: meta.year,
                    plot: meta.plot,
                    posterUrl: meta.posterUrl,
                    source: meta.source,
                    sourceId: meta.sourceId,
                });
                return { status: 'added', itemId, source: meta.source };
            }
            log.warn(MODULE, 'Film id from product record did not resolve', { code, imdbId: lookup.imdbId });
        }

        if (lookup.title) {
            const itemId = await this.library.addItem({
                ...fields,
                notes,
                title: lookup.title,
                year: lookup.year,
                source: this.resolver.products.tag,
                sourceId: code,
            });
            return { status: 'added', itemId, source: this.resolver.products.tag };
        }

        return { status: 'unresolved', code, payload: lookup.payload };
    }

    /** Decode a photographed barcode, then add it like a typed-in code. */
    async decodeAndAdd(image: Buffer, fields: ShelfFields): Promise<ScanOutcome> {
        const code = await this.resolver.decodeImage(image);
        if (!code) return { status: 'no_code' };
        return this.addFromScan(code, fields);
    }
}

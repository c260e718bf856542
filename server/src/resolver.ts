import type { BarcodeDecoder } from './providers/barcode.js';
import type { ProductLookupClient } from './providers/upc.js';
import type { CodeLookup, MetadataProvider, MetadataRecord, SearchResult } from './providers/types.js';

/**
 * MetadataResolver: one entry point over the film database, the product
 * lookup service and the barcode decoder. Shared by every session.
 */
export class MetadataResolver {
    constructor(
        readonly films: MetadataProvider,
        readonly products: ProductLookupClient,
        private readonly decoder: BarcodeDecoder,
    ) {}

    /** Which optional lookups are usable with the current configuration. */
    status(): { titleSearch: boolean; barcodeLookup: boolean } {
        return {
            titleSearch: this.films.configured,
            barcodeLookup: this.products.configured,
        };
    }

    searchByTitle(query: string): Promise<SearchResult[]> {
        return this.films.search(query);
    }

    fetchById(externalId: string): Promise<MetadataRecord | null> {
        return this.films.getById(externalId);
    }

    fetchByCode(code: string): Promise<CodeLookup> {
        return this.products.lookup(code.trim());
    }

    decodeImage(image: Buffer): Promise<string | null> {
        return this.decoder.decode(image);
    }
}

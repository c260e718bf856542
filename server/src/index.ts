import { createApp } from './app.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { errorMessage, log } from './logger.js';
import { ZxingBarcodeDecoder } from './providers/barcode.js';
import { OmdbClient } from './providers/omdb.js';
import { ProductLookupClient } from './providers/upc.js';
import { MetadataResolver } from './resolver.js';
import { SessionRegistry } from './sessions.js';

function readConfig(): AppConfig {
    try {
        return loadConfig();
    } catch (err) {
        console.error(errorMessage(err));
        process.exit(1);
    }
}

const config = readConfig();
process.env.LOG_LEVEL = config.logLevel;

const resolver = new MetadataResolver(
    new OmdbClient(config.omdb),
    new ProductLookupClient(config.productLookup),
    new ZxingBarcodeDecoder(),
);

const registry = new SessionRegistry({
    dataDir: config.dataDir,
    resolver,
    posterTimeoutMs: config.posters.timeoutMs,
});

const app = createApp(registry);
const server = app.listen(config.port, () => {
    const { titleSearch, barcodeLookup } = resolver.status();
    log.info('server', `Media Shelf listening on http://localhost:${config.port}`, {
        dataDir: config.dataDir,
        titleSearch,
        barcodeLookup,
    });
    if (!titleSearch) log.info('server', 'No OMDB_API_KEY set; title search disabled, manual entry still works');
    if (!barcodeLookup) log.info('server', 'No UPC_API_KEY set; barcode lookup disabled');
});

function shutdown(signal: string): void {
    log.info('server', `Received ${signal}, shutting down`);
    server.close(() => {
        registry.closeAll();
        process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

import path from 'path';
import { validate as isUuid, v4 as uuidv4 } from 'uuid';
import { Backup } from './backup.js';
import { SQLiteCatalogRepository } from './db/sqlite.js';
import { EnrichmentPipeline } from './enrichment.js';
import { ValidationError } from './errors.js';
import { Library } from './library.js';
import { log } from './logger.js';
import { PosterCache } from './posters.js';
import type { FetchLike } from './providers/types.js';
import type { MetadataResolver } from './resolver.js';

const MODULE = 'sessions';
const STORE_FILE = 'library.db';
const POSTERS_DIR = 'posters';

/** Everything one browser session works with. */
export interface Catalog {
    sessionId: string;
    library: Library;
    enrichment: EnrichmentPipeline;
    backup: Backup;
}

export interface SessionRegistryOptions {
    dataDir: string;
    resolver: MetadataResolver;
    posterTimeoutMs: number;
    /** Used for poster downloads; defaults to global fetch. */
    fetch?: FetchLike;
    /** Open catalogs kept at most; the least recently used is closed first. */
    maxOpen?: number;
    /** Catalogs unused for this long are closed on the next lookup. */
    idleMs?: number;
    now?: () => number;
}

interface OpenCatalog {
    catalog: Catalog;
    repo: SQLiteCatalogRepository;
    lastUsed: number;
}

export function newSessionId(): string {
    return uuidv4();
}

/** Validate a client-supplied session id and return its canonical form. */
export function sessionKey(sessionId: string): string {
    if (!isUuid(sessionId)) throw new ValidationError('Invalid session id');
    return sessionId.toLowerCase();
}

/**
 * Maps opaque session keys to isolated catalogs under
 * `<dataDir>/users/<key>/`. Catalogs open on first use; idle ones and those
 * past `maxOpen` are closed again.
 */
export class SessionRegistry {
    private open = new Map<string, OpenCatalog>();
    private readonly maxOpen: number;
    private readonly idleMs: number;
    private readonly now: () => number;

    constructor(private readonly options: SessionRegistryOptions) {
        this.maxOpen = options.maxOpen ?? 32;
        this.idleMs = options.idleMs ?? 30 * 60 * 1000;
        this.now = options.now ?? Date.now;
    }

    get resolver(): MetadataResolver {
        return this.options.resolver;
    }

    get openCount(): number {
        return this.open.size;
    }

    get(sessionId: string): Catalog {
        const key = sessionKey(sessionId);
        const now = this.now();
        this.closeIdle(now, key);

        const existing = this.open.get(key);
        if (existing) {
            // Re-insert so iteration order stays least recently used first.
            this.open.delete(key);
            existing.lastUsed = now;
            this.open.set(key, existing);
            return existing.catalog;
        }

        const entry = this.openCatalog(key, now);
        this.open.set(key, entry);
        while (this.open.size > this.maxOpen) {
            const [oldest] = this.open.keys();
            this.close(oldest, 'evicted');
        }
        return entry.catalog;
    }

    closeAll(): void {
        for (const { repo } of this.open.values()) repo.close();
        this.open.clear();
    }

    private openCatalog(key: string, now: number): OpenCatalog {
        const userDir = path.join(this.options.dataDir, 'users', key);
        const repo = new SQLiteCatalogRepository(path.join(userDir, STORE_FILE));
        const postersDir = path.join(userDir, POSTERS_DIR);
        const posters = new PosterCache(postersDir, {
            timeoutMs: this.options.posterTimeoutMs,
            fetch: this.options.fetch,
        });
        const library = new Library(repo, posters);

        const catalog: Catalog = {
            sessionId: key,
            library,
            enrichment: new EnrichmentPipeline(library, this.options.resolver),
            backup: new Backup(repo, postersDir),
        };
        log.info(MODULE, 'Opened session catalog', { session: key, open: this.open.size + 1 });
        return { catalog, repo, lastUsed: now };
    }

    private closeIdle(now: number, keep: string): void {
        for (const [key, entry] of this.open) {
            if (key !== keep && now - entry.lastUsed > this.idleMs) this.close(key, 'idle');
        }
    }

    private close(key: string, reason: string): void {
        const entry = this.open.get(key);
        if (!entry) return;
        entry.repo.close();
        this.open.delete(key);
        log.debug(MODULE, 'Closed session catalog', { session: key, reason });
    }
}

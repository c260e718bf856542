interface Entry<T> {
    data: T;
    expiresAt: number;
}

export interface CacheOptions {
    /** Oldest entries are dropped once this many are held. */
    maxEntries?: number;
    now?: () => number;
}

/**
 * Bounded TTL cache for provider responses. Expired entries are swept on
 * every write; past `maxEntries` the least recently written entry goes.
 */
export class Cache<T> {
    private entries = new Map<string, Entry<T>>();
    private readonly maxEntries: number;
    private readonly now: () => number;

    constructor(options: CacheOptions = {}) {
        this.maxEntries = options.maxEntries ?? 500;
        this.now = options.now ?? Date.now;
    }

    get(key: string): T | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (this.now() > entry.expiresAt) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.data;
    }

    set(key: string, data: T, ttlSeconds: number): void {
        const now = this.now();
        for (const [k, entry] of this.entries) {
            if (now > entry.expiresAt) this.entries.delete(k);
        }

        this.entries.delete(key);
        this.entries.set(key, { data, expiresAt: now + ttlSeconds * 1000 });

        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
        }
    }
}

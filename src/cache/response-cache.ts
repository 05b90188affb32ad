import { FetchError, cancelledError } from '../utils/fetch-error.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * One cached payload. Owned by ResponseCache.
 */
export interface CacheEntry<V> {
    key: string;
    payload: V;
    insertedAt: number;
    ttlMs: number;
}

export interface CacheStats {
    size: number;
    maxEntries: number;
    inFlight: number;
    hits: number;
    misses: number;
    evictions: number;
}

export interface ResponseCacheOptions {
    maxEntries?: number;
    defaultTtlMs?: number;
    logger?: Logger;
}

export interface LoadOptions {
    ttlMs?: number;
    signal?: AbortSignal;
}

interface InFlightLoad<V> {
    promise: Promise<V>;
    controller: AbortController;
    waiters: number;
}

/**
 * In-memory response cache.
 *
 * Entries expire after their TTL (a stale read is a miss). The cache holds at most
 * `maxEntries` items: expired entries are dropped first, then the least recently
 * used. `getOrLoad` runs at most one load per key at a time; concurrent callers
 * share its outcome.
 */
export class ResponseCache<V> {
    private readonly entries = new Map<string, CacheEntry<V>>();
    private readonly inFlight = new Map<string, InFlightLoad<V>>();
    private readonly maxEntries: number;
    private readonly defaultTtlMs: number;
    private readonly logger: Logger;
    private hits = 0;
    private misses = 0;
    private evictions = 0;

    constructor(options: ResponseCacheOptions = {}) {
        this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
        this.defaultTtlMs = options.defaultTtlMs ?? 3600 * 1000;
        this.logger = options.logger ?? getLogger();
    }

    /**
     * Get a cached value, or undefined if not found/expired.
     * A hit makes the entry the most recently used.
     */
    get(key: string): V | undefined {
        const entry = this.entries.get(key);
        if (!entry) {
            this.misses++;
            return undefined;
        }

        if (this.isExpired(entry, Date.now())) {
            this.entries.delete(key);
            this.misses++;
            this.logger.debug({ key }, 'Cache expired');
            return undefined;
        }

        // Map iteration order doubles as recency order
        this.entries.delete(key);
        this.entries.set(key, entry);
        this.hits++;
        return entry.payload;
    }

    /**
     * Store a value. Evicts expired entries, then least recently used ones, to stay
     * within the bound.
     */
    put(key: string, payload: V, ttlMs = this.defaultTtlMs): void {
        this.entries.delete(key);
        this.entries.set(key, { key, payload, insertedAt: Date.now(), ttlMs });

        if (this.entries.size > this.maxEntries) {
            this.purgeExpired();
        }
        while (this.entries.size > this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (oldest.done) break;
            this.entries.delete(oldest.value);
            this.evictions++;
            this.logger.debug({ key: oldest.value }, 'Cache evicted least recently used entry');
        }
    }

    /**
     * Check if a key is cached and not expired. Does not affect recency or stats.
     */
    has(key: string): boolean {
        const entry = this.entries.get(key);
        return entry !== undefined && !this.isExpired(entry, Date.now());
    }

    delete(key: string): boolean {
        return this.entries.delete(key);
    }

    /**
     * Drop all entries and counters. Loads already in flight finish but are not joined by new callers.
     */
    clear(): void {
        this.entries.clear();
        this.inFlight.clear();
        this.hits = 0;
        this.misses = 0;
        this.evictions = 0;
    }

    get size(): number {
        return this.entries.size;
    }

    getStats(): CacheStats {
        return {
            size: this.entries.size,
            maxEntries: this.maxEntries,
            inFlight: this.inFlight.size,
            hits: this.hits,
            misses: this.misses,
            evictions: this.evictions,
        };
    }

    /**
     * Return the cached value for `key`, or run `loader` to produce it.
     *
     * While a load is pending, callers for the same key wait on it instead of
     * starting another one. A caller whose signal aborts is released with a
     * Cancelled error; when no caller is left waiting, the load's own signal is
     * aborted. Failed loads are not cached.
     */
    async getOrLoad(key: string, loader: (signal: AbortSignal) => Promise<V>, options: LoadOptions = {}): Promise<V> {
        const { ttlMs = this.defaultTtlMs, signal } = options;

        if (signal?.aborted) throw cancelledError(signal);

        const cached = this.get(key);
        if (cached !== undefined) {
            this.logger.debug({ key }, 'Cache hit');
            return cached;
        }

        let load = this.inFlight.get(key);
        if (load) {
            this.logger.debug({ key, waiters: load.waiters + 1 }, 'Joining in-flight load');
        } else {
            load = this.startLoad(key, loader, ttlMs);
        }

        return this.wait(key, load, signal);
    }

    private startLoad(key: string, loader: (signal: AbortSignal) => Promise<V>, ttlMs: number): InFlightLoad<V> {
        const controller = new AbortController();
        const load: InFlightLoad<V> = {
            controller,
            waiters: 0,
            promise: Promise.resolve()
                .then(() => loader(controller.signal))
                .then((payload) => {
                    if (this.inFlight.get(key) === load) {
                        this.put(key, payload, ttlMs);
                    }
                    return payload;
                })
                .finally(() => {
                    if (this.inFlight.get(key) === load) {
                        this.inFlight.delete(key);
                    }
                }),
        };
        this.inFlight.set(key, load);
        return load;
    }

    private wait(key: string, load: InFlightLoad<V>, signal: AbortSignal | undefined): Promise<V> {
        load.waiters++;

        return new Promise<V>((resolve, reject) => {
            let settled = false;

            const leave = () => {
                load.waiters--;
                signal?.removeEventListener('abort', onAbort);
            };

            const onAbort = () => {
                if (settled || !signal) return;
                settled = true;
                leave();
                reject(cancelledError(signal));

                if (load.waiters === 0 && this.inFlight.get(key) === load) {
                    // Nobody is waiting any more: detach the load and stop the wire call
                    this.inFlight.delete(key);
                    this.logger.debug({ key }, 'Last waiter cancelled, aborting load');
                    load.controller.abort(new FetchError('Cancelled', 'All callers cancelled the request'));
                }
            };

            signal?.addEventListener('abort', onAbort, { once: true });

            load.promise.then(
                (payload) => {
                    if (settled) return;
                    settled = true;
                    leave();
                    resolve(payload);
                },
                (error: unknown) => {
                    if (settled) return;
                    settled = true;
                    leave();
                    reject(error);
                }
            );
        });
    }

    private purgeExpired(): void {
        const now = Date.now();
        for (const [key, entry] of this.entries) {
            if (this.isExpired(entry, now)) {
                this.entries.delete(key);
                this.evictions++;
            }
        }
    }

    private isExpired(entry: CacheEntry<V>, now: number): boolean {
        return now - entry.insertedAt >= entry.ttlMs;
    }
}

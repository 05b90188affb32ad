import { cacheKey, normalizeSpec } from '../cache/cache-key.js';
import { ResponseCache, type CacheStats } from '../cache/response-cache.js';
import { RateLimiter } from '../rate-limit/rate-limiter.js';
import { RetryPolicy } from '../retry/retry-policy.js';
import { createDefaultAdapters } from '../sources/index.js';
import {
    DEFAULT_CONFIG,
    DEFAULT_SEARCH_LIMIT,
    type AdapterContext,
    type IdSpec,
    type NormalizedRecord,
    type RequestSpec,
    type RequestTemplate,
    type ScifetchConfig,
    type SearchCursor,
    type SearchPage,
    type SearchRequest,
    type SearchSpec,
    type Source,
    type SourceAdapter,
    type SourceConfig,
    type WireRequestOptions,
} from '../types/index.js';
import { FetchError, toFetchError } from '../utils/fetch-error.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface FetchCoordinatorOptions {
    config?: ScifetchConfig;

    /** Adapters to register instead of the built-in set */
    adapters?: SourceAdapter[];

    logger?: Logger;

    /** Jitter source for retry backoff, in [0, 1) */
    random?: () => number;

    version?: string;
}

export interface CallOptions {
    signal?: AbortSignal;
}

/**
 * Outcome of a fan-out: every source lands in exactly one of the two maps.
 */
export interface FanOutResult {
    records: Map<Source, readonly NormalizedRecord[]>;
    errors: Map<Source, FetchError>;
}

export interface CoordinatorStats {
    cache: CacheStats;

    /** Wire calls issued per source since construction or the last reset */
    requests: Record<string, number>;
}

function specFor(template: RequestTemplate, source: Source): RequestSpec {
    return { ...template, source };
}

/**
 * Single entry point for all sources.
 *
 * Each request is normalized and keyed; a fresh cached result is returned without
 * touching the network, and concurrent identical requests share one load. Loads
 * run under the retry policy, and every wire call an adapter makes first takes a
 * token from its source's bucket. Cache, limiter and counters belong to the
 * instance, so coordinators never share state.
 */
export class FetchCoordinator {
    private readonly adapters = new Map<Source, SourceAdapter>();
    private readonly config: ScifetchConfig;
    private readonly logger: Logger;
    private readonly http: HttpClient;
    private readonly limiter: RateLimiter;
    private readonly retry: RetryPolicy;
    private readonly cache: ResponseCache<readonly NormalizedRecord[]>;

    constructor(options: FetchCoordinatorOptions = {}) {
        this.config = options.config ?? DEFAULT_CONFIG;
        this.logger = options.logger ?? getLogger();

        this.http = new HttpClient({ version: options.version, email: this.config.email, logger: this.logger });
        this.limiter = new RateLimiter(this.config.sources, { logger: this.logger });
        this.retry = new RetryPolicy({ ...this.config.retry, logger: this.logger, random: options.random });
        this.cache = new ResponseCache({ maxEntries: this.config.cache.maxEntries, logger: this.logger });

        for (const adapter of options.adapters ?? createDefaultAdapters()) {
            this.register(adapter);
        }
    }

    /**
     * Register (or replace) the adapter for its source.
     */
    register(adapter: SourceAdapter): void {
        this.adapters.set(adapter.source, adapter);
        this.logger.debug({ source: adapter.source, adapter: adapter.name }, 'Registered source adapter');
    }

    /**
     * Sources with a registered adapter, in registration order.
     */
    sources(): Source[] {
        return [...this.adapters.keys()];
    }

    /**
     * Run one request. Resolves with the normalized records (a single record for
     * `fetch` and `metadata`); rejects with a FetchError.
     */
    async request(spec: RequestSpec, options: CallOptions = {}): Promise<readonly NormalizedRecord[]> {
        const { signal } = options;

        try {
            const normalized = normalizeSpec(spec);
            const key = cacheKey(normalized);
            const adapter = this.adapterFor(normalized.source);

            if (normalized.operation === 'links' && !adapter.links) {
                throw new FetchError('Fatal', `${adapter.name} does not support links`, { source: adapter.source });
            }

            const ttlMs = this.sourceConfig(normalized.source).ttlSeconds * 1000;
            const records = await this.cache.getOrLoad(
                key,
                (loadSignal) => this.load(adapter, normalized, loadSignal),
                { ttlMs, signal }
            );

            this.logger.debug({ source: normalized.source, operation: normalized.operation, count: records.length }, 'Request completed');
            return records;
        } catch (error) {
            throw toFetchError(error, spec.source);
        }
    }

    /**
     * Stream the results of a search page by page, without caching. Records are
     * de-duplicated by id and the stream stops once `paging.limit` records were
     * yielded or the source has no more. A failing page ends the stream with its
     * FetchError after the earlier pages were yielded.
     */
    async *search(spec: SearchSpec, options: CallOptions = {}): AsyncGenerator<readonly NormalizedRecord[], void, undefined> {
        const { signal } = options;
        const { normalized, adapter } = this.prepareSearch(spec);

        const request: SearchRequest = { query: normalized.query, filters: normalized.filters ?? {} };
        const seen = new Set<string>();
        let remaining = normalized.paging?.limit ?? DEFAULT_SEARCH_LIMIT;
        let cursor: SearchCursor | null = { offset: normalized.paging?.offset ?? 0 };
        let pageNumber = 0;

        while (cursor && remaining > 0) {
            const current: SearchCursor = cursor;
            const pageSize = Math.min(remaining, adapter.maxPageSize);
            pageNumber++;

            const page: SearchPage = await this.attempt(adapter, signal, (ctx) => adapter.searchPage(request, current, pageSize, ctx));

            const batch: NormalizedRecord[] = [];
            for (const record of page.records) {
                if (batch.length >= remaining) break;
                if (seen.has(record.id)) continue;
                seen.add(record.id);
                batch.push(record);
            }

            this.logger.debug(
                { source: adapter.source, page: pageNumber, received: page.records.length, kept: batch.length, total: page.total },
                'Search page fetched'
            );

            remaining -= batch.length;
            cursor = page.next;
            if (batch.length > 0) {
                yield Object.freeze(batch);
            }
        }
    }

    /**
     * Run the same request against several sources concurrently. Never rejects
     * because a source failed; its error is reported in `errors` instead.
     */
    async fanOut(template: RequestTemplate, sources: Source[] = this.sources(), options: CallOptions = {}): Promise<FanOutResult> {
        const targets = [...new Set(sources)];
        const settled = await Promise.allSettled(targets.map((source) => this.request(specFor(template, source), options)));

        const result: FanOutResult = { records: new Map(), errors: new Map() };
        settled.forEach((outcome, index) => {
            const source = targets[index];
            if (source === undefined) return;
            if (outcome.status === 'fulfilled') {
                result.records.set(source, outcome.value);
            } else {
                result.errors.set(source, toFetchError(outcome.reason, source));
            }
        });

        this.logger.debug({ succeeded: result.records.size, failed: result.errors.size }, 'Fan-out completed');
        return result;
    }

    /**
     * Drop cached responses, bucket state and request counters.
     */
    reset(): void {
        this.cache.clear();
        this.limiter.reset();
        this.http.resetCounts();
    }

    getStats(): CoordinatorStats {
        return {
            cache: this.cache.getStats(),
            requests: this.http.getAllRequestCounts(),
        };
    }

    // ─── Private helpers ──────────────────────────────────────

    private prepareSearch(spec: SearchSpec): { normalized: SearchSpec; adapter: SourceAdapter } {
        try {
            const normalized = normalizeSpec(spec);
            if (normalized.operation !== 'search') {
                throw new FetchError('Fatal', 'search() requires a search request', { source: spec.source });
            }
            return { normalized, adapter: this.adapterFor(normalized.source) };
        } catch (error) {
            throw toFetchError(error, spec.source);
        }
    }

    private async load(adapter: SourceAdapter, spec: RequestSpec, signal: AbortSignal): Promise<readonly NormalizedRecord[]> {
        if (spec.operation === 'search') {
            const records: NormalizedRecord[] = [];
            for await (const batch of this.search(spec, { signal })) {
                records.push(...batch);
            }
            return Object.freeze(records);
        }
        return Object.freeze(await this.loadById(adapter, spec, signal));
    }

    private async loadById(adapter: SourceAdapter, spec: IdSpec, signal: AbortSignal): Promise<NormalizedRecord[]> {
        switch (spec.operation) {
            case 'fetch':
                return [await this.attempt(adapter, signal, (ctx) => adapter.fetch(spec.id, ctx))];
            case 'metadata':
                return [await this.attempt(adapter, signal, (ctx) => adapter.fetchMetadata(spec.id, ctx))];
            case 'links': {
                const links = adapter.links?.bind(adapter);
                if (!links) {
                    throw new FetchError('Fatal', `${adapter.name} does not support links`, { source: adapter.source });
                }
                return this.attempt(adapter, signal, (ctx) => links(spec.id, ctx));
            }
        }
    }

    /**
     * One adapter call under the retry policy. Every attempt gets a fresh context.
     */
    private attempt<T>(
        adapter: SourceAdapter,
        signal: AbortSignal | undefined,
        operation: (ctx: AdapterContext) => Promise<T>
    ): Promise<T> {
        const ctxSignal = signal ?? new AbortController().signal;
        return this.retry.execute(() => operation(this.createContext(adapter.source, ctxSignal)), {
            signal,
            source: adapter.source,
        });
    }

    private createContext(source: Source, signal: AbortSignal): AdapterContext {
        const config = this.sourceConfig(source);
        const { http, limiter } = this;
        const wire = (options: WireRequestOptions) => ({
            headers: options.headers,
            timeout: config.timeoutMs,
            source,
            signal,
        });

        return {
            source,
            config,
            signal,
            logger: this.logger,
            async getText(url: string, options: WireRequestOptions = {}) {
                await limiter.acquire(source, signal);
                return http.getText(url, wire(options));
            },
            async getJson<T>(url: string, options: WireRequestOptions = {}) {
                await limiter.acquire(source, signal);
                return http.getJson<T>(url, wire(options));
            },
        };
    }

    private adapterFor(source: Source): SourceAdapter {
        const adapter = this.adapters.get(source);
        if (!adapter) {
            throw new FetchError('Fatal', `No adapter registered for source "${source}"`, { source });
        }
        return adapter;
    }

    private sourceConfig(source: Source): SourceConfig {
        return this.config.sources[source];
    }
}

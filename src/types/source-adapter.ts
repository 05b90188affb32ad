import type { NormalizedRecord } from './record.js';
import type { RequestFilters } from './request.js';
import type { SourceConfig } from './config.js';
import type { Source } from './source.js';
import type { HttpResponse } from '../utils/http-client.js';
import type { Logger } from '../utils/logger.js';

/**
 * Options for a single wire call issued by an adapter.
 */
export interface WireRequestOptions {
    headers?: Record<string, string>;
}

/**
 * Everything an adapter needs for one call: its source configuration and a
 * transport that takes a rate-limit token before every request.
 */
export interface AdapterContext {
    readonly source: Source;
    readonly config: SourceConfig;

    /** Aborted on caller cancellation or per-call timeout */
    readonly signal: AbortSignal;

    readonly logger: Logger;

    getText(url: string, options?: WireRequestOptions): Promise<HttpResponse<string>>;

    getJson<T>(url: string, options?: WireRequestOptions): Promise<HttpResponse<T>>;
}

/**
 * Continuation of a paged search. `state` is private to the adapter that
 * produced it (e.g. PubMed's WebEnv/query_key); a cursor with only an offset
 * restarts the search at that offset.
 */
export interface SearchCursor {
    offset: number;
    state?: Readonly<Record<string, string | number>>;
}

export interface SearchRequest {
    query: string;
    filters: RequestFilters;
}

export interface SearchPage {
    records: NormalizedRecord[];

    /** Total hits reported by the source, when it reports one */
    total: number | null;

    /** Cursor of the following page, or null when the source has no more */
    next: SearchCursor | null;
}

/**
 * Interface for data source adapters (PubMed, arXiv, MedGen, ClinVar, CrossRef).
 * Each adapter normalizes results into the common NormalizedRecord interface.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    readonly source: Source;

    /** Largest page the source serves in one call */
    readonly maxPageSize: number;

    /**
     * Fetch one page of search results starting at `cursor`.
     */
    searchPage(request: SearchRequest, cursor: SearchCursor, pageSize: number, ctx: AdapterContext): Promise<SearchPage>;

    /**
     * Fetch a single record by its source-specific ID.
     * Rejects with a NotFound FetchError when the source has no such record.
     */
    fetch(id: string, ctx: AdapterContext): Promise<NormalizedRecord>;

    /**
     * Fetch the summary form of a record (no abstract where the source separates them).
     */
    fetchMetadata(id: string, ctx: AdapterContext): Promise<NormalizedRecord>;

    /**
     * Fetch records linked to the given record (related articles, citing literature).
     */
    links?(id: string, ctx: AdapterContext): Promise<NormalizedRecord[]>;
}

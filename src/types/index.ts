/**
 * Barrel export for all shared types.
 */
export { Source, ALL_SOURCES, ENTREZ_SOURCES, isSource, parseSource } from './source.js';
export { createRecord } from './record.js';
export type { NormalizedRecord, RecordInit, RecordLink, RecordLinkRel } from './record.js';
export { DEFAULT_SEARCH_LIMIT, SEARCH_FIELDS, isSearchField } from './request.js';
export type {
    Operation,
    IdOperation,
    SearchField,
    SortOrder,
    Paging,
    RequestFilters,
    SearchSpec,
    IdSpec,
    RequestSpec,
    RequestTemplate,
} from './request.js';
export { DEFAULT_CONFIG, NCBI_RATE_WITH_KEY, NCBI_RATE_WITHOUT_KEY } from './config.js';
export type {
    ScifetchConfig,
    SourceConfig,
    SourceAuth,
    RetryConfig,
    CacheConfig,
    LogLevel,
} from './config.js';
export type {
    SourceAdapter,
    AdapterContext,
    WireRequestOptions,
    SearchCursor,
    SearchRequest,
    SearchPage,
} from './source-adapter.js';

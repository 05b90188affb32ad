import type { Source } from './source.js';

/**
 * Operations a caller can ask of a source.
 */
export type Operation = 'search' | 'fetch' | 'metadata' | 'links';

/** Operations addressed by a single record identifier. */
export type IdOperation = Exclude<Operation, 'search'>;

/**
 * Search field restriction. Each adapter maps these onto its own query syntax.
 */
export type SearchField = 'title' | 'abstract' | 'author' | 'all';

export const SEARCH_FIELDS: readonly SearchField[] = ['title', 'abstract', 'author', 'all'];

export function isSearchField(value: string): value is SearchField {
    return SEARCH_FIELDS.some((field) => field === value);
}

export type SortOrder = 'relevance' | 'date';

export interface Paging {
    /** Zero-based index of the first record to return */
    offset?: number;

    /** Maximum number of records to return */
    limit?: number;
}

export interface RequestFilters {
    /** Earliest publication date, `YYYY`, `YYYY-MM` or `YYYY-MM-DD` */
    dateFrom?: string;

    /** Latest publication date, same formats as `dateFrom` */
    dateTo?: string;

    /** Only records added to the source within the last N days */
    recentDays?: number;

    fields?: SearchField[];

    sort?: SortOrder;
}

export interface SearchSpec {
    source: Source;
    operation: 'search';
    query: string;
    paging?: Paging;
    filters?: RequestFilters;
}

export interface IdSpec {
    source: Source;
    operation: IdOperation;
    id: string;
}

/**
 * Normalized description of a single logical fetch/search operation.
 */
export type RequestSpec = SearchSpec | IdSpec;

/**
 * A RequestSpec without its source, used as the template of a fan-out.
 */
export type RequestTemplate = Omit<SearchSpec, 'source'> | Omit<IdSpec, 'source'>;

export const DEFAULT_SEARCH_LIMIT = 20;

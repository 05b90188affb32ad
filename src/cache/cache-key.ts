import { createHash } from 'node:crypto';
import { DEFAULT_SEARCH_LIMIT, isSearchField, isSource, type RequestFilters, type RequestSpec } from '../types/index.js';
import { FetchError } from '../utils/fetch-error.js';

const DATE_PATTERN = /^\d{4}(-\d{2}(-\d{2})?)?$/;

/**
 * JSON serialization with object keys sorted at every level and undefined members dropped,
 * so that field insertion order never changes the output.
 */
export function stableStringify(value: unknown): string {
    if (value === undefined) return 'null';
    if (value === null || typeof value !== 'object') return JSON.stringify(value);

    if (Array.isArray(value)) {
        return `[${value.map((item: unknown) => stableStringify(item)).join(',')}]`;
    }

    const entries = Object.entries(value)
        .filter(([, member]) => member !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

    return `{${entries.map(([key, member]) => `${JSON.stringify(key)}:${stableStringify(member)}`).join(',')}}`;
}

function normalizeFilters(filters: RequestFilters | undefined): RequestFilters {
    if (!filters) return {};

    const normalized: RequestFilters = {};
    if (filters.dateFrom) normalized.dateFrom = filters.dateFrom.trim();
    if (filters.dateTo) normalized.dateTo = filters.dateTo.trim();
    if (filters.recentDays !== undefined) normalized.recentDays = Math.floor(filters.recentDays);
    if (filters.sort && filters.sort !== 'relevance') normalized.sort = filters.sort;

    const fields = [...new Set(filters.fields ?? [])].sort();
    // "all" alone is the same as no restriction
    if (fields.length > 0 && !(fields.length === 1 && fields[0] === 'all')) {
        normalized.fields = fields;
    }

    return normalized;
}

/**
 * Validate a RequestSpec and bring it to canonical form: defaults applied,
 * whitespace collapsed, filters ordered. Throws a Fatal FetchError on invalid input.
 */
export function normalizeSpec(spec: RequestSpec): RequestSpec {
    if (!isSource(spec.source)) {
        throw new FetchError('Fatal', `Unknown source "${String(spec.source)}"`);
    }

    if (spec.operation === 'search') {
        const query = spec.query.replace(/\s+/g, ' ').trim();
        if (!query) {
            throw new FetchError('Fatal', 'Search query must not be empty', { source: spec.source });
        }

        const offset = Math.max(0, Math.floor(spec.paging?.offset ?? 0));
        const limit = Math.floor(spec.paging?.limit ?? DEFAULT_SEARCH_LIMIT);
        if (!Number.isFinite(limit) || limit < 1) {
            throw new FetchError('Fatal', `Invalid search limit: ${spec.paging?.limit}`, { source: spec.source });
        }

        const filters = normalizeFilters(spec.filters);
        if (filters.recentDays !== undefined && (!Number.isFinite(filters.recentDays) || filters.recentDays < 1)) {
            throw new FetchError('Fatal', `Invalid recentDays: ${spec.filters?.recentDays}`, { source: spec.source });
        }
        for (const date of [filters.dateFrom, filters.dateTo]) {
            if (date !== undefined && !DATE_PATTERN.test(date)) {
                throw new FetchError('Fatal', `Invalid date filter "${date}" (expected YYYY[-MM[-DD]])`, {
                    source: spec.source,
                });
            }
        }
        for (const field of filters.fields ?? []) {
            if (!isSearchField(field)) {
                throw new FetchError('Fatal', `Invalid search field "${field}"`, { source: spec.source });
            }
        }

        return { source: spec.source, operation: 'search', query, paging: { offset, limit }, filters };
    }

    const id = spec.id.trim();
    if (!id) {
        throw new FetchError('Fatal', `An id is required for the ${spec.operation} operation`, { source: spec.source });
    }
    return { source: spec.source, operation: spec.operation, id };
}

/**
 * Cache key of a RequestSpec: `<source>:<operation>:<sha256 of the canonical form>`.
 * Two specs with the same semantic content always produce the same key.
 */
export function cacheKey(spec: RequestSpec): string {
    const normalized = normalizeSpec(spec);
    const digest = createHash('sha256').update(stableStringify(normalized)).digest('hex');
    return `${normalized.source}:${normalized.operation}:${digest}`;
}

import {
    Source,
    createRecord,
    type AdapterContext,
    type NormalizedRecord,
    type RecordLink,
    type RequestFilters,
    type SearchCursor,
    type SearchField,
    type SearchPage,
    type SearchRequest,
    type SourceAdapter,
} from '../types/index.js';
import { FetchError } from '../utils/fetch-error.js';
import { formatDate, isRecord, stripDoiPrefix, stripTags } from './utils.js';

interface CrossRefAuthor {
    given?: string;
    family?: string;
    name?: string;
    ORCID?: string;
}

interface CrossRefDate {
    'date-parts'?: Array<Array<number | null>>;
}

export interface CrossRefWork {
    DOI: string;
    title?: string[];
    author?: CrossRefAuthor[];
    abstract?: string;
    URL?: string;
    type?: string;
    publisher?: string;
    issued?: CrossRefDate;
    'published-print'?: CrossRefDate;
    'published-online'?: CrossRefDate;
    'container-title'?: string[];
    volume?: string;
    issue?: string;
    page?: string;
    ISSN?: string[];
    subject?: string[];
    'is-referenced-by-count'?: number;
    link?: Array<{ URL: string; 'content-type'?: string }>;
}

interface CrossRefListResponse {
    status: string;
    message: {
        items: CrossRefWork[];
        'total-results': number;
    };
}

interface CrossRefWorkResponse {
    status: string;
    message: CrossRefWork;
}

/** CrossRef refuses `offset` beyond this; deeper paging needs cursors. */
const MAX_OFFSET = 10000;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const FIELD_PARAMS: Record<Exclude<SearchField, 'all'>, string> = {
    title: 'query.title',
    author: 'query.author',
    abstract: 'query.bibliographic',
};

function workDate(work: CrossRefWork): string | null {
    const date = work.issued ?? work['published-print'] ?? work['published-online'];
    const [year, month, day] = date?.['date-parts']?.[0] ?? [];
    return formatDate(year, month, day);
}

function authorName(author: CrossRefAuthor): string {
    if (author.name) return author.name;
    return [author.given, author.family].filter(Boolean).join(' ');
}

/**
 * Normalize a CrossRef work. JATS markup in abstracts is stripped.
 */
export function normalizeCrossRefWork(work: CrossRefWork): NormalizedRecord | null {
    const doi = stripDoiPrefix(work.DOI);
    if (!doi) return null;

    const links: RecordLink[] = [{ rel: 'doi', url: `https://doi.org/${doi}` }];
    const pdf = work.link?.find((link) => link['content-type'] === 'application/pdf');
    if (pdf) links.push({ rel: 'pdf', url: pdf.URL });

    return createRecord({
        source: Source.CrossRef,
        id: doi,
        title: stripTags(work.title?.[0]),
        authors: (work.author ?? []).map(authorName),
        publication_date: workDate(work),
        abstract: stripTags(work.abstract),
        raw_metadata: {
            doi,
            type: work.type ?? null,
            publisher: work.publisher ?? null,
            journal: work['container-title']?.[0] ?? null,
            volume: work.volume ?? null,
            issue: work.issue ?? null,
            page: work.page ?? null,
            issn: work.ISSN ?? [],
            subjects: work.subject ?? [],
            citation_count: work['is-referenced-by-count'] ?? null,
            orcids: (work.author ?? []).map((author) => author.ORCID ?? null),
        },
        links,
    });
}

/**
 * `/works` query parameters for a search request.
 */
export function buildCrossRefParams(query: string, filters: RequestFilters, now = Date.now()): URLSearchParams {
    const params = new URLSearchParams();

    const fields = (filters.fields ?? []).filter((field): field is Exclude<SearchField, 'all'> => field !== 'all');
    if (fields.length === 0) {
        params.set('query', query);
    } else {
        for (const field of fields) params.set(FIELD_PARAMS[field], query);
    }

    const filter: string[] = [];
    if (filters.dateFrom) filter.push(`from-pub-date:${filters.dateFrom}`);
    if (filters.dateTo) filter.push(`until-pub-date:${filters.dateTo}`);
    if (filters.recentDays !== undefined) {
        const since = new Date(now - filters.recentDays * MS_PER_DAY).toISOString().slice(0, 10);
        filter.push(`from-index-date:${since}`);
    }
    if (filter.length > 0) params.set('filter', filter.join(','));

    if (filters.sort === 'date') {
        params.set('sort', 'published');
        params.set('order', 'desc');
    }
    return params;
}

/**
 * CrossRef REST adapter. The polite pool is joined through the `mailto`
 * parameter configured as the source's auth.
 */
export class CrossRefAdapter implements SourceAdapter {
    readonly name = 'CrossRef';
    readonly source = Source.CrossRef;
    readonly maxPageSize = 1000;

    constructor(private readonly now: () => number = Date.now) {}

    async searchPage(
        request: SearchRequest,
        cursor: SearchCursor,
        pageSize: number,
        ctx: AdapterContext
    ): Promise<SearchPage> {
        const size = Math.min(pageSize, this.maxPageSize);
        const params = buildCrossRefParams(request.query, request.filters, this.now());
        params.set('rows', String(size));
        params.set('offset', String(cursor.offset));

        const response = await ctx.getJson<CrossRefListResponse>(this.buildUrl(ctx, '/works', params));
        // a decoded body is not guaranteed to be an object (`null` decodes fine)
        const body = response.data;
        const message = isRecord(body) ? body.message : undefined;
        if (!isRecord(message) || !Array.isArray(message.items)) {
            throw new FetchError('ParseError', 'CrossRef response has no message.items', { source: ctx.source });
        }

        const records = message.items
            .map(normalizeCrossRefWork)
            .filter((record): record is NormalizedRecord => record !== null);
        const total = typeof message['total-results'] === 'number' ? message['total-results'] : null;
        const nextOffset = cursor.offset + size;

        ctx.logger.debug({ source: ctx.source, resultCount: records.length, total }, 'CrossRef search page');

        return {
            records,
            total,
            next:
                records.length > 0 && (total === null || nextOffset < total) && nextOffset <= MAX_OFFSET
                    ? { offset: nextOffset }
                    : null,
        };
    }

    async fetch(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        const doi = stripDoiPrefix(id);
        if (!doi || !doi.startsWith('10.')) {
            throw new FetchError('Fatal', `Invalid DOI "${id}"`, { source: ctx.source });
        }

        const url = this.buildUrl(ctx, `/works/${encodeURIComponent(doi)}`, new URLSearchParams());
        const response = await ctx.getJson<CrossRefWorkResponse>(url);
        const body = response.data;
        const work = isRecord(body) ? body.message : undefined;
        const record = isRecord(work) ? normalizeCrossRefWork(work) : null;
        if (!record) {
            throw new FetchError('ParseError', `CrossRef response for ${doi} has no work`, { source: ctx.source });
        }
        return record;
    }

    async fetchMetadata(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        return this.fetch(id, ctx);
    }

    private buildUrl(ctx: AdapterContext, path: string, params: URLSearchParams): string {
        if (ctx.config.auth?.value) {
            params.set(ctx.config.auth.param, ctx.config.auth.value);
        }
        const query = params.toString();
        return `${ctx.config.baseUrl}${path}${query ? `?${query}` : ''}`;
    }
}

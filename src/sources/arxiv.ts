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
import { cleanText, extractArxivId, parseXml, stripDoiPrefix, xmlText } from './utils.js';

/*
arXiv Atom feed as decoded by xml2js
*/
type XmlNode = string | { _?: string; $?: Record<string, string> };

interface ArxivLinkXml {
    $?: { href?: string; rel?: string; title?: string; type?: string };
}

interface ArxivEntryXml {
    id?: XmlNode[];
    title?: XmlNode[];
    summary?: XmlNode[];
    author?: Array<{ name?: XmlNode[] }>;
    published?: XmlNode[];
    updated?: XmlNode[];
    link?: ArxivLinkXml[];
    category?: Array<{ $?: { term?: string } }>;
    'arxiv:primary_category'?: Array<{ $?: { term?: string } }>;
    'arxiv:doi'?: XmlNode[];
    'arxiv:journal_ref'?: XmlNode[];
    'arxiv:comment'?: XmlNode[];
}

export interface ArxivFeedXml {
    feed?: {
        entry?: ArxivEntryXml[];
        'opensearch:totalResults'?: XmlNode[];
    };
}

const FIELD_PREFIXES: Record<SearchField, string> = {
    title: 'ti',
    abstract: 'abs',
    author: 'au',
    all: 'all',
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function first(nodes: XmlNode[] | undefined): string {
    return cleanText(xmlText(nodes?.[0]));
}

function withoutVersion(id: string): string {
    return id.replace(/v\d+$/, '');
}

function lastDayOfMonth(year: number, month: number): number {
    // day 0 of the following month
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * `YYYY[-MM[-DD]]` → arXiv's `YYYYMMDDHHMM`, at the start or the end of the period.
 */
function submittedDate(date: string, end: boolean): string {
    const [year = '', month, day] = date.split('-');
    const mm = month ?? (end ? '12' : '01');
    const dd = day ?? (end ? String(lastDayOfMonth(Number(year), Number(mm))).padStart(2, '0') : '01');
    return `${year}${mm}${dd}${end ? '2359' : '0000'}`;
}

function compactDate(date: Date): string {
    return date.toISOString().slice(0, 16).replace(/[-T:]/g, '');
}

/**
 * Build the `search_query` expression: every query word under each requested
 * field prefix, plus a `submittedDate` range for the date filters.
 */
export function buildArxivQuery(query: string, filters: RequestFilters, now = Date.now()): string {
    const fields: readonly SearchField[] = filters.fields && filters.fields.length > 0 ? filters.fields : ['all'];
    const words = query
        .split(/\s+/)
        .map((word) => word.replace(/[()"]/g, ''))
        .filter((word) => word.length > 0);

    const groups = fields.map((field) => words.map((word) => `${FIELD_PREFIXES[field]}:${word}`).join(' AND '));
    const clauses = [groups.length === 1 ? (groups[0] ?? '') : `(${groups.map((g) => `(${g})`).join(' OR ')})`];

    if (filters.dateFrom || filters.dateTo) {
        const from = filters.dateFrom ? submittedDate(filters.dateFrom, false) : '000001010000';
        const to = filters.dateTo ? submittedDate(filters.dateTo, true) : '999912312359';
        clauses.push(`submittedDate:[${from} TO ${to}]`);
    }
    if (filters.recentDays !== undefined) {
        const from = compactDate(new Date(now - filters.recentDays * MS_PER_DAY));
        clauses.push(`submittedDate:[${from} TO ${compactDate(new Date(now))}]`);
    }

    return clauses.join(' AND ');
}

/**
 * Normalize one Atom `<entry>`. Returns null for arXiv's error entries.
 */
export function normalizeArxivEntry(entry: ArxivEntryXml): NormalizedRecord | null {
    const absUrl = first(entry.id);
    const versioned = extractArxivId(absUrl);
    if (!versioned || first(entry.title) === 'Error') return null;

    const id = withoutVersion(versioned);
    const version = versioned.match(/v(\d+)$/)?.[1];
    const doi = stripDoiPrefix(first(entry['arxiv:doi']));
    const pdfUrl = entry.link?.find((link) => link.$?.title === 'pdf')?.$?.href;
    const published = first(entry.published);

    const links: RecordLink[] = [{ rel: 'landing', url: `https://arxiv.org/abs/${id}` }];
    if (pdfUrl) links.push({ rel: 'pdf', url: pdfUrl });
    if (doi) links.push({ rel: 'doi', url: `https://doi.org/${doi}` });

    return createRecord({
        source: Source.ArXiv,
        id,
        title: first(entry.title),
        authors: (entry.author ?? []).map((author) => first(author.name)),
        publication_date: published ? published.slice(0, 10) : null,
        abstract: first(entry.summary),
        raw_metadata: {
            arxiv_id: id,
            version: version ? Number(version) : null,
            doi,
            primary_category: entry['arxiv:primary_category']?.[0]?.$?.term ?? null,
            categories: (entry.category ?? [])
                .map((category) => category.$?.term ?? '')
                .filter((term) => term.length > 0),
            journal_ref: first(entry['arxiv:journal_ref']) || null,
            comment: first(entry['arxiv:comment']) || null,
            updated: first(entry.updated) || null,
        },
        links,
    });
}

/**
 * arXiv adapter (Atom API at export.arxiv.org). arXiv has no separate summary
 * call: metadata and full records are the same entry.
 */
export class ArxivAdapter implements SourceAdapter {
    readonly name = 'arXiv';
    readonly source = Source.ArXiv;
    readonly maxPageSize = 100;

    constructor(private readonly now: () => number = Date.now) {}

    async searchPage(
        request: SearchRequest,
        cursor: SearchCursor,
        pageSize: number,
        ctx: AdapterContext
    ): Promise<SearchPage> {
        const size = Math.min(pageSize, this.maxPageSize);
        const params = new URLSearchParams({
            search_query: buildArxivQuery(request.query, request.filters, this.now()),
            start: String(cursor.offset),
            max_results: String(size),
            sortBy: request.filters.sort === 'date' ? 'submittedDate' : 'relevance',
            sortOrder: 'descending',
        });

        const feed = await this.query(params, ctx);
        const records = this.entries(feed);
        const totalText = first(feed.feed?.['opensearch:totalResults']);
        const total = totalText ? parseInt(totalText, 10) : NaN;
        const nextOffset = cursor.offset + size;

        ctx.logger.debug({ source: ctx.source, resultCount: records.length, total }, 'arXiv search page');

        return {
            records,
            total: isNaN(total) ? null : total,
            next: records.length > 0 && (isNaN(total) || nextOffset < total) ? { offset: nextOffset } : null,
        };
    }

    async fetch(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        const arxivId = extractArxivId(id);
        if (!arxivId) {
            throw new FetchError('Fatal', `Invalid arXiv id "${id}"`, { source: ctx.source });
        }

        const feed = await this.query(new URLSearchParams({ id_list: arxivId, max_results: '1' }), ctx);
        const record = this.entries(feed).find((r) => r.id === withoutVersion(arxivId));
        if (!record) {
            throw new FetchError('NotFound', `No arXiv entry with id ${arxivId}`, { source: ctx.source });
        }
        return record;
    }

    async fetchMetadata(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        return this.fetch(id, ctx);
    }

    private async query(params: URLSearchParams, ctx: AdapterContext): Promise<ArxivFeedXml> {
        const response = await ctx.getText(`${ctx.config.baseUrl}/query?${params.toString()}`);
        return parseXml<ArxivFeedXml>(response.data, ctx.source);
    }

    private entries(feed: ArxivFeedXml): NormalizedRecord[] {
        return (feed.feed?.entry ?? [])
            .map(normalizeArxivEntry)
            .filter((record): record is NormalizedRecord => record !== null);
    }
}

import { Source, createRecord, type AdapterContext, type NormalizedRecord, type SearchField, type SearchRequest } from '../types/index.js';
import { FetchError } from '../utils/fetch-error.js';
import { EntrezAdapter, checkEntrezBody, type EntrezHistory, type EntrezParams } from './entrez.js';
import {
    normalizePubMedArticleSet,
    normalizePubMedSummary,
    parseMedlineAbstract,
    stripInlineMarkup,
    type PubMedFetchXml,
} from './pubmed-parser.js';
import { parseXml } from './utils.js';

const FIELD_TAGS: Record<SearchField, string> = {
    title: 'ti',
    abstract: 'tiab',
    author: 'au',
    all: 'all',
};

/** Entrez dates are `YYYY[/MM[/DD]]`. */
function entrezDate(date: string): string {
    return date.replace(/-/g, '/');
}

function withAbstract(record: NormalizedRecord, abstract: string): NormalizedRecord {
    return createRecord({
        ...record,
        authors: [...record.authors],
        raw_metadata: { ...record.raw_metadata },
        links: [...record.links],
        abstract,
    });
}

/**
 * Restrict every word of the query to the requested fields:
 * `cancer therapy` on title and author → `(cancer[ti] AND therapy[ti]) OR (cancer[au] AND therapy[au])`.
 */
export function applyFieldTags(query: string, fields: readonly SearchField[] | undefined): string {
    const tags = (fields ?? []).filter((field) => field !== 'all').map((field) => FIELD_TAGS[field]);
    if (tags.length === 0) return query;

    const words = query.split(/\s+/).filter((word) => word.length > 0);
    const groups = tags.map((tag) => words.map((word) => `${word}[${tag}]`).join(' AND '));
    return groups.length === 1 ? (groups[0] ?? query) : groups.map((group) => `(${group})`).join(' OR ');
}

/**
 * PubMed adapter.
 * Uses NCBI E-utilities: ESearch (history server) + EFetch (XML) for searches and
 * full records, ESummary for metadata, ELink for related articles.
 */
export class PubMedAdapter extends EntrezAdapter {
    readonly name = 'PubMed';
    readonly source = Source.PubMed;
    protected readonly db = 'pubmed';
    protected readonly linkName = 'pubmed_pubmed';

    protected override buildTerm(request: SearchRequest): string {
        const { dateFrom, dateTo, recentDays } = request.filters;
        let term = applyFieldTags(request.query, request.filters.fields);

        // reldate claims datetype, so an explicit range moves into the term
        if (recentDays !== undefined && (dateFrom || dateTo)) {
            const from = entrezDate(dateFrom ?? '1000');
            const to = entrezDate(dateTo ?? '3000');
            term = `(${term}) AND ${from}:${to}[pdat]`;
        }
        return term;
    }

    protected override searchParams(request: SearchRequest): EntrezParams {
        const { dateFrom, dateTo, recentDays, sort } = request.filters;
        const params: EntrezParams = {};

        if (sort === 'date') params['sort'] = 'pub_date';

        if (recentDays !== undefined) {
            params['reldate'] = recentDays;
            params['datetype'] = 'edat';
        } else if (dateFrom || dateTo) {
            // Entrez ignores a range unless both ends are present
            params['mindate'] = entrezDate(dateFrom ?? '1000');
            params['maxdate'] = entrezDate(dateTo ?? '3000');
            params['datetype'] = 'pdat';
        }
        return params;
    }

    protected async fetchHistoryPage(
        history: EntrezHistory,
        offset: number,
        size: number,
        ctx: AdapterContext
    ): Promise<NormalizedRecord[]> {
        const url = this.buildUrl(ctx, 'efetch.fcgi', {
            db: this.db,
            WebEnv: history.webEnv,
            query_key: history.queryKey,
            retstart: offset,
            retmax: size,
            rettype: 'abstract',
            retmode: 'xml',
        });
        return this.efetch(url, ctx);
    }

    async fetch(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        const pmid = this.normalizeId(id, ctx.source);
        const url = this.buildUrl(ctx, 'efetch.fcgi', {
            db: this.db,
            id: pmid,
            rettype: 'abstract',
            retmode: 'xml',
        });
        const record = (await this.efetch(url, ctx)).find((r) => r.id === pmid);
        if (!record) {
            throw new FetchError('NotFound', `No PubMed article with PMID ${pmid}`, { source: ctx.source });
        }
        if (record.abstract !== null) return record;

        // Some citations carry their abstract only in the MEDLINE rendering
        const abstract = await this.medlineAbstract(pmid, ctx);
        return abstract ? withAbstract(record, abstract) : record;
    }

    protected normalizeSummary(doc: unknown): NormalizedRecord | null {
        return normalizePubMedSummary(doc);
    }

    private async medlineAbstract(pmid: string, ctx: AdapterContext): Promise<string | null> {
        const url = this.buildUrl(ctx, 'efetch.fcgi', {
            db: this.db,
            id: pmid,
            rettype: 'medline',
            retmode: 'text',
        });
        const response = await ctx.getText(url);
        checkEntrezBody(response.data, ctx.source);
        return parseMedlineAbstract(response.data);
    }

    private async efetch(url: string, ctx: AdapterContext): Promise<NormalizedRecord[]> {
        const response = await ctx.getText(url);
        checkEntrezBody(response.data, ctx.source);
        const parsed = await parseXml<PubMedFetchXml>(stripInlineMarkup(response.data), ctx.source);
        return normalizePubMedArticleSet(parsed);
    }
}

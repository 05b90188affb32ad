import type {
    AdapterContext,
    NormalizedRecord,
    SearchCursor,
    SearchPage,
    SearchRequest,
    Source,
    SourceAdapter,
} from '../types/index.js';
import { FetchError } from '../utils/fetch-error.js';
import { normalizePubMedSummary } from './pubmed-parser.js';
import { isRecord, readArray, readString } from './utils.js';

/** Maximum number of linked records summarized by `links()`. */
const LINKS_LIMIT = 50;

export type EntrezParams = Record<string, string | number | undefined>;

/**
 * Server-side search handle (Entrez history server).
 */
export interface EntrezHistory {
    webEnv: string;
    queryKey: string;
    count: number;
}

/**
 * Raise the Entrez error reported in a response body, if any.
 * NCBI signals throttling with `{"error":"API rate limit exceeded"}`, whatever the status.
 */
export function checkEntrezBody(body: unknown, source: Source): void {
    let decoded = body;
    if (typeof body === 'string') {
        const trimmed = body.trimStart();
        if (!trimmed.startsWith('{')) return;
        try {
            decoded = JSON.parse(trimmed);
        } catch {
            return; // not JSON: the caller's parser reports it
        }
    }

    const error = readString(decoded, 'error') || readString(decoded, 'ERROR');
    if (!error) return;

    if (/rate limit/i.test(error)) {
        throw new FetchError('RateLimited', `NCBI: ${error}`, { source });
    }
    if (/api[_ ]?key/i.test(error)) {
        throw new FetchError('AuthError', `NCBI: ${error}`, { source });
    }
    throw new FetchError('Fatal', `NCBI: ${error}`, { source });
}

/**
 * Read the history handle and hit count out of an ESearch JSON response.
 */
export function parseESearchHistory(body: unknown, source: Source): EntrezHistory {
    checkEntrezBody(body, source);

    const result = isRecord(body) ? body['esearchresult'] : undefined;
    if (!isRecord(result)) {
        throw new FetchError('ParseError', 'ESearch response has no esearchresult', { source });
    }

    const searchError = readString(result, 'ERROR');
    if (searchError) {
        throw new FetchError('Fatal', `NCBI search error: ${searchError}`, { source });
    }

    const count = parseInt(readString(result, 'count'), 10);
    const webEnv = readString(result, 'webenv');
    const queryKey = readString(result, 'querykey');
    if (isNaN(count)) {
        throw new FetchError('ParseError', 'ESearch response has no count', { source });
    }
    if (count > 0 && (!webEnv || !queryKey)) {
        throw new FetchError('ParseError', 'ESearch response has no history handle', { source });
    }

    return { webEnv, queryKey, count };
}

/**
 * Document summaries of an ESummary JSON response, in `uids` order.
 */
export function parseESummaryDocs(body: unknown, source: Source): unknown[] {
    checkEntrezBody(body, source);

    const result = isRecord(body) ? body['result'] : undefined;
    if (!isRecord(result)) {
        throw new FetchError('ParseError', 'ESummary response has no result', { source });
    }

    return readArray(result, 'uids')
        .filter((uid): uid is string => typeof uid === 'string')
        .map((uid) => result[uid])
        .filter((doc) => isRecord(doc) && !readString(doc, 'error'));
}

/**
 * Linked ids of an ELink JSON response for one link name.
 */
export function parseELinkIds(body: unknown, linkName: string, source: Source): string[] {
    checkEntrezBody(body, source);

    const linkSets = readArray(body, 'linksets');
    if (!isRecord(body) || !Array.isArray(body['linksets'])) {
        throw new FetchError('ParseError', 'ELink response has no linksets', { source });
    }

    return linkSets
        .flatMap((set) => readArray(set, 'linksetdbs'))
        .filter((db) => readString(db, 'linkname') === linkName)
        .flatMap((db) => readArray(db, 'links'))
        .map((id) => (typeof id === 'number' ? String(id) : id))
        .filter((id): id is string => typeof id === 'string');
}

function historyFromCursor(cursor: SearchCursor): EntrezHistory | null {
    const state = cursor.state;
    if (!state) return null;
    const webEnv = state['webEnv'];
    const queryKey = state['queryKey'];
    const count = state['count'];
    if (typeof webEnv !== 'string' || typeof queryKey !== 'string' || typeof count !== 'number') {
        return null;
    }
    return { webEnv, queryKey, count };
}

/**
 * Shared base for the NCBI Entrez E-utilities databases.
 *
 * Searches run once through ESearch with `usehistory=y`; every page is then read
 * from the history server with WebEnv/query_key, so paging never re-sends the
 * query. The history handle travels inside the opaque search cursor.
 */
export abstract class EntrezAdapter implements SourceAdapter {
    abstract readonly name: string;
    abstract readonly source: Source;

    /** Entrez database name (`db` parameter) */
    protected abstract readonly db: string;

    /** ELink link name used by `links()` (e.g. `medgen_pubmed`) */
    protected abstract readonly linkName: string;

    readonly maxPageSize: number = 200;

    /**
     * Read one page of records from the history server.
     */
    protected abstract fetchHistoryPage(
        history: EntrezHistory,
        offset: number,
        size: number,
        ctx: AdapterContext
    ): Promise<NormalizedRecord[]>;

    /**
     * Normalize one ESummary document of this database.
     */
    protected abstract normalizeSummary(doc: unknown): NormalizedRecord | null;

    abstract fetch(id: string, ctx: AdapterContext): Promise<NormalizedRecord>;

    /**
     * ESearch term for a request. The default ignores field restrictions.
     */
    protected buildTerm(request: SearchRequest): string {
        return request.query;
    }

    /**
     * Extra ESearch parameters (sorting, date limits).
     */
    protected searchParams(_request: SearchRequest): EntrezParams {
        return {};
    }

    async searchPage(
        request: SearchRequest,
        cursor: SearchCursor,
        pageSize: number,
        ctx: AdapterContext
    ): Promise<SearchPage> {
        const history = historyFromCursor(cursor) ?? (await this.esearch(request, ctx));

        if (history.count === 0 || cursor.offset >= history.count) {
            return { records: [], total: history.count, next: null };
        }

        const size = Math.min(pageSize, this.maxPageSize);
        const records = await this.fetchHistoryPage(history, cursor.offset, size, ctx);
        const nextOffset = cursor.offset + size;

        return {
            records,
            total: history.count,
            next:
                records.length > 0 && nextOffset < history.count
                    ? { offset: nextOffset, state: { ...history } }
                    : null,
        };
    }

    async fetchMetadata(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        const uid = this.normalizeId(id, ctx.source);
        const docs = await this.esummary(this.db, { id: uid }, ctx);
        const record = docs.map((doc) => this.normalizeSummary(doc)).find((r) => r?.id === uid);
        if (!record) {
            throw new FetchError('NotFound', `No ${this.name} record with id ${uid}`, { source: ctx.source });
        }
        return record;
    }

    /**
     * PubMed records linked to `id` (related articles for PubMed itself).
     */
    async links(id: string, ctx: AdapterContext): Promise<NormalizedRecord[]> {
        const uid = this.normalizeId(id, ctx.source);
        const url = this.buildUrl(ctx, 'elink.fcgi', {
            dbfrom: this.db,
            db: 'pubmed',
            id: uid,
            linkname: this.linkName,
            retmode: 'json',
        });
        const response = await ctx.getJson<unknown>(url);
        const ids = parseELinkIds(response.data, this.linkName, ctx.source)
            .filter((linked) => linked !== uid)
            .slice(0, LINKS_LIMIT);

        if (ids.length === 0) return [];

        const docs = await this.esummary('pubmed', { id: ids.join(',') }, ctx);
        return docs
            .map((doc) => normalizePubMedSummary(doc))
            .filter((record): record is NormalizedRecord => record !== null);
    }

    // ─── Protected helpers ────────────────────────────────────

    /**
     * E-utilities URL with the database's auth parameter and tool name appended.
     */
    protected buildUrl(ctx: AdapterContext, endpoint: string, params: EntrezParams): string {
        const search = new URLSearchParams();
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined && value !== '') search.set(key, String(value));
        }
        search.set('tool', 'scifetch');
        if (ctx.config.auth?.value) {
            search.set(ctx.config.auth.param, ctx.config.auth.value);
        }
        return `${ctx.config.baseUrl}/${endpoint}?${search.toString()}`;
    }

    protected async esearch(request: SearchRequest, ctx: AdapterContext): Promise<EntrezHistory> {
        const url = this.buildUrl(ctx, 'esearch.fcgi', {
            db: this.db,
            term: this.buildTerm(request),
            usehistory: 'y',
            retmax: 0,
            retmode: 'json',
            ...this.searchParams(request),
        });
        const response = await ctx.getJson<unknown>(url);
        const history = parseESearchHistory(response.data, ctx.source);
        ctx.logger.debug({ source: ctx.source, count: history.count }, 'Entrez search completed');
        return history;
    }

    /**
     * One history page read as ESummary documents of this database.
     */
    protected async summaryHistoryPage(
        history: EntrezHistory,
        offset: number,
        size: number,
        ctx: AdapterContext
    ): Promise<NormalizedRecord[]> {
        const docs = await this.esummary(
            this.db,
            { WebEnv: history.webEnv, query_key: history.queryKey, retstart: offset, retmax: size },
            ctx
        );
        return docs
            .map((doc) => this.normalizeSummary(doc))
            .filter((record): record is NormalizedRecord => record !== null);
    }

    protected async esummary(db: string, params: EntrezParams, ctx: AdapterContext): Promise<unknown[]> {
        const url = this.buildUrl(ctx, 'esummary.fcgi', { db, retmode: 'json', ...params });
        const response = await ctx.getJson<unknown>(url);
        return parseESummaryDocs(response.data, ctx.source);
    }

    /**
     * Entrez UIDs are numeric; anything else is a caller error.
     */
    protected normalizeId(id: string, source: Source): string {
        const uid = id.trim().replace(/^(pmid|uid):\s*/i, '');
        if (!/^\d+$/.test(uid)) {
            throw new FetchError('Fatal', `Invalid ${this.name} id "${id}"`, { source });
        }
        return uid;
    }
}

import { Source, createRecord, type AdapterContext, type NormalizedRecord, type RecordLink } from '../types/index.js';
import { EntrezAdapter, checkEntrezBody, type EntrezHistory } from './entrez.js';
import { PMC_ARTICLE_BASE } from './pubmed-parser.js';
import { cleanText, isRecord, parseLooseDate, readArray, readString, stripDoiPrefix, stripTags } from './utils.js';

/**
 * Abstract of a JATS article as served by PMC EFetch. The plain `<abstract>` wins
 * over graphical or teaser variants; older deposits only carry an abstract section.
 */
export function extractJatsAbstract(xml: string): string | null {
    const abstracts = [...xml.matchAll(/<abstract\b([^>]*)>([\s\S]*?)<\/abstract>/g)];
    const main = abstracts.find((match) => !/abstract-type=/.test(match[1] ?? '')) ?? abstracts[0];
    const section = main ? undefined : xml.match(/<sec\b[^>]*sec-type="abstract"[^>]*>([\s\S]*?)<\/sec>/);

    const text = stripTags(main?.[2] ?? section?.[1]);
    return text || null;
}

/**
 * Normalize a PMC ESummary document. The UID is the numeric part of the PMCID.
 */
export function normalizePmcSummary(doc: unknown): NormalizedRecord | null {
    const uid = readString(doc, 'uid');
    if (!uid || readString(doc, 'error')) return null;

    const articleIds = readArray(doc, 'articleids').filter(isRecord);
    const idOfType = (type: string): string | null => {
        const match = articleIds.find((id) => readString(id, 'idtype') === type);
        return match ? readString(match, 'value') || null : null;
    };
    const pmcid = idOfType('pmcid') ?? `PMC${uid}`;
    const pmid = idOfType('pmid');
    const doi = stripDoiPrefix(idOfType('doi'));

    const links: RecordLink[] = [{ rel: 'landing', url: `${PMC_ARTICLE_BASE}/${pmcid}/` }];
    if (doi) links.push({ rel: 'doi', url: `https://doi.org/${doi}` });

    return createRecord({
        source: Source.PMC,
        id: uid,
        title: cleanText(readString(doc, 'title')),
        authors: readArray(doc, 'authors').map((author) => readString(author, 'name')),
        publication_date: parseLooseDate(readString(doc, 'pubdate')) ?? parseLooseDate(readString(doc, 'epubdate')),
        abstract: null,
        raw_metadata: {
            pmcid,
            pmid: pmid && pmid !== '0' ? pmid : null,
            doi,
            journal: readString(doc, 'fulljournalname') || null,
            journal_abbreviation: readString(doc, 'source') || null,
            volume: readString(doc, 'volume') || null,
            issue: readString(doc, 'issue') || null,
            pages: readString(doc, 'pages') || null,
        },
        links,
    });
}

/**
 * PubMed Central adapter (open-access full-text articles).
 * Search pages and metadata come from ESummary; `fetch` adds the abstract from
 * the article's JATS XML.
 */
export class PmcAdapter extends EntrezAdapter {
    readonly name = 'PMC';
    readonly source = Source.PMC;
    protected readonly db = 'pmc';
    protected readonly linkName = 'pmc_pubmed';

    protected async fetchHistoryPage(
        history: EntrezHistory,
        offset: number,
        size: number,
        ctx: AdapterContext
    ): Promise<NormalizedRecord[]> {
        return this.summaryHistoryPage(history, offset, size, ctx);
    }

    async fetch(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        const summary = await this.fetchMetadata(id, ctx);

        const url = this.buildUrl(ctx, 'efetch.fcgi', { db: this.db, id: summary.id, retmode: 'xml' });
        const response = await ctx.getText(url);
        checkEntrezBody(response.data, ctx.source);

        return createRecord({
            ...summary,
            authors: [...summary.authors],
            raw_metadata: { ...summary.raw_metadata },
            links: [...summary.links],
            abstract: extractJatsAbstract(response.data),
        });
    }

    protected normalizeSummary(doc: unknown): NormalizedRecord | null {
        return normalizePmcSummary(doc);
    }

    /** Accepts `PMC1234567` as well as the bare UID. */
    protected override normalizeId(id: string, source: Source): string {
        return super.normalizeId(id.trim().replace(/^pmc/i, ''), source);
    }
}

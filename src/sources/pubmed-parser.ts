import { createRecord, Source, type NormalizedRecord, type RecordLink } from '../types/index.js';
import { cleanText, formatDate, isRecord, parseLooseDate, readArray, readString, stripDoiPrefix, xmlText } from './utils.js';

/**
 * PubMed EFetch XML as decoded by xml2js (subset of relevant fields).
 */
type XmlNode = string | { _?: string; $?: Record<string, string> };

interface PubMedDateXml {
    Year?: XmlNode[];
    Month?: XmlNode[];
    Day?: XmlNode[];
    MedlineDate?: XmlNode[];
}

interface PubMedAuthorXml {
    LastName?: XmlNode[];
    ForeName?: XmlNode[];
    Initials?: XmlNode[];
    CollectiveName?: XmlNode[];
}

interface PubMedArticleXml {
    MedlineCitation?: Array<{
        PMID?: XmlNode[];
        Article?: Array<{
            ArticleTitle?: XmlNode[];
            Abstract?: Array<{ AbstractText?: XmlNode[] }>;
            AuthorList?: Array<{ Author?: PubMedAuthorXml[] }>;
            Journal?: Array<{
                Title?: XmlNode[];
                ISOAbbreviation?: XmlNode[];
                JournalIssue?: Array<{
                    Volume?: XmlNode[];
                    Issue?: XmlNode[];
                    PubDate?: PubMedDateXml[];
                }>;
            }>;
            ELocationID?: XmlNode[];
            ArticleDate?: PubMedDateXml[];
            PublicationTypeList?: Array<{ PublicationType?: XmlNode[] }>;
            Language?: XmlNode[];
        }>;
        MeshHeadingList?: Array<{ MeshHeading?: Array<{ DescriptorName?: XmlNode[] }> }>;
        KeywordList?: Array<{ Keyword?: XmlNode[] }>;
    }>;
    PubmedData?: Array<{
        ArticleIdList?: Array<{ ArticleId?: XmlNode[] }>;
    }>;
}

/** An empty `<PubmedArticleSet/>` decodes to an empty string. */
export interface PubMedFetchXml {
    PubmedArticleSet?: string | { PubmedArticle?: PubMedArticleXml[] };
}

export const PUBMED_LANDING_BASE = 'https://pubmed.ncbi.nlm.nih.gov';
export const PMC_ARTICLE_BASE = 'https://www.ncbi.nlm.nih.gov/pmc/articles';

/** Inline formatting PubMed allows inside titles and abstracts, MathML included. */
const INLINE_MARKUP = /<\/?(?:i|b|u|sup|sub|mml:[\w.-]+)(?:\s[^>]*)?\/?>/gi;

/**
 * Drop inline formatting tags and keep their text. xml2js would otherwise file the
 * text of `<i>TP53</i>` under a child key, out of reach of the element's own text.
 */
export function stripInlineMarkup(xml: string): string {
    return xml.replace(INLINE_MARKUP, '');
}

function attr(node: XmlNode | undefined, name: string): string {
    if (!node || typeof node === 'string') return '';
    return node.$?.[name] ?? '';
}

function texts(nodes: XmlNode[] | undefined): string[] {
    return (nodes ?? []).map((node) => cleanText(xmlText(node))).filter((text) => text.length > 0);
}

/**
 * "ForeName LastName", or the collective name for group authors.
 */
function formatAuthorName(author: PubMedAuthorXml): string {
    const collective = texts(author.CollectiveName)[0];
    if (collective) return collective;

    const lastName = texts(author.LastName)[0] ?? '';
    const foreName = texts(author.ForeName)[0] ?? texts(author.Initials)[0] ?? '';
    return `${foreName} ${lastName}`.trim();
}

/**
 * Abstract text, with the sections of a structured abstract prefixed by their label.
 */
function extractAbstract(nodes: XmlNode[] | undefined): string | null {
    const sections = (nodes ?? [])
        .map((node) => {
            const text = cleanText(xmlText(node));
            const label = attr(node, 'Label');
            return label && text ? `${label}: ${text}` : text;
        })
        .filter((text) => text.length > 0);

    return sections.length > 0 ? sections.join(' ') : null;
}

function extractDate(date: PubMedDateXml | undefined): string | null {
    if (!date) return null;

    const year = texts(date.Year)[0];
    if (year) {
        return formatDate(year, texts(date.Month)[0], texts(date.Day)[0]);
    }

    // MedlineDate format: "2023 Jan-Feb" or "2023 Spring"
    const medline = texts(date.MedlineDate)[0];
    const match = medline?.match(/^(\d{4})/);
    return match?.[1] ?? null;
}

function recordLinks(pmid: string, doi: string | null, pmcid: string | null): RecordLink[] {
    const links: RecordLink[] = [{ rel: 'landing', url: `${PUBMED_LANDING_BASE}/${pmid}/` }];
    if (doi) links.push({ rel: 'doi', url: `https://doi.org/${doi}` });
    if (pmcid) links.push({ rel: 'pmc', url: `${PMC_ARTICLE_BASE}/${pmcid}/` });
    return links;
}

/**
 * Normalize one `<PubmedArticle>`; returns null when it has no PMID.
 */
export function normalizePubMedArticle(article: PubMedArticleXml): NormalizedRecord | null {
    const citation = article.MedlineCitation?.[0];
    const pmid = texts(citation?.PMID)[0];
    if (!citation || !pmid) return null;

    const data = citation.Article?.[0];
    const journal = data?.Journal?.[0];
    const issue = journal?.JournalIssue?.[0];

    const articleIds = article.PubmedData?.[0]?.ArticleIdList?.[0]?.ArticleId ?? [];
    const idOfType = (type: string): string | null => {
        const node = articleIds.find((id) => attr(id, 'IdType') === type);
        return node ? cleanText(xmlText(node)) || null : null;
    };

    const elocationDoi = (data?.ELocationID ?? []).find((loc) => attr(loc, 'EIdType') === 'doi');
    const doi = stripDoiPrefix(idOfType('doi') ?? (elocationDoi ? xmlText(elocationDoi) : null));
    const pmcid = idOfType('pmc');

    const meshTerms = (citation.MeshHeadingList?.[0]?.MeshHeading ?? []).flatMap((heading) =>
        texts(heading.DescriptorName)
    );
    const keywords = (citation.KeywordList ?? []).flatMap((list) => texts(list.Keyword));

    return createRecord({
        source: Source.PubMed,
        id: pmid,
        title: texts(data?.ArticleTitle)[0],
        authors: (data?.AuthorList?.[0]?.Author ?? []).map(formatAuthorName),
        publication_date: extractDate(issue?.PubDate?.[0]) ?? extractDate(data?.ArticleDate?.[0]),
        abstract: extractAbstract(data?.Abstract?.[0]?.AbstractText),
        raw_metadata: {
            pmid,
            journal: texts(journal?.Title)[0] ?? null,
            journal_abbreviation: texts(journal?.ISOAbbreviation)[0] ?? null,
            volume: texts(issue?.Volume)[0] ?? null,
            issue: texts(issue?.Issue)[0] ?? null,
            doi,
            pmcid,
            mesh_terms: meshTerms,
            keywords,
            publication_types: texts(data?.PublicationTypeList?.[0]?.PublicationType),
            language: texts(data?.Language)[0] ?? null,
        },
        links: recordLinks(pmid, doi, pmcid),
    });
}

/**
 * All articles of an EFetch response, in document order.
 */
export function normalizePubMedArticleSet(parsed: PubMedFetchXml): NormalizedRecord[] {
    const set = parsed.PubmedArticleSet;
    if (!set || typeof set === 'string') return [];

    return (set.PubmedArticle ?? [])
        .map(normalizePubMedArticle)
        .filter((record): record is NormalizedRecord => record !== null);
}

/**
 * Normalize an ESummary (JSON, version 1) document summary.
 */
export function normalizePubMedSummary(doc: unknown): NormalizedRecord | null {
    const uid = readString(doc, 'uid');
    if (!uid || readString(doc, 'error')) return null;

    const articleIds = readArray(doc, 'articleids').filter(isRecord);
    const idOfType = (type: string): string | null => {
        const match = articleIds.find((id) => readString(id, 'idtype') === type);
        return match ? readString(match, 'value') || null : null;
    };
    const doi = stripDoiPrefix(idOfType('doi'));
    const pmcid = idOfType('pmc');

    const authors = readArray(doc, 'authors').map((author) => readString(author, 'name'));

    return createRecord({
        source: Source.PubMed,
        id: uid,
        title: cleanText(readString(doc, 'title')),
        authors,
        publication_date: parseLooseDate(readString(doc, 'pubdate')) ?? parseLooseDate(readString(doc, 'epubdate')),
        abstract: null,
        raw_metadata: {
            pmid: uid,
            journal: readString(doc, 'fulljournalname') || null,
            journal_abbreviation: readString(doc, 'source') || null,
            volume: readString(doc, 'volume') || null,
            issue: readString(doc, 'issue') || null,
            pages: readString(doc, 'pages') || null,
            doi,
            pmcid,
            publication_types: readArray(doc, 'pubtype').filter((type): type is string => typeof type === 'string'),
            language: readArray(doc, 'lang').find((lang): lang is string => typeof lang === 'string') ?? null,
        },
        links: recordLinks(uid, doi, pmcid),
    });
}

/**
 * The `AB` field of a MEDLINE-format record, with its continuation lines joined.
 */
export function parseMedlineAbstract(medline: string): string | null {
    const lines = medline.split(/\r?\n/);
    const start = lines.findIndex((line) => /^AB {2}- /.test(line));
    if (start < 0) return null;

    const parts = [lines[start]?.slice(6) ?? ''];
    for (const line of lines.slice(start + 1)) {
        // continuation lines are indented by six spaces
        if (!/^ {6}/.test(line)) break;
        parts.push(line);
    }
    return cleanText(parts.join(' ')) || null;
}

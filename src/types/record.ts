import type { Source } from './source.js';

export type RecordLinkRel = 'landing' | 'doi' | 'pdf' | 'pmc' | 'related';

export interface RecordLink {
    rel: RecordLinkRel;
    url: string;
}

/**
 * NormalizedRecord: the source-agnostic shape every adapter produces.
 * Records are frozen by `createRecord()` and never mutated afterwards.
 */
export interface NormalizedRecord {
    /** Source adapter that produced this record */
    readonly source: Source;

    /** Identifier within the source (PMID, PMC UID, arXiv id, MedGen UID, ClinVar UID, DOI) */
    readonly id: string;

    readonly title: string;

    /** Author display names, in the order the source lists them */
    readonly authors: readonly string[];

    /** `YYYY`, `YYYY-MM` or `YYYY-MM-DD`, as precise as the source allows */
    readonly publication_date: string | null;

    readonly abstract: string | null;

    /** Source-specific fields (journal, MeSH terms, accession, ...) */
    readonly raw_metadata: Readonly<Record<string, unknown>>;

    readonly links: readonly RecordLink[];
}

export interface RecordInit {
    source: Source;
    id: string;
    title?: string | null;
    authors?: string[];
    publication_date?: string | null;
    abstract?: string | null;
    raw_metadata?: Record<string, unknown>;
    links?: RecordLink[];
}

/**
 * Build a frozen NormalizedRecord, filling in the defaults adapters would otherwise repeat.
 */
export function createRecord(init: RecordInit): NormalizedRecord {
    const links = (init.links ?? []).filter((link) => link.url.length > 0);
    return Object.freeze({
        source: init.source,
        id: init.id,
        title: init.title?.trim() || 'Untitled',
        authors: Object.freeze((init.authors ?? []).filter((name) => name.length > 0)),
        publication_date: init.publication_date || null,
        abstract: init.abstract?.trim() || null,
        raw_metadata: Object.freeze({ ...init.raw_metadata }),
        links: Object.freeze(links.map((link) => Object.freeze({ ...link }))),
    });
}

/**
 * Remote scientific databases that scifetch can talk to.
 * Used as the lookup key for adapters, configuration and rate limiters.
 */
export enum Source {
    PubMed = 'pubmed',
    ArXiv = 'arxiv',
    MedGen = 'medgen',
    ClinVar = 'clinvar',
    CrossRef = 'crossref',
    PMC = 'pmc',
}

export const ALL_SOURCES: readonly Source[] = Object.values(Source);

/** Entrez databases share the E-utilities endpoint and its rate limit policy. */
export const ENTREZ_SOURCES: ReadonlySet<Source> = new Set([
    Source.PubMed,
    Source.MedGen,
    Source.ClinVar,
    Source.PMC,
]);

export function isSource(value: string): value is Source {
    return ALL_SOURCES.some((source) => source === value);
}

/**
 * Parse a source name, accepting a few common spellings ("PubMed", "arXiv").
 */
export function parseSource(value: string): Source | null {
    const normalized = value.trim().toLowerCase();
    return isSource(normalized) ? normalized : null;
}

import { Source, createRecord, type AdapterContext, type NormalizedRecord } from '../types/index.js';
import { EntrezAdapter, type EntrezHistory } from './entrez.js';
import { cleanText, isRecord, parseLooseDate, readArray, readString } from './utils.js';

const CLINVAR_VARIATION_BASE = 'https://www.ncbi.nlm.nih.gov/clinvar/variation';

/**
 * Normalize a ClinVar ESummary document (a variation record).
 * Newer summaries carry `germline_classification`; older ones `clinical_significance`.
 */
export function normalizeClinVarSummary(doc: unknown): NormalizedRecord | null {
    const uid = readString(doc, 'uid');
    if (!uid || !isRecord(doc)) return null;

    const classification = isRecord(doc['germline_classification'])
        ? doc['germline_classification']
        : doc['clinical_significance'];

    const significance = readString(classification, 'description') || null;
    const lastEvaluated = parseLooseDate(readString(classification, 'last_evaluated'));
    const genes = readArray(doc, 'genes')
        .map((gene) => readString(gene, 'symbol'))
        .filter((symbol) => symbol.length > 0);
    const traits = readArray(doc, 'trait_set')
        .map((trait) => readString(trait, 'trait_name'))
        .filter((name) => name.length > 0);

    return createRecord({
        source: Source.ClinVar,
        id: uid,
        title: cleanText(readString(doc, 'title')),
        publication_date: lastEvaluated,
        abstract: significance && traits.length > 0 ? `${significance}: ${traits.join('; ')}` : significance,
        raw_metadata: {
            uid,
            accession: readString(doc, 'accession') || null,
            accession_version: readString(doc, 'accession_version') || null,
            variation_type: readString(doc, 'obj_type') || null,
            clinical_significance: significance,
            review_status: readString(classification, 'review_status') || null,
            last_evaluated: lastEvaluated,
            genes,
            traits,
        },
        links: [{ rel: 'landing', url: `${CLINVAR_VARIATION_BASE}/${uid}/` }],
    });
}

/**
 * ClinVar adapter (variation summaries, linked PubMed citations).
 */
export class ClinVarAdapter extends EntrezAdapter {
    readonly name = 'ClinVar';
    readonly source = Source.ClinVar;
    protected readonly db = 'clinvar';
    protected readonly linkName = 'clinvar_pubmed';

    protected async fetchHistoryPage(
        history: EntrezHistory,
        offset: number,
        size: number,
        ctx: AdapterContext
    ): Promise<NormalizedRecord[]> {
        return this.summaryHistoryPage(history, offset, size, ctx);
    }

    async fetch(id: string, ctx: AdapterContext): Promise<NormalizedRecord> {
        return this.fetchMetadata(id, ctx);
    }

    protected normalizeSummary(doc: unknown): NormalizedRecord | null {
        return normalizeClinVarSummary(doc);
    }
}

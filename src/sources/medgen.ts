import { Source, createRecord, type AdapterContext, type NormalizedRecord } from '../types/index.js';
import { EntrezAdapter, type EntrezHistory } from './entrez.js';
import { cleanText, isRecord, parseLooseDate, readString } from './utils.js';

const MEDGEN_BASE = 'https://www.ncbi.nlm.nih.gov/medgen';

/**
 * MedGen definitions come either as a string or as `{ value, source }`.
 */
function readDefinition(doc: unknown): { text: string; source: string | null } {
    if (!isRecord(doc)) return { text: '', source: null };
    const definition = doc['definition'];
    if (typeof definition === 'string') return { text: cleanText(definition), source: null };
    return {
        text: cleanText(readString(definition, 'value')),
        source: readString(definition, 'source') || null,
    };
}

/**
 * Normalize a MedGen ESummary document (a clinical concept).
 */
export function normalizeMedGenSummary(doc: unknown): NormalizedRecord | null {
    const uid = readString(doc, 'uid');
    if (!uid) return null;

    const conceptId = readString(doc, 'conceptid');
    const definition = readDefinition(doc);

    return createRecord({
        source: Source.MedGen,
        id: uid,
        title: cleanText(readString(doc, 'title')),
        publication_date: parseLooseDate(readString(doc, 'modificationdate')),
        abstract: definition.text,
        raw_metadata: {
            uid,
            concept_id: conceptId || null,
            semantic_type: readString(doc, 'semantictype') || null,
            definition_source: definition.source,
        },
        links: [{ rel: 'landing', url: `${MEDGEN_BASE}/${conceptId || uid}` }],
    });
}

/**
 * MedGen adapter. Records are built from ESummary documents only, so
 * `fetch` and `fetchMetadata` return the same record.
 */
export class MedGenAdapter extends EntrezAdapter {
    readonly name = 'MedGen';
    readonly source = Source.MedGen;
    protected readonly db = 'medgen';
    protected readonly linkName = 'medgen_pubmed';

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
        return normalizeMedGenSummary(doc);
    }
}

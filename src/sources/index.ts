import type { SourceAdapter } from '../types/index.js';
import { ArxivAdapter } from './arxiv.js';
import { ClinVarAdapter } from './clinvar.js';
import { CrossRefAdapter } from './crossref.js';
import { MedGenAdapter } from './medgen.js';
import { PmcAdapter } from './pmc.js';
import { PubMedAdapter } from './pubmed.js';

export { EntrezAdapter } from './entrez.js';
export { PubMedAdapter } from './pubmed.js';
export { PmcAdapter } from './pmc.js';
export { MedGenAdapter } from './medgen.js';
export { ClinVarAdapter } from './clinvar.js';
export { ArxivAdapter } from './arxiv.js';
export { CrossRefAdapter } from './crossref.js';

/**
 * One adapter per built-in source.
 */
export function createDefaultAdapters(): SourceAdapter[] {
    return [
        new PubMedAdapter(),
        new ArxivAdapter(),
        new MedGenAdapter(),
        new ClinVarAdapter(),
        new CrossRefAdapter(),
        new PmcAdapter(),
    ];
}

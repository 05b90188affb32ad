/**
 * Shared utilities for source adapters.
 */
import { parseStringPromise } from 'xml2js';
import { FetchError } from '../utils/fetch-error.js';
import type { Source } from '../types/index.js';

/**
 * Parse an XML body with xml2js (arrays for every child, attributes under `$`,
 * text under `_`). Malformed XML becomes a ParseError.
 */
export async function parseXml<T extends object>(xml: string, source: Source): Promise<T> {
    let parsed: T | null;
    try {
        parsed = await parseStringPromise(xml, { explicitArray: true, mergeAttrs: false });
    } catch (error) {
        throw new FetchError('ParseError', `Malformed XML response: ${error instanceof Error ? error.message : String(error)}`, {
            source,
            cause: error,
        });
    }

    // xml2js resolves an empty document to null
    if (!parsed) {
        throw new FetchError('ParseError', 'Empty XML response', { source });
    }
    return parsed;
}

/**
 * Text content of an xml2js node, which is either a string or `{ _: text, $: attrs }`.
 */
export function xmlText(node: unknown): string {
    if (typeof node === 'string') return node;
    if (node && typeof node === 'object' && '_' in node && typeof node._ === 'string') {
        return node._;
    }
    return '';
}

/**
 * Collapse runs of whitespace (arXiv titles and abstracts are hard-wrapped).
 */
export function cleanText(text: string | null | undefined): string {
    return (text ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Remove markup such as the JATS tags CrossRef embeds in abstracts.
 */
export function stripTags(text: string | null | undefined): string {
    return cleanText((text ?? '').replace(/<[^>]+>/g, ' '));
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .trim()
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim() || null;
}

/**
 * Extract arXiv ID from various formats.
 * "https://arxiv.org/abs/2401.01234" → "2401.01234"
 * "arXiv:2401.01234" → "2401.01234"
 * "2401.01234v2" → "2401.01234v2"
 * "http://arxiv.org/abs/hep-th/9901001v1" → "hep-th/9901001v1"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/(?:abs|pdf)\/(\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /arxiv\.org\/(?:abs|pdf)\/([a-z-]+(?:\.[A-Z]{2})?\/\d{7}(?:v\d+)?)/i,
        /arxiv:(\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /^(\d{4}\.\d{4,5}(?:v\d+)?)$/,
        /^([a-z-]+(?:\.[A-Z]{2})?\/\d{7}(?:v\d+)?)$/i,
    ];

    for (const pattern of patterns) {
        const match = input.trim().match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

const MONTHS: Record<string, string> = {
    jan: '01', feb: '02', mar: '03', apr: '04', may: '05', jun: '06',
    jul: '07', aug: '08', sep: '09', oct: '10', nov: '11', dec: '12',
};

/**
 * Build a `YYYY[-MM[-DD]]` date from loosely formatted parts.
 * Months may be numeric or English abbreviations ("Mar").
 */
export function formatDate(
    year: string | number | null | undefined,
    month?: string | number | null,
    day?: string | number | null
): string | null {
    const y = String(year ?? '').trim();
    if (!/^\d{4}$/.test(y)) return null;

    const rawMonth = String(month ?? '').trim().toLowerCase();
    const m = /^\d{1,2}$/.test(rawMonth)
        ? rawMonth.padStart(2, '0')
        : MONTHS[rawMonth.slice(0, 3)];
    if (!m || m === '00') return y;

    const d = String(day ?? '').trim();
    if (!/^\d{1,2}$/.test(d) || d === '0') return `${y}-${m}`;
    return `${y}-${m}-${d.padStart(2, '0')}`;
}

/**
 * Parse dates such as "2023 Jan 15", "2023/01/15", "2023-01-15" or "2023 Spring".
 */
export function parseLooseDate(text: string | null | undefined): string | null {
    const value = (text ?? '').trim();
    if (!value) return null;

    const parts = value.split(/[\s/-]+/);
    const [year, month, day] = parts;
    return formatDate(year, month, day);
}

/**
 * Narrow a decoded JSON value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a string (or number, as text) member of a decoded JSON object.
 */
export function readString(value: unknown, key: string): string {
    if (!isRecord(value)) return '';
    const member = value[key];
    if (typeof member === 'string') return member;
    if (typeof member === 'number') return String(member);
    return '';
}

/**
 * Read an array member of a decoded JSON object ([] when absent).
 */
export function readArray(value: unknown, key: string): unknown[] {
    if (!isRecord(value)) return [];
    const member = value[key];
    return Array.isArray(member) ? member : [];
}

import { Source } from './source.js';

/**
 * Log level options. `silent` disables output entirely (used by the test suite).
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Credential passed through to a source as a query parameter (API key, polite-pool email).
 */
export interface SourceAuth {
    param: string;
    value: string;
}

/**
 * Per-source transport settings.
 */
export interface SourceConfig {
    baseUrl: string;

    /** Token refill rate. 0 disables limiting for the source. */
    requestsPerSecond: number;

    /** Bucket capacity */
    burst: number;

    auth?: SourceAuth;

    /** Cache lifetime of a successful response */
    ttlSeconds: number;

    /** Per-call timeout; exceeding it counts as a transient network error */
    timeoutMs: number;
}

/**
 * Retry configuration for transient failures.
 */
export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

export interface CacheConfig {
    maxEntries: number;
}

/**
 * Full scifetch configuration merged from CLI flags, env vars, and config file.
 */
export interface ScifetchConfig {
    sources: Record<Source, SourceConfig>;
    retry: RetryConfig;
    cache: CacheConfig;

    /** Contact address used in the User-Agent and for polite pools */
    email?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/** NCBI allows 3 requests/second without an API key, 10 with one. */
export const NCBI_RATE_WITHOUT_KEY = 3;
export const NCBI_RATE_WITH_KEY = 10;

function entrezDefaults(): SourceConfig {
    return {
        baseUrl: EUTILS_BASE,
        requestsPerSecond: NCBI_RATE_WITHOUT_KEY,
        burst: NCBI_RATE_WITHOUT_KEY,
        ttlSeconds: 3600,
        timeoutMs: 30000,
    };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ScifetchConfig = {
    sources: {
        [Source.PubMed]: entrezDefaults(),
        [Source.MedGen]: entrezDefaults(),
        [Source.ClinVar]: entrezDefaults(),
        [Source.PMC]: entrezDefaults(),
        [Source.ArXiv]: {
            baseUrl: 'https://export.arxiv.org/api',
            // arXiv asks for at least 3 seconds between requests
            requestsPerSecond: 1 / 3,
            burst: 1,
            ttlSeconds: 3600,
            timeoutMs: 60000,
        },
        [Source.CrossRef]: {
            baseUrl: 'https://api.crossref.org',
            requestsPerSecond: 5,
            burst: 5,
            ttlSeconds: 3600,
            timeoutMs: 30000,
        },
    },
    retry: {
        maxAttempts: 3,
        baseDelayMs: 1000,
        maxDelayMs: 30000,
    },
    cache: {
        maxEntries: 1000,
    },
    logLevel: 'info',
    jsonLogs: false,
};

import { FetchError, cancelledError, isAbortError } from './fetch-error.js';
import { getLogger, type Logger } from './logger.js';
import type { Source } from '../types/index.js';

/**
 * Error classification for HTTP responses.
 */
const TRANSIENT_STATUS_CODES = new Set([408, 500, 502, 503, 504]);
const AUTH_STATUS_CODES = new Set([401, 403]);
const TRANSIENT_ERROR_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'EPIPE',
    'UND_ERR_SOCKET',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
]);

/** Query parameters whose values are credentials or contact details. */
const SENSITIVE_PARAMS = ['api_key', 'mailto', 'email', 'tool'];

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: Source;
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    logger?: Logger;
}

/**
 * Replace credential values in a URL so it can be logged or put in an error message.
 */
export function redactUrl(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return url.replace(/(api_key|mailto|email|tool)=[^&]*/g, '$1=***');
    }

    for (const param of SENSITIVE_PARAMS) {
        if (parsed.searchParams.has(param)) {
            parsed.searchParams.set(param, '***');
        }
    }
    return parsed.toString();
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now = Date.now()): number | null {
    if (!header) return null;

    // Try parsing as seconds
    if (/^\s*\d+(\.\d+)?\s*$/.test(header)) {
        return Math.round(parseFloat(header) * 1000);
    }

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - now);
    }

    return null;
}

/**
 * Map a non-2xx status onto the FetchError taxonomy.
 */
export function classifyStatus(
    status: number,
    statusText: string,
    url: string,
    retryAfterHeader: string | null,
    source?: Source
): FetchError {
    const message = `HTTP ${status}${statusText ? ` ${statusText}` : ''}: ${redactUrl(url)}`;

    if (status === 404 || status === 410) {
        return new FetchError('NotFound', message, { source, status });
    }
    if (status === 429) {
        return new FetchError('RateLimited', message, {
            source,
            status,
            retryAfterMs: parseRetryAfter(retryAfterHeader),
        });
    }
    if (AUTH_STATUS_CODES.has(status)) {
        return new FetchError('AuthError', message, { source, status });
    }
    if (TRANSIENT_STATUS_CODES.has(status) || status >= 500) {
        return new FetchError('TransientNetworkError', message, { source, status });
    }
    return new FetchError('Fatal', message, { source, status });
}

function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    // undici wraps socket errors: TypeError('fetch failed', { cause })
    const cause = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

/**
 * Wire transport shared by all adapters. Applies the per-call timeout, the polite
 * User-Agent, and maps every failure onto a FetchError. Rate limiting and retry
 * live in the coordinator.
 */
export class HttpClient {
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly logger: Logger;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        const version = options.version ?? '0.1.0';
        this.userAgent = options.email
            ? `scifetch/${version} (mailto:${options.email})`
            : `scifetch/${version}`;
        this.logger = options.logger ?? getLogger();
    }

    /**
     * GET a URL and return the body as text.
     */
    async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
        return this.request(url, options);
    }

    /**
     * GET a URL and decode the body as JSON.
     */
    async getJson<T>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const response = await this.request(url, options);
        let data: T;
        try {
            data = JSON.parse(response.data);
        } catch (error) {
            throw new FetchError('ParseError', `Malformed JSON from ${redactUrl(url)}`, {
                source: options.source,
                status: response.status,
                cause: error,
            });
        }
        return { ...response, data };
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private async request(url: string, options: HttpRequestOptions): Promise<HttpResponse<string>> {
        const { headers = {}, timeout = this.defaultTimeout, source, signal } = options;

        if (signal?.aborted) {
            throw cancelledError(signal, source);
        }

        const countKey = source ?? 'default';
        this.requestCounts.set(countKey, (this.requestCounts.get(countKey) ?? 0) + 1);

        const safeUrl = redactUrl(url);
        this.logger.debug({ source, url: safeUrl }, 'HTTP GET');

        const controller = new AbortController();
        const timeoutError = new FetchError('TransientNetworkError', `Request timeout after ${timeout}ms: ${safeUrl}`, {
            source,
        });
        const timeoutId = setTimeout(() => controller.abort(timeoutError), timeout);
        const onAbort = () => controller.abort(signal?.reason);
        signal?.addEventListener('abort', onAbort, { once: true });

        let response: Response;
        let text: string;
        try {
            response = await fetch(url, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent, ...headers },
                signal: controller.signal,
            });
            text = await response.text();
        } catch (error) {
            throw this.classifyNetworkError(error, controller.signal, safeUrl, source);
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onAbort);
        }

        // Build headers map
        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            responseHeaders[key] = value;
        });

        if (!response.ok) {
            throw classifyStatus(response.status, response.statusText, url, response.headers.get('retry-after'), source);
        }

        return { status: response.status, headers: responseHeaders, data: text, ok: true };
    }

    private classifyNetworkError(error: unknown, signal: AbortSignal, safeUrl: string, source?: Source): FetchError {
        if (error instanceof FetchError) return error;

        if (signal.aborted) {
            // Timeout or caller cancellation, depending on the abort reason
            return cancelledError(signal, source);
        }

        if (isAbortError(error)) {
            return new FetchError('Cancelled', `Request aborted: ${safeUrl}`, { source, cause: error });
        }

        const code = errorCode(error);
        const detail = error instanceof Error ? error.message : String(error);

        if ((code && TRANSIENT_ERROR_CODES.has(code)) || error instanceof TypeError) {
            return new FetchError('TransientNetworkError', `Network error (${code ?? detail}): ${safeUrl}`, {
                source,
                cause: error,
            });
        }

        return new FetchError('Fatal', `Network error: ${detail}`, { source, cause: error });
    }
}

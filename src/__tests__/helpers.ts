import pino from 'pino';
import { DEFAULT_CONFIG, type AdapterContext, type Source, type SourceConfig } from '../types/index.js';
import type { HttpResponse } from '../utils/http-client.js';

export const silentLogger = pino({ level: 'silent' });

export interface FakeContext {
    ctx: AdapterContext;

    /** Every URL requested, in order */
    urls: string[];
}

/**
 * Adapter context backed by a canned responder instead of the network.
 * The responder receives the URL and returns the response body.
 */
export function fakeContext(
    source: Source,
    respond: (url: string) => string,
    config: Partial<SourceConfig> = {}
): FakeContext {
    const urls: string[] = [];
    const controller = new AbortController();

    const reply = (url: string): HttpResponse<string> => {
        urls.push(url);
        return { status: 200, headers: {}, data: respond(url), ok: true };
    };

    const ctx: AdapterContext = {
        source,
        config: { ...DEFAULT_CONFIG.sources[source], ...config },
        signal: controller.signal,
        logger: silentLogger,
        async getText(url: string) {
            return reply(url);
        },
        async getJson<T>(url: string) {
            const response = reply(url);
            const data: T = JSON.parse(response.data);
            return { ...response, data };
        },
    };

    return { ctx, urls };
}

/**
 * Query parameters of a requested URL.
 */
export function queryOf(url: string): URLSearchParams {
    return new URL(url).searchParams;
}

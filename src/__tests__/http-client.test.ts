import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, classifyStatus, parseRetryAfter, redactUrl } from '../utils/http-client.js';
import { FetchError } from '../utils/fetch-error.js';
import { Source } from '../types/index.js';
import { silentLogger } from './helpers.js';

function hangingFetch() {
    return vi.fn((_url: string, init?: RequestInit) => {
        return new Promise<Response>((_resolve, reject) => {
            const signal = init?.signal;
            if (signal) signal.addEventListener('abort', () => reject(signal.reason));
        });
    });
}

describe('redactUrl', () => {
    it('should mask credential parameters', () => {
        expect(redactUrl('https://eutils.ncbi.nlm.nih.gov/esearch.fcgi?db=pubmed&api_key=test-secret')).toBe(
            'https://eutils.ncbi.nlm.nih.gov/esearch.fcgi?db=pubmed&api_key=***'
        );
        expect(redactUrl('https://api.crossref.org/works?rows=5&mailto=dev%40example.org')).toBe(
            'https://api.crossref.org/works?rows=5&mailto=***'
        );
    });

    it('should leave URLs without credentials alone', () => {
        expect(redactUrl('https://export.arxiv.org/api/query?id_list=2401.00001')).toBe(
            'https://export.arxiv.org/api/query?id_list=2401.00001'
        );
    });

    it('should mask credentials in strings that are not valid URLs', () => {
        expect(redactUrl('relative?api_key=test-secret&db=pubmed')).toBe('relative?api_key=***&db=pubmed');
    });
});

describe('parseRetryAfter', () => {
    it('should read delta seconds', () => {
        expect(parseRetryAfter('2')).toBe(2000);
        expect(parseRetryAfter('1.5')).toBe(1500);
    });

    it('should read an HTTP date relative to now', () => {
        const now = Date.parse('Tue, 21 Oct 2025 07:28:00 GMT');
        expect(parseRetryAfter('Tue, 21 Oct 2025 07:28:05 GMT', now)).toBe(5000);
        expect(parseRetryAfter('Tue, 21 Oct 2025 07:27:00 GMT', now)).toBe(0);
    });

    it('should return null for missing or unreadable values', () => {
        expect(parseRetryAfter(null)).toBeNull();
        expect(parseRetryAfter('soon')).toBeNull();
    });
});

describe('classifyStatus', () => {
    const url = 'https://api.crossref.org/works/10.1000%2Fxyz';

    it.each([
        [404, 'NotFound'],
        [410, 'NotFound'],
        [401, 'AuthError'],
        [403, 'AuthError'],
        [500, 'TransientNetworkError'],
        [503, 'TransientNetworkError'],
        [408, 'TransientNetworkError'],
        [400, 'Fatal'],
    ])('should map HTTP %i to %s', (status, kind) => {
        const error = classifyStatus(status, '', url, null, Source.CrossRef);
        expect(error.kind).toBe(kind);
        expect(error.status).toBe(status);
        expect(error.source).toBe('crossref');
    });

    it('should carry Retry-After on a 429', () => {
        const error = classifyStatus(429, 'Too Many Requests', url, '3', Source.CrossRef);
        expect(error.kind).toBe('RateLimited');
        expect(error.retryAfterMs).toBe(3000);
        expect(error.message).toBe(`HTTP 429 Too Many Requests: ${url}`);
    });

    it('should redact the URL in the message', () => {
        const error = classifyStatus(403, 'Forbidden', 'https://eutils.ncbi.nlm.nih.gov/efetch.fcgi?api_key=test-secret', null);
        expect(error.message).toBe('HTTP 403 Forbidden: https://eutils.ncbi.nlm.nih.gov/efetch.fcgi?api_key=***');
    });
});

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, version: '1.2.3', logger: silentLogger });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.useRealTimers();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount(Source.PubMed)).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should count requests per source and reset', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('ok')));

            await client.getText('https://example.org/a', { source: Source.PubMed });
            await client.getText('https://example.org/b', { source: Source.PubMed });
            await client.getText('https://example.org/c', { source: Source.ArXiv });

            expect(client.getAllRequestCounts()).toEqual({ pubmed: 2, arxiv: 1 });

            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('getText / getJson', () => {
        it('should return the body with lower-cased headers', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn(async () => new Response('<feed/>', { status: 200, headers: { 'Content-Type': 'application/atom+xml' } }))
            );

            const response = await client.getText('https://export.arxiv.org/api/query');

            expect(response).toEqual({
                status: 200,
                ok: true,
                data: '<feed/>',
                headers: { 'content-type': 'application/atom+xml' },
            });
        });

        it('should decode JSON bodies', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('{"message":{"items":[]}}')));

            const response = await client.getJson<{ message: { items: unknown[] } }>('https://api.crossref.org/works');
            expect(response.data.message.items).toEqual([]);
        });

        it('should raise ParseError for a malformed JSON body', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>')));

            const error = await client.getJson('https://api.crossref.org/works', { source: Source.CrossRef }).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(FetchError);
            expect(error).toMatchObject({ kind: 'ParseError', source: 'crossref', status: 200 });
        });

        it('should send a User-Agent naming the tool and contact', async () => {
            const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('ok'));
            vi.stubGlobal('fetch', fetchMock);
            const polite = new HttpClient({ version: '1.2.3', email: 'dev@example.org', logger: silentLogger });

            await polite.getText('https://api.crossref.org/works', { headers: { Accept: 'application/json' } });

            expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
                'User-Agent': 'scifetch/1.2.3 (mailto:dev@example.org)',
                Accept: 'application/json',
            });
        });

        it('should map a 429 response to RateLimited with the server delay', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn(async () => new Response('', { status: 429, statusText: 'Too Many Requests', headers: { 'Retry-After': '2' } }))
            );

            const error = await client.getText('https://eutils.ncbi.nlm.nih.gov/esearch.fcgi', { source: Source.PubMed }).catch(
                (e: unknown) => e
            );
            expect(error).toMatchObject({ kind: 'RateLimited', status: 429, retryAfterMs: 2000, source: 'pubmed' });
        });

        it('should map a 404 response to NotFound', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));

            const error = await client.getText('https://api.crossref.org/works/10.1000%2Fnone').catch((e: unknown) => e);
            expect(error).toMatchObject({ kind: 'NotFound', status: 404 });
        });
    });

    describe('network failures', () => {
        it('should classify a failed connection as transient', async () => {
            const cause = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
            vi.stubGlobal(
                'fetch',
                vi.fn(async () => {
                    throw new TypeError('fetch failed', { cause });
                })
            );

            const error = await client.getText('https://example.org/x').catch((e: unknown) => e);
            expect(error).toMatchObject({ kind: 'TransientNetworkError', message: 'Network error (ECONNRESET): https://example.org/x' });
        });

        it('should time out a stalled call as a transient error', async () => {
            vi.useFakeTimers();
            vi.stubGlobal('fetch', hangingFetch());

            const result = client.getText('https://example.org/slow', { timeout: 100, source: Source.ArXiv }).catch((e: unknown) => e);
            await vi.advanceTimersByTimeAsync(100);

            expect(await result).toMatchObject({
                kind: 'TransientNetworkError',
                message: 'Request timeout after 100ms: https://example.org/slow',
                source: 'arxiv',
            });
        });

        it('should report a caller abort as Cancelled', async () => {
            vi.stubGlobal('fetch', hangingFetch());
            const controller = new AbortController();

            const result = client.getText('https://example.org/slow', { signal: controller.signal }).catch((e: unknown) => e);
            controller.abort();

            expect(await result).toMatchObject({ kind: 'Cancelled' });
        });

        it('should not call fetch when the signal is already aborted', async () => {
            const fetchMock = vi.fn(async () => new Response('ok'));
            vi.stubGlobal('fetch', fetchMock);
            const controller = new AbortController();
            controller.abort();

            const error = await client.getText('https://example.org/x', { signal: controller.signal }).catch((e: unknown) => e);
            expect(error).toMatchObject({ kind: 'Cancelled' });
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });
});

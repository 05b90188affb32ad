import { describe, it, expect } from 'vitest';
import { CrossRefAdapter, buildCrossRefParams, normalizeCrossRefWork, type CrossRefWork } from '../sources/crossref.js';
import { Source } from '../types/index.js';
import { fakeContext } from './helpers.js';

const WORK: CrossRefWork = {
    DOI: '10.1000/xyz.123',
    title: ['Deep <i>learning</i> for tests'],
    author: [{ given: 'Grace', family: 'Hopper', ORCID: 'https://orcid.org/0000-0000-0000-0001' }, { name: 'Test Group' }],
    abstract: '<jats:p>An abstract.</jats:p>',
    type: 'journal-article',
    publisher: 'Test Press',
    issued: { 'date-parts': [[2023, 7]] },
    'container-title': ['Journal of Tests'],
    volume: '5',
    issue: '2',
    page: '1-10',
    ISSN: ['1234-5678'],
    subject: ['Testing'],
    'is-referenced-by-count': 7,
    link: [{ URL: 'https://example.org/paper.pdf', 'content-type': 'application/pdf' }],
};

function listBody(items: CrossRefWork[], total: number): string {
    return JSON.stringify({ status: 'ok', message: { items, 'total-results': total } });
}

describe('normalizeCrossRefWork', () => {
    it('should map a work and strip markup', () => {
        expect(normalizeCrossRefWork(WORK)).toEqual({
            source: 'crossref',
            id: '10.1000/xyz.123',
            title: 'Deep learning for tests',
            authors: ['Grace Hopper', 'Test Group'],
            publication_date: '2023-07',
            abstract: 'An abstract.',
            raw_metadata: {
                doi: '10.1000/xyz.123',
                type: 'journal-article',
                publisher: 'Test Press',
                journal: 'Journal of Tests',
                volume: '5',
                issue: '2',
                page: '1-10',
                issn: ['1234-5678'],
                subjects: ['Testing'],
                citation_count: 7,
                orcids: ['https://orcid.org/0000-0000-0000-0001', null],
            },
            links: [
                { rel: 'doi', url: 'https://doi.org/10.1000/xyz.123' },
                { rel: 'pdf', url: 'https://example.org/paper.pdf' },
            ],
        });
    });

    it('should fall back to the print date and default the title', () => {
        const record = normalizeCrossRefWork({ DOI: '10.1000/a', 'published-print': { 'date-parts': [[2019, 11, 2]] } });
        expect(record?.publication_date).toBe('2019-11-02');
        expect(record?.title).toBe('Untitled');
        expect(record?.abstract).toBeNull();
    });

    it('should return null without a DOI', () => {
        expect(normalizeCrossRefWork({ DOI: '' })).toBeNull();
    });
});

describe('buildCrossRefParams', () => {
    it('should use a free-text query by default', () => {
        expect(buildCrossRefParams('BRCA1 cancer', {}).toString()).toBe('query=BRCA1+cancer');
    });

    it('should map field restrictions onto field queries', () => {
        const params = buildCrossRefParams('hopper', { fields: ['title', 'author'] });
        expect(params.get('query')).toBeNull();
        expect(params.get('query.title')).toBe('hopper');
        expect(params.get('query.author')).toBe('hopper');
    });

    it('should combine date filters and sort by publication date', () => {
        const now = Date.parse('2024-03-10T00:00:00Z');
        const params = buildCrossRefParams('x', { dateFrom: '2020', dateTo: '2021-06', recentDays: 10, sort: 'date' }, now);

        expect(params.get('filter')).toBe('from-pub-date:2020,until-pub-date:2021-06,from-index-date:2024-02-29');
        expect(params.get('sort')).toBe('published');
        expect(params.get('order')).toBe('desc');
    });
});

describe('CrossRefAdapter', () => {
    const adapter = new CrossRefAdapter();

    it('should page with rows and offset and join the polite pool', async () => {
        const { ctx, urls } = fakeContext(Source.CrossRef, () => listBody([WORK], 3), {
            auth: { param: 'mailto', value: 'dev@example.org' },
        });

        const page = await adapter.searchPage({ query: 'BRCA1', filters: {} }, { offset: 0 }, 2, ctx);

        expect(urls[0]).toBe('https://api.crossref.org/works?query=BRCA1&rows=2&offset=0&mailto=dev%40example.org');
        expect(page.total).toBe(3);
        expect(page.records.map((r) => r.id)).toEqual(['10.1000/xyz.123']);
        expect(page.next).toEqual({ offset: 2 });
    });

    it('should stop at the deepest offset the API serves', async () => {
        const { ctx } = fakeContext(Source.CrossRef, () => listBody([WORK], 50000));

        const page = await adapter.searchPage({ query: 'x', filters: {} }, { offset: 9900 }, 1000, ctx);
        expect(page.next).toBeNull();
    });

    it('should raise ParseError when the listing has no items', async () => {
        const { ctx } = fakeContext(Source.CrossRef, () => JSON.stringify({ status: 'ok', message: {} }));

        const error = await adapter.searchPage({ query: 'x', filters: {} }, { offset: 0 }, 10, ctx).catch((e: unknown) => e);
        expect(error).toMatchObject({ kind: 'ParseError', source: 'crossref' });
    });

    it('should raise ParseError for a body that is not an object', async () => {
        const { ctx } = fakeContext(Source.CrossRef, () => 'null');

        const listing = await adapter.searchPage({ query: 'x', filters: {} }, { offset: 0 }, 10, ctx).catch((e: unknown) => e);
        expect(listing).toMatchObject({ kind: 'ParseError', message: 'CrossRef response has no message.items' });

        const work = await adapter.fetch('10.1000/x', ctx).catch((e: unknown) => e);
        expect(work).toMatchObject({ kind: 'ParseError', message: 'CrossRef response for 10.1000/x has no work' });
    });

    it('should fetch a work by DOI, accepting a doi.org URL', async () => {
        const { ctx, urls } = fakeContext(Source.CrossRef, () => JSON.stringify({ status: 'ok', message: WORK }));

        const record = await adapter.fetch('https://doi.org/10.1000/xyz.123', ctx);

        expect(urls[0]).toBe('https://api.crossref.org/works/10.1000%2Fxyz.123');
        expect(record.id).toBe('10.1000/xyz.123');
    });

    it('should reject a value that is not a DOI before any request', async () => {
        const { ctx, urls } = fakeContext(Source.CrossRef, () => '{}');

        const error = await adapter.fetch('nonsense', ctx).catch((e: unknown) => e);
        expect(error).toMatchObject({ kind: 'Fatal', message: 'Invalid DOI "nonsense"' });
        expect(urls).toHaveLength(0);
    });
});

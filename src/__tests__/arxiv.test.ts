import { describe, it, expect } from 'vitest';
import { ArxivAdapter, buildArxivQuery } from '../sources/arxiv.js';
import { Source } from '../types/index.js';
import { fakeContext, queryOf } from './helpers.js';

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/" xmlns:arxiv="http://arxiv.org/schemas/atom">
  <title type="html">ArXiv Query: search_query=all:attention</title>
  <opensearch:totalResults>2</opensearch:totalResults>
  <opensearch:startIndex>0</opensearch:startIndex>
  <entry>
    <id>http://arxiv.org/abs/2401.01234v2</id>
    <updated>2024-02-01T00:00:00Z</updated>
    <published>2024-01-03T18:00:00Z</published>
    <title>Attention over
      test data</title>
    <summary>  We study
      attention. </summary>
    <author><name>Ada Lovelace</name></author>
    <author><name>Alan Turing</name></author>
    <arxiv:doi>10.1000/arxiv.test</arxiv:doi>
    <link href="http://arxiv.org/abs/2401.01234v2" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2401.01234v2" rel="related" type="application/pdf"/>
    <arxiv:primary_category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
    <category term="cs.LG" scheme="http://arxiv.org/schemas/atom"/>
    <category term="stat.ML" scheme="http://arxiv.org/schemas/atom"/>
    <arxiv:comment>12 pages</arxiv:comment>
  </entry>
</feed>`;

const EMPTY_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom" xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">
  <opensearch:totalResults>0</opensearch:totalResults>
</feed>`;

const ERROR_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format_for_1234</id>
    <title>Error</title>
    <summary>incorrect id format for 1234</summary>
  </entry>
</feed>`;

const NOW = Date.parse('2024-03-10T12:30:00Z');

describe('buildArxivQuery', () => {
    it('should search all fields by default', () => {
        expect(buildArxivQuery('graph neural', {})).toBe('all:graph AND all:neural');
    });

    it('should OR the groups of several fields', () => {
        expect(buildArxivQuery('smith', { fields: ['title', 'author'] })).toBe('((ti:smith) OR (au:smith))');
    });

    it('should drop characters that break the query grammar', () => {
        expect(buildArxivQuery('"deep" (learning)', {})).toBe('all:deep AND all:learning');
    });

    it('should add a submittedDate range covering whole periods', () => {
        expect(buildArxivQuery('graph', { dateFrom: '2023', dateTo: '2023-06-30' })).toBe(
            'all:graph AND submittedDate:[202301010000 TO 202306302359]'
        );
    });

    it('should end a month-only range on the last day of that month', () => {
        expect(buildArxivQuery('graph', { dateFrom: '2023-02', dateTo: '2024-02' })).toBe(
            'all:graph AND submittedDate:[202302010000 TO 202402292359]'
        );
        expect(buildArxivQuery('graph', { dateTo: '2023-04' })).toBe(
            'all:graph AND submittedDate:[000001010000 TO 202304302359]'
        );
    });

    it('should leave an open end unbounded', () => {
        expect(buildArxivQuery('graph', { dateTo: '2020' })).toBe('all:graph AND submittedDate:[000001010000 TO 202012312359]');
    });

    it('should derive the range for recentDays from the clock', () => {
        expect(buildArxivQuery('graph', { recentDays: 7 }, NOW)).toBe(
            'all:graph AND submittedDate:[202403031230 TO 202403101230]'
        );
    });
});

describe('ArxivAdapter', () => {
    const adapter = new ArxivAdapter(() => NOW);

    it('should request one page of the Atom API and normalize its entries', async () => {
        const { ctx, urls } = fakeContext(Source.ArXiv, () => FEED);

        const page = await adapter.searchPage({ query: 'attention', filters: {} }, { offset: 0 }, 1, ctx);

        expect(urls[0]).toContain('https://export.arxiv.org/api/query?');
        const params = queryOf(urls[0] ?? '');
        expect(params.get('search_query')).toBe('all:attention');
        expect(params.get('start')).toBe('0');
        expect(params.get('max_results')).toBe('1');
        expect(params.get('sortBy')).toBe('relevance');
        expect(params.get('sortOrder')).toBe('descending');

        expect(page.total).toBe(2);
        expect(page.next).toEqual({ offset: 1 });
        expect(page.records).toEqual([
            {
                source: 'arxiv',
                id: '2401.01234',
                title: 'Attention over test data',
                authors: ['Ada Lovelace', 'Alan Turing'],
                publication_date: '2024-01-03',
                abstract: 'We study attention.',
                raw_metadata: {
                    arxiv_id: '2401.01234',
                    version: 2,
                    doi: '10.1000/arxiv.test',
                    primary_category: 'cs.LG',
                    categories: ['cs.LG', 'stat.ML'],
                    journal_ref: null,
                    comment: '12 pages',
                    updated: '2024-02-01T00:00:00Z',
                },
                links: [
                    { rel: 'landing', url: 'https://arxiv.org/abs/2401.01234' },
                    { rel: 'pdf', url: 'http://arxiv.org/pdf/2401.01234v2' },
                    { rel: 'doi', url: 'https://doi.org/10.1000/arxiv.test' },
                ],
            },
        ]);
    });

    it('should sort by submission date on request', async () => {
        const { ctx, urls } = fakeContext(Source.ArXiv, () => FEED);

        await adapter.searchPage({ query: 'attention', filters: { sort: 'date' } }, { offset: 0 }, 10, ctx);
        expect(queryOf(urls[0] ?? '').get('sortBy')).toBe('submittedDate');
    });

    it('should report the end of the results', async () => {
        const { ctx } = fakeContext(Source.ArXiv, () => EMPTY_FEED);

        const page = await adapter.searchPage({ query: 'nothing', filters: {} }, { offset: 0 }, 10, ctx);
        expect(page).toEqual({ records: [], total: 0, next: null });
    });

    it('should fetch an entry by id, accepting common id forms', async () => {
        const { ctx, urls } = fakeContext(Source.ArXiv, () => FEED);

        const record = await adapter.fetch('arXiv:2401.01234v2', ctx);

        expect(record.id).toBe('2401.01234');
        expect(queryOf(urls[0] ?? '').get('id_list')).toBe('2401.01234v2');
    });

    it('should return the same record for metadata', async () => {
        const { ctx } = fakeContext(Source.ArXiv, () => FEED);
        expect(await adapter.fetchMetadata('https://arxiv.org/abs/2401.01234', ctx)).toEqual(await adapter.fetch('2401.01234', ctx));
    });

    it('should raise NotFound when the feed has no matching entry', async () => {
        const { ctx } = fakeContext(Source.ArXiv, () => ERROR_FEED);

        const error = await adapter.fetch('2401.99999', ctx).catch((e: unknown) => e);
        expect(error).toMatchObject({ kind: 'NotFound', message: 'No arXiv entry with id 2401.99999' });
    });

    it('should reject an unrecognizable id before any request', async () => {
        const { ctx, urls } = fakeContext(Source.ArXiv, () => FEED);

        const error = await adapter.fetch('not-an-id', ctx).catch((e: unknown) => e);
        expect(error).toMatchObject({ kind: 'Fatal', message: 'Invalid arXiv id "not-an-id"' });
        expect(urls).toHaveLength(0);
    });
});

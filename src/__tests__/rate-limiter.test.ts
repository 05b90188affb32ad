import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RateLimiter, TokenBucket } from '../rate-limit/rate-limiter.js';
import { FetchError } from '../utils/fetch-error.js';
import { Source } from '../types/index.js';
import { silentLogger } from './helpers.js';

describe('TokenBucket', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should admit a burst immediately and pace the rest', async () => {
        const bucket = new TokenBucket(1, 2);
        const order: number[] = [];

        const pending = [1, 2, 3].map((n) => bucket.acquire().then(() => order.push(n)));

        await vi.advanceTimersByTimeAsync(0);
        expect(order).toEqual([1, 2]);

        await vi.advanceTimersByTimeAsync(999);
        expect(order).toEqual([1, 2]);

        await vi.advanceTimersByTimeAsync(1);
        await Promise.all(pending);
        expect(order).toEqual([1, 2, 3]);
    });

    it('should serve callers in arrival order', async () => {
        const bucket = new TokenBucket(10, 1);
        const order: number[] = [];

        const pending = [1, 2, 3, 4].map((n) => bucket.acquire().then(() => order.push(n)));
        await vi.advanceTimersByTimeAsync(1000);
        await Promise.all(pending);

        expect(order).toEqual([1, 2, 3, 4]);
    });

    it('should never report tokens outside [0, capacity]', async () => {
        const bucket = new TokenBucket(2, 3);
        expect(bucket.getState().tokens).toBe(3);

        await Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()]);
        expect(bucket.getState().tokens).toBe(0);

        await vi.advanceTimersByTimeAsync(60_000);
        expect(bucket.getState().tokens).toBe(3);
        expect(bucket.getState().capacity).toBe(3);
    });

    it('should release a cancelled caller without delaying the next one', async () => {
        const bucket = new TokenBucket(1, 1);
        await bucket.acquire();

        const controller = new AbortController();
        const cancelled = bucket.acquire(controller.signal);
        const next = bucket.acquire();
        let nextDone = false;
        void next.then(() => {
            nextDone = true;
        });

        controller.abort();
        await expect(cancelled).rejects.toMatchObject({ kind: 'Cancelled' });

        await vi.advanceTimersByTimeAsync(999);
        expect(nextDone).toBe(false);

        await vi.advanceTimersByTimeAsync(1);
        await next;
        expect(nextDone).toBe(true);
    });
});

describe('RateLimiter', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should reject an unknown source with a Fatal error', async () => {
        const limiter = new RateLimiter({ [Source.PubMed]: { requestsPerSecond: 3, burst: 3 } }, { logger: silentLogger });

        const error = await limiter.acquire(Source.ArXiv).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(FetchError);
        expect(error).toMatchObject({ kind: 'Fatal', source: 'arxiv' });
    });

    it('should keep sources independent', async () => {
        const limiter = new RateLimiter(
            {
                [Source.PubMed]: { requestsPerSecond: 1, burst: 1 },
                [Source.ArXiv]: { requestsPerSecond: 1, burst: 1 },
            },
            { logger: silentLogger }
        );

        await limiter.acquire(Source.PubMed);
        let pubmedDone = false;
        const pubmed = limiter.acquire(Source.PubMed).then(() => {
            pubmedDone = true;
        });

        // ArXiv still has its own token while PubMed waits
        await limiter.acquire(Source.ArXiv);
        expect(pubmedDone).toBe(false);

        await vi.advanceTimersByTimeAsync(1000);
        await pubmed;
        expect(pubmedDone).toBe(true);
    });

    it('should treat a zero rate as unbounded and warn', async () => {
        const warn = vi.spyOn(silentLogger, 'warn');
        const limiter = new RateLimiter({ [Source.CrossRef]: { requestsPerSecond: 0, burst: 0 } }, { logger: silentLogger });

        await Promise.all(Array.from({ length: 50 }, () => limiter.acquire(Source.CrossRef)));

        expect(limiter.getState(Source.CrossRef).capacity).toBe(Infinity);
        expect(warn).toHaveBeenCalledTimes(1);
        warn.mockRestore();
    });

    it('should refill every bucket on reset', async () => {
        const limiter = new RateLimiter({ [Source.PubMed]: { requestsPerSecond: 3, burst: 3 } }, { logger: silentLogger });

        await Promise.all([limiter.acquire(Source.PubMed), limiter.acquire(Source.PubMed)]);
        expect(limiter.getState(Source.PubMed).tokens).toBe(1);

        limiter.reset();
        expect(limiter.getState(Source.PubMed).tokens).toBe(3);
    });
});

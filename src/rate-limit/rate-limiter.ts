import { ALL_SOURCES, type Source, type SourceConfig } from '../types/index.js';
import { FetchError, cancelledError } from '../utils/fetch-error.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/timing.js';

/**
 * Snapshot of a bucket. `tokens` is always within [0, capacity].
 */
export interface RateLimitState {
    capacity: number;
    tokens: number;
    lastRefill: number;
}

interface Bucket {
    acquire(signal?: AbortSignal): Promise<void>;
    getState(): RateLimitState;
}

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity. Refill is
 * computed lazily at acquire time; callers are admitted strictly in arrival order.
 */
export class TokenBucket implements Bucket {
    private tokens: number;
    private lastRefill: number;
    private tail: Promise<void> = Promise.resolve();

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    acquire(signal?: AbortSignal): Promise<void> {
        const turn = this.tail.then(() => this.take(signal));
        // The next caller waits for this one to settle, whatever the outcome
        this.tail = turn.then(
            () => undefined,
            () => undefined
        );
        if (!signal) return turn;

        // Release a cancelled caller right away; its turn is skipped when reached
        return new Promise<void>((resolve, reject) => {
            const onAbort = () => reject(cancelledError(signal));
            signal.addEventListener('abort', onAbort, { once: true });
            turn.then(
                () => {
                    signal.removeEventListener('abort', onAbort);
                    resolve();
                },
                (error: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    getState(): RateLimitState {
        const elapsed = Math.max(0, Date.now() - this.lastRefill) / 1000;
        return {
            capacity: this.maxTokens,
            tokens: Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond),
            lastRefill: this.lastRefill,
        };
    }

    private async take(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw cancelledError(signal);

        this.refill();
        while (this.tokens < 1) {
            // Wait until a token is available
            const waitMs = Math.ceil(((1 - this.tokens) / this.tokensPerSecond) * 1000);
            await sleep(waitMs, signal);
            this.refill();
        }
        this.tokens = Math.max(0, this.tokens - 1);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = Math.max(0, now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Bucket for sources configured without a rate. Admits every caller immediately.
 */
class UnboundedBucket implements Bucket {
    async acquire(signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw cancelledError(signal);
    }

    getState(): RateLimitState {
        return { capacity: Infinity, tokens: Infinity, lastRefill: 0 };
    }
}

export type RateLimitSettings = Pick<SourceConfig, 'requestsPerSecond' | 'burst'>;

/**
 * Per-source rate limiter. Each source owns an independent bucket; waiting on one
 * source never delays another.
 */
export class RateLimiter {
    private buckets = new Map<Source, Bucket>();
    private readonly logger: Logger;

    constructor(
        private readonly settings: Partial<Record<Source, RateLimitSettings>>,
        options: { logger?: Logger } = {}
    ) {
        this.logger = options.logger ?? getLogger();
        this.reset();
    }

    /**
     * Wait for a token of `source`. Throws only for an unconfigured source or a
     * cancelled signal.
     */
    async acquire(source: Source, signal?: AbortSignal): Promise<void> {
        const bucket = this.buckets.get(source);
        if (!bucket) {
            throw new FetchError('Fatal', `No rate limit configured for source "${source}"`, { source });
        }
        await bucket.acquire(signal);
    }

    getState(source: Source): RateLimitState {
        const bucket = this.buckets.get(source);
        if (!bucket) {
            throw new FetchError('Fatal', `No rate limit configured for source "${source}"`, { source });
        }
        return bucket.getState();
    }

    /**
     * Drop all bucket state and start every source with a full bucket.
     */
    reset(): void {
        this.buckets.clear();
        for (const source of ALL_SOURCES) {
            const limit = this.settings[source];
            if (!limit) continue;
            this.buckets.set(source, this.createBucket(source, limit));
        }
    }

    private createBucket(source: Source, limit: RateLimitSettings): Bucket {
        if (!limit.requestsPerSecond || limit.requestsPerSecond <= 0) {
            this.logger.warn(
                { source },
                'No rate limit configured; requests are unbounded and may violate the remote API policy'
            );
            return new UnboundedBucket();
        }
        const capacity = Math.max(1, limit.burst || 1);
        return new TokenBucket(limit.requestsPerSecond, capacity);
    }
}

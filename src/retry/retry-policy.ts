import type { RetryConfig, Source } from '../types/index.js';
import { FetchError, cancelledError, toFetchError } from '../utils/fetch-error.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/timing.js';

export interface RetryPolicyOptions extends Partial<RetryConfig> {
    logger?: Logger;

    /** Source of jitter in [0, 1) */
    random?: () => number;
}

export interface ExecuteOptions {
    signal?: AbortSignal;
    source?: Source;
}

/**
 * Bounded retry with exponential backoff and jitter.
 *
 * Only RateLimited and TransientNetworkError failures are retried. A RateLimited
 * error that carries the server's wait time is retried after exactly that wait.
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
    private readonly logger: Logger;
    private readonly random: () => number;

    constructor(options: RetryPolicyOptions = {}) {
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
        this.baseDelayMs = options.baseDelayMs ?? 1000;
        this.maxDelayMs = options.maxDelayMs ?? 30000;
        this.logger = options.logger ?? getLogger();
        this.random = options.random ?? Math.random;
    }

    /**
     * Run `operation` until it succeeds, fails with a non-retryable error, or the
     * attempts run out. Always rejects with a FetchError annotated with the
     * number of attempts made.
     */
    async execute<T>(operation: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
        const { signal, source } = options;

        for (let attempt = 1; ; attempt++) {
            if (signal?.aborted) {
                throw cancelledError(signal, source).withAttempts(attempt - 1);
            }

            let error: FetchError;
            try {
                return await operation(attempt);
            } catch (thrown) {
                error = toFetchError(thrown, source);
            }

            if (!error.retryable || attempt >= this.maxAttempts) {
                throw error.withAttempts(attempt);
            }

            const delayMs = this.delayFor(error, attempt);
            this.logger.warn(
                { source, kind: error.kind, attempt, backoffMs: delayMs },
                'Retryable error, backing off'
            );

            try {
                await sleep(delayMs, signal);
            } catch (thrown) {
                throw toFetchError(thrown, source).withAttempts(attempt);
            }
        }
    }

    /**
     * Wait before the attempt following `attempt` (1-based).
     */
    delayFor(error: FetchError, attempt: number): number {
        if (error.kind === 'RateLimited' && error.retryAfterMs !== null) {
            return error.retryAfterMs;
        }
        return this.backoff(attempt);
    }

    /**
     * Exponential backoff with jitter: min(base * 2^(attempt-1), max) + [0, base).
     */
    backoff(attempt: number): number {
        const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt - 1));
        const jitter = this.random() * this.baseDelayMs;
        return exponential + jitter;
    }
}

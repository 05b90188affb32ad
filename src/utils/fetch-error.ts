import type { Source } from '../types/source.js';

/**
 * Failure taxonomy shared by adapters, the retry policy and the coordinator.
 */
export type FetchErrorKind =
    | 'NotFound'
    | 'RateLimited'
    | 'AuthError'
    | 'TransientNetworkError'
    | 'ParseError'
    | 'Fatal'
    | 'Cancelled';

const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set(['RateLimited', 'TransientNetworkError']);

export interface FetchErrorOptions {
    source?: Source;
    status?: number;
    retryAfterMs?: number | null;
    attempts?: number;
    cause?: unknown;
}

/**
 * Typed error returned to callers. Messages never carry credentials.
 */
export class FetchError extends Error {
    readonly kind: FetchErrorKind;
    readonly source: Source | undefined;
    readonly status: number | undefined;

    /** Server-supplied wait before the next attempt (RateLimited only) */
    readonly retryAfterMs: number | null;

    /** Number of attempts made before this error surfaced */
    readonly attempts: number;

    constructor(kind: FetchErrorKind, message: string, options: FetchErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'FetchError';
        this.kind = kind;
        this.source = options.source;
        this.status = options.status;
        this.retryAfterMs = options.retryAfterMs ?? null;
        this.attempts = options.attempts ?? 1;
    }

    get retryable(): boolean {
        return RETRYABLE_KINDS.has(this.kind);
    }

    /**
     * Copy of this error annotated with the attempt count.
     */
    withAttempts(attempts: number): FetchError {
        return new FetchError(this.kind, this.message, {
            source: this.source,
            status: this.status,
            retryAfterMs: this.retryAfterMs,
            attempts,
            cause: this.cause,
        });
    }

    /**
     * Copy of this error attributed to a source, unless it already is.
     */
    withSource(source: Source): FetchError {
        if (this.source) return this;
        return new FetchError(this.kind, this.message, {
            source,
            status: this.status,
            retryAfterMs: this.retryAfterMs,
            attempts: this.attempts,
            cause: this.cause,
        });
    }

    toJSON(): Record<string, unknown> {
        return {
            kind: this.kind,
            message: this.message,
            source: this.source,
            status: this.status,
            retryAfterMs: this.retryAfterMs,
            attempts: this.attempts,
        };
    }
}

export function isFetchError(error: unknown): error is FetchError {
    return error instanceof FetchError;
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Classify anything thrown by an adapter or transport into a FetchError.
 */
export function toFetchError(error: unknown, source?: Source): FetchError {
    if (error instanceof FetchError) {
        return source ? error.withSource(source) : error;
    }

    if (isAbortError(error)) {
        return new FetchError('Cancelled', 'Request was cancelled', { source, cause: error });
    }

    if (error instanceof SyntaxError) {
        return new FetchError('ParseError', `Malformed response: ${error.message}`, { source, cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new FetchError('Fatal', message, { source, cause: error });
}

/**
 * The error a caller receives when a signal aborts. A FetchError abort reason
 * (such as a timeout) is passed through unchanged.
 */
export function cancelledError(signal: AbortSignal, source?: Source): FetchError {
    const reason: unknown = signal.reason;
    if (reason instanceof FetchError) return reason;
    return new FetchError('Cancelled', 'Request was cancelled', { source, cause: reason });
}

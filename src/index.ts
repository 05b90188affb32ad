/**
 * scifetch: rate-limited, cached access to scientific literature APIs.
 */
export { FetchCoordinator } from './coordinator/fetch-coordinator.js';
export type { FetchCoordinatorOptions, CallOptions, FanOutResult, CoordinatorStats } from './coordinator/fetch-coordinator.js';
export { RateLimiter, TokenBucket } from './rate-limit/rate-limiter.js';
export type { RateLimitState, RateLimitSettings } from './rate-limit/rate-limiter.js';
export { RetryPolicy } from './retry/retry-policy.js';
export type { RetryPolicyOptions, ExecuteOptions } from './retry/retry-policy.js';
export { ResponseCache } from './cache/response-cache.js';
export type { CacheEntry, CacheStats, ResponseCacheOptions, LoadOptions } from './cache/response-cache.js';
export { cacheKey, normalizeSpec } from './cache/cache-key.js';
export {
    createDefaultAdapters,
    EntrezAdapter,
    PubMedAdapter,
    PmcAdapter,
    MedGenAdapter,
    ClinVarAdapter,
    ArxivAdapter,
    CrossRefAdapter,
} from './sources/index.js';
export { FetchError, isFetchError, toFetchError } from './utils/fetch-error.js';
export type { FetchErrorKind } from './utils/fetch-error.js';
export { HttpClient, redactUrl } from './utils/http-client.js';
export type { HttpResponse, HttpRequestOptions } from './utils/http-client.js';
export { resolveConfig, mergeConfig } from './utils/config.js';
export type { ConfigOverrides, ResolveConfigOptions } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export * from './types/index.js';

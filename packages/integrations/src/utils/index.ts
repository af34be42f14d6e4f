/**
 * Utility Functions
 * Rate limiting, retry logic, and helpers
 */

// Rate limiter exports
export {
  createRateLimiter,
  createApiRateLimiter,
  API_RATE_LIMITS,
  type RateLimiterOptions,
} from './rate-limiter.js';

// Retry exports
export {
  withRetry,
  withApiRetry,
  isRetryableError,
  isRateLimitError,
  extractStatusCode,
  AbortError,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
} from './retry.js';

// HTTP exports
export {
  createHttpClient,
  toFetchError,
  parseResponse,
  isRecord,
  type HttpClientOptions,
} from './http.js';

export { chunk } from './batch.js';

/**
 * Retry Utility with Exponential Backoff
 * Retries transient HTTP failures, gives up on everything else
 */

import pRetry, { AbortError } from 'p-retry';
import { FetchError } from '../unified.js';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Number of retry attempts */
  retries: number;
  /** Minimum timeout between retries in milliseconds */
  minTimeout: number;
  /** Maximum timeout between retries in milliseconds */
  maxTimeout: number;
  /** Factor to multiply timeout by on each retry */
  factor?: number;
  /** Whether to randomize timeouts (add jitter) */
  randomize?: boolean;
  /** Callback on each retry attempt */
  onRetry?: (error: Error, attempt: number) => void;
  /** Custom function to determine if error should trigger retry */
  shouldRetry?: (error: Error) => boolean;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  retries: 3,
  minTimeout: 1000,
  maxTimeout: 30000,
  factor: 2,
  randomize: true,
};

// ============================================================================
// Retry Functions
// ============================================================================

/**
 * Execute a function with automatic retries using exponential backoff.
 * An error rejected by `shouldRetry` is rethrown as is.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const mergedOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };

  return pRetry(fn, {
    retries: mergedOptions.retries,
    minTimeout: mergedOptions.minTimeout,
    maxTimeout: mergedOptions.maxTimeout,
    factor: mergedOptions.factor,
    randomize: mergedOptions.randomize,
    onFailedAttempt: (error) => {
      if (mergedOptions.shouldRetry && !mergedOptions.shouldRetry(error)) {
        throw error;
      }

      if (mergedOptions.onRetry && error.retriesLeft > 0) {
        mergedOptions.onRetry(error, error.attemptNumber);
      }
    },
  });
}

/**
 * Retry strategy for marketplace and supplier API calls
 */
export async function withApiRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>
): Promise<T> {
  return withRetry(fn, {
    retries: options?.retries ?? DEFAULT_RETRY_OPTIONS.retries,
    minTimeout: options?.minTimeout ?? DEFAULT_RETRY_OPTIONS.minTimeout,
    maxTimeout: options?.maxTimeout ?? DEFAULT_RETRY_OPTIONS.maxTimeout,
    factor: 2,
    randomize: true,
    shouldRetry: options?.shouldRetry ?? isRetryableError,
    onRetry: (error, attempt) => {
      if (options?.onRetry) {
        options.onRetry(error, attempt);
      } else if (isRateLimitError(error)) {
        console.warn(`Rate limit hit, retrying (attempt ${attempt})...`);
      } else {
        console.warn(`Request failed, retrying (attempt ${attempt}): ${error.message}`);
      }
    },
  });
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Check if an error is retryable (transient)
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof AbortError || error.name === 'AbortError') {
    return false;
  }

  if (error instanceof FetchError) {
    if (error.code === 'NETWORK_ERROR') return true;
  }

  // Network errors
  if (error.message.includes('ECONNREFUSED') ||
      error.message.includes('ECONNRESET') ||
      error.message.includes('ETIMEDOUT') ||
      error.message.includes('ENOTFOUND') ||
      error.message.includes('EAI_AGAIN')) {
    return true;
  }

  const statusCode = extractStatusCode(error);
  if (statusCode) {
    if (statusCode >= 500 && statusCode < 600) return true;
    if (statusCode === 408) return true; // Request Timeout
    if (statusCode === 429) return true; // Too Many Requests
  }

  return false;
}

/**
 * Check if an error is a rate limit error
 */
export function isRateLimitError(error: Error): boolean {
  const statusCode = extractStatusCode(error);
  return statusCode === 429 || error.message.toLowerCase().includes('rate limit');
}

/**
 * Extract HTTP status code from error
 */
export function extractStatusCode(error: Error): number | null {
  if (error instanceof FetchError && error.statusCode !== undefined) {
    return error.statusCode;
  }
  const match = error.message.match(/status(?: code)?[:\s]+(\d{3})/i);
  if (match) {
    return parseInt(match[1], 10);
  }
  return null;
}

export { AbortError };

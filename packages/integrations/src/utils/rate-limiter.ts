/**
 * Rate Limiter Utility
 * Per-API request throttling backed by p-queue
 */

import PQueue from 'p-queue';
import type { IntegrationSource } from '../types.js';

// ============================================================================
// Types
// ============================================================================

export interface RateLimiterOptions {
  /** Maximum concurrent requests */
  concurrency: number;
  /** Time interval in milliseconds */
  intervalMs: number;
  /** Maximum requests per interval */
  maxPerInterval: number;
}

// ============================================================================
// Pre-configured Rate Limits by API
// ============================================================================

export const API_RATE_LIMITS: Record<IntegrationSource, RateLimiterOptions> = {
  ozon: {
    concurrency: 1,
    intervalMs: 1000,
    maxPerInterval: 10,
  },
  'yandex-market': {
    concurrency: 1,
    intervalMs: 60000, // 1 minute
    maxPerInterval: 500,
  },
  casio: {
    concurrency: 1,
    intervalMs: 1000,
    maxPerInterval: 1,
  },
};

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a rate limiter with custom options
 */
export function createRateLimiter(options: RateLimiterOptions): PQueue {
  return new PQueue({
    concurrency: options.concurrency,
    interval: options.intervalMs,
    intervalCap: options.maxPerInterval,
    carryoverConcurrencyCount: false,
    autoStart: true,
  });
}

/**
 * Create a rate limiter for a specific API
 */
export function createApiRateLimiter(source: IntegrationSource): PQueue {
  return createRateLimiter(API_RATE_LIMITS[source]);
}

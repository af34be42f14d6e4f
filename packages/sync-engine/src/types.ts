/**
 * Sync Engine Types
 * Reconciliation results, run reports and runner dependencies
 */

import type {
  DeliveryType,
  ListingUpload,
  MarketplaceClient,
  MarketplaceType,
  PriceUpdate,
  ProductRecord,
  StockUpdate,
  SupplierFeedFetcher,
  UploadError,
} from '@feedsync/integrations';
import type { ValidationError } from './errors.js';

// ============================================================================
// Reconciliation Results
// ============================================================================

export interface SkippedRecord {
  record: ProductRecord;
  error: ValidationError;
}

export interface UploadBatch {
  /** Sorted by identifier */
  uploads: ListingUpload[];
  skipped: SkippedRecord[];
}

export interface StockUpdatePlan {
  updates: StockUpdate[];
  skipped: SkippedRecord[];
}

export interface PriceUpdatePlan {
  updates: PriceUpdate[];
  skipped: SkippedRecord[];
}

// ============================================================================
// Runs
// ============================================================================

/**
 * add-missing: list supplier items the marketplace does not carry yet.
 * sync: refresh stock and price of items already listed.
 */
export type RunMode = 'add-missing' | 'sync';

export const RUN_MODES: readonly RunMode[] = ['add-missing', 'sync'];

export interface RunReport {
  marketplace: MarketplaceType;
  mode: RunMode;
  deliveryType?: DeliveryType;
  /** Listings found on the marketplace */
  listed: number;
  /** Records read from the supplier feed */
  supplied: number;
  /** Listings the run tried to send */
  candidates: number;
  uploaded: string[];
  skipped: SkippedRecord[];
  failed: UploadError[];
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ============================================================================
// Runner Dependencies
// ============================================================================

export interface ReconciliationRunnerDependencies {
  marketplace: MarketplaceClient;
  supplier: SupplierFeedFetcher;
  logger: Logger;
  /** Tag for uploads of a Yandex Market campaign, absent for Ozon */
  deliveryType?: DeliveryType;
}

/**
 * Unified Marketplace Interface
 * Contracts shared by every marketplace client and supplier feed
 */

import type {
  IntegrationSource,
  ListingUpload,
  MarketplaceType,
  PriceUpdate,
  ProductRecord,
  StockUpdate,
} from './types.js';

// ============================================================================
// Unified Types
// ============================================================================

/**
 * Outcome of a batch sent to a marketplace.
 * Every identifier of the batch appears in exactly one of the two lists.
 */
export interface UploadResult {
  succeeded: string[];
  failed: UploadError[];
}

// ============================================================================
// Collaborator Interfaces
// ============================================================================

export interface MarketplaceClient {
  /**
   * The marketplace this client talks to
   */
  readonly marketplace: MarketplaceType;

  /**
   * Identifiers of every listing currently present on the marketplace
   */
  listActiveIdentifiers(): Promise<ReadonlySet<string>>;

  /**
   * Create or update listings with price and stock
   */
  uploadListings(batch: ListingUpload[]): Promise<UploadResult>;

  /**
   * Batch update stock levels of existing listings
   */
  updateStocks(updates: StockUpdate[]): Promise<UploadResult>;

  /**
   * Batch update prices of existing listings
   */
  updatePrices(updates: PriceUpdate[]): Promise<UploadResult>;
}

export interface SupplierFeedFetcher {
  readonly source: IntegrationSource;

  /**
   * Current stock and price of every product in the supplier catalog
   */
  fetchCurrentCatalog(): Promise<ProductRecord[]>;
}

// ============================================================================
// Base Client Implementation
// ============================================================================

export abstract class BaseMarketplaceClient implements MarketplaceClient {
  abstract readonly marketplace: MarketplaceType;

  abstract listActiveIdentifiers(): Promise<ReadonlySet<string>>;
  abstract updateStocks(updates: StockUpdate[]): Promise<UploadResult>;
  abstract updatePrices(updates: PriceUpdate[]): Promise<UploadResult>;

  /**
   * Pushes price first, then stock. An identifier counts as uploaded only when
   * both requests accepted it.
   */
  async uploadListings(batch: ListingUpload[]): Promise<UploadResult> {
    const rejected = this.rejectUploads(batch);
    const rejectedIds = new Set(rejected.map((error) => error.identifier));
    const accepted = batch.filter((upload) => !rejectedIds.has(upload.identifier));
    const identifiers = batch.map((upload) => upload.identifier);

    if (accepted.length === 0) {
      return combineUploadResults(identifiers, { succeeded: [], failed: rejected });
    }

    const priceResult = await this.updatePrices(
      accepted.map((upload) => ({ identifier: upload.identifier, price: upload.price }))
    );
    const stockResult = await this.updateStocks(
      accepted.map((upload) => ({ identifier: upload.identifier, stockQuantity: upload.stockQuantity }))
    );

    return combineUploadResults(
      identifiers,
      { succeeded: [], failed: rejected },
      priceResult,
      stockResult
    );
  }

  /**
   * Uploads this client refuses to send. None by default.
   */
  protected rejectUploads(_batch: ListingUpload[]): UploadError[] {
    return [];
  }

  protected uploadFailure(identifier: string, message: string, code: string): UploadError {
    return new UploadError(message, this.marketplace, identifier, code);
  }
}

/**
 * Merge several partial results over the same identifiers.
 * The first failure reported for an identifier wins.
 */
export function combineUploadResults(
  identifiers: readonly string[],
  ...results: UploadResult[]
): UploadResult {
  const failures = new Map<string, UploadError>();

  for (const result of results) {
    for (const error of result.failed) {
      if (!failures.has(error.identifier)) {
        failures.set(error.identifier, error);
      }
    }
  }

  return {
    succeeded: identifiers.filter((identifier) => !failures.has(identifier)),
    failed: Array.from(failures.values()),
  };
}

// ============================================================================
// Error Classes
// ============================================================================

export type FetchErrorCode =
  | 'NETWORK_ERROR'
  | 'AUTH_ERROR'
  | 'RATE_LIMIT'
  | 'NOT_FOUND'
  | 'SERVER_ERROR'
  | 'BAD_RESPONSE'
  | 'API_ERROR';

export class IntegrationError extends Error {
  constructor(
    message: string,
    public readonly source: IntegrationSource,
    public readonly code: string
  ) {
    super(message);
    this.name = 'IntegrationError';
  }
}

/**
 * A marketplace or the supplier could not be reached, refused the credentials
 * or answered with something unusable. Fatal to a run.
 */
export class FetchError extends IntegrationError {
  constructor(
    message: string,
    source: IntegrationSource,
    public readonly code: FetchErrorCode,
    public readonly statusCode?: number
  ) {
    super(message, source, code);
    this.name = 'FetchError';
  }
}

/**
 * The marketplace rejected a single identifier of a batch
 */
export class UploadError extends IntegrationError {
  constructor(
    message: string,
    public readonly source: MarketplaceType,
    public readonly identifier: string,
    code: string
  ) {
    super(message, source, code);
    this.name = 'UploadError';
  }
}

/**
 * Reconciliation Runner
 * One pass of supplier catalog against one marketplace: read both sides,
 * reconcile, push the result. Steps run strictly in sequence.
 */

import {
  combineUploadResults,
  type DeliveryType,
  type MarketplaceClient,
  type ProductRecord,
  type SupplierFeedFetcher,
  type UploadError,
  type UploadResult,
} from '@feedsync/integrations';
import {
  computePriceUpdates,
  computeStockUpdates,
  computeUploadBatch,
} from './services/reconciliation.js';
import type {
  Logger,
  ReconciliationRunnerDependencies,
  RunMode,
  RunReport,
  SkippedRecord,
} from './types.js';

const emptyResult = (): UploadResult => ({ succeeded: [], failed: [] });

export class ReconciliationRunner {
  private readonly marketplace: MarketplaceClient;
  private readonly supplier: SupplierFeedFetcher;
  private readonly logger: Logger;
  private readonly deliveryType?: DeliveryType;

  constructor(deps: ReconciliationRunnerDependencies) {
    this.marketplace = deps.marketplace;
    this.supplier = deps.supplier;
    this.logger = deps.logger;
    this.deliveryType = deps.deliveryType;
  }

  /**
   * Upload supplier items the marketplace does not list yet.
   * FetchError from either side aborts the run.
   */
  async addMissingListings(): Promise<RunReport> {
    const { known, records } = await this.readBothSides();

    const batch = computeUploadBatch(known, records, this.deliveryType);
    this.reportSkipped(batch.skipped);
    this.logger.debug(`Upload candidates: ${batch.uploads.map((u) => u.identifier).join(', ') || 'none'}`);

    let result = emptyResult();
    if (batch.uploads.length === 0) {
      this.logger.info(`Nothing to upload to ${this.target()}`);
    } else {
      this.logger.info(`Uploading ${batch.uploads.length} new listings to ${this.target()}`);
      result = await this.marketplace.uploadListings(batch.uploads);
    }

    return this.finish('add-missing', known, records, batch.uploads.length, batch.skipped, result);
  }

  /**
   * Refresh stock and price of every listing. Listings missing from the
   * supplier catalog are zeroed.
   */
  async syncExistingListings(): Promise<RunReport> {
    const { known, records } = await this.readBothSides();

    const stockPlan = computeStockUpdates(known, records);
    const pricePlan = computePriceUpdates(known, records);
    const skipped = mergeSkipped(stockPlan.skipped, pricePlan.skipped);
    this.reportSkipped(skipped);

    let stockResult = emptyResult();
    if (stockPlan.updates.length > 0) {
      this.logger.info(`Updating stock of ${stockPlan.updates.length} listings on ${this.target()}`);
      stockResult = await this.marketplace.updateStocks(stockPlan.updates);
    }

    let priceResult = emptyResult();
    if (pricePlan.updates.length > 0) {
      this.logger.info(`Updating price of ${pricePlan.updates.length} listings on ${this.target()}`);
      priceResult = await this.marketplace.updatePrices(pricePlan.updates);
    }

    const identifiers = stockPlan.updates.map((update) => update.identifier);
    const result = combineUploadResults(identifiers, stockResult, priceResult);

    return this.finish('sync', known, records, identifiers.length, skipped, result);
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private async readBothSides(): Promise<{ known: ReadonlySet<string>; records: ProductRecord[] }> {
    const known = await this.marketplace.listActiveIdentifiers();
    this.logger.info(`Found ${known.size} listings on ${this.target()}`);

    const records = await this.supplier.fetchCurrentCatalog();
    this.logger.info(`Read ${records.length} records from ${this.supplier.source} feed`);

    return { known, records };
  }

  private finish(
    mode: RunMode,
    known: ReadonlySet<string>,
    records: readonly ProductRecord[],
    candidates: number,
    skipped: SkippedRecord[],
    result: UploadResult
  ): RunReport {
    this.reportFailures(result.failed);
    this.logger.info(
      `${mode} on ${this.target()} done: ${result.succeeded.length} sent, ` +
        `${result.failed.length} failed, ${skipped.length} skipped`
    );

    return {
      marketplace: this.marketplace.marketplace,
      mode,
      ...(this.deliveryType ? { deliveryType: this.deliveryType } : {}),
      listed: known.size,
      supplied: records.length,
      candidates,
      uploaded: result.succeeded,
      skipped,
      failed: result.failed,
    };
  }

  private reportSkipped(skipped: SkippedRecord[]): void {
    for (const { error } of skipped) {
      this.logger.warn(`Skipped ${error.identifier || '<empty>'}: ${error.message}`);
    }
  }

  private reportFailures(failed: UploadError[]): void {
    for (const error of failed) {
      this.logger.error(`${error.identifier} rejected by ${error.source} [${error.code}]: ${error.message}`);
    }
  }

  private target(): string {
    return this.deliveryType
      ? `${this.marketplace.marketplace} (${this.deliveryType})`
      : this.marketplace.marketplace;
  }
}

/**
 * Both sync passes validate the same listed records; keep one entry per record
 */
function mergeSkipped(...lists: SkippedRecord[][]): SkippedRecord[] {
  const seen = new Set<ProductRecord>();
  const merged: SkippedRecord[] = [];

  for (const list of lists) {
    for (const entry of list) {
      if (seen.has(entry.record)) continue;
      seen.add(entry.record);
      merged.push(entry);
    }
  }

  return merged;
}

/**
 * Serve one catalog download to several runs, e.g. the campaigns of one
 * marketplace. A failed download is not cached.
 */
export function shareCatalog(supplier: SupplierFeedFetcher): SupplierFeedFetcher {
  let pending: Promise<ProductRecord[]> | null = null;

  return {
    source: supplier.source,
    fetchCurrentCatalog: () => {
      if (!pending) {
        pending = supplier.fetchCurrentCatalog().catch((error: unknown) => {
          pending = null;
          throw error;
        });
      }
      return pending;
    },
  };
}

// ============================================================================
// Factory Function
// ============================================================================

export function createReconciliationRunner(deps: ReconciliationRunnerDependencies): ReconciliationRunner {
  return new ReconciliationRunner(deps);
}

/**
 * Reconciliation Service
 * Compares the supplier catalog with a marketplace's listings and decides
 * what to upload, restock and reprice. Pure: no I/O, no clock.
 */

import type { DeliveryType, ListingUpload, ProductRecord } from '@feedsync/integrations';
import { ValidationError } from '../errors.js';
import type { PriceUpdatePlan, SkippedRecord, StockUpdatePlan, UploadBatch } from '../types.js';

// ============================================================================
// Rounding & Validation
// ============================================================================

/**
 * Round a supplier price to whole currency units, halves away from zero
 * (19.49 -> 19, 19.5 -> 20)
 */
export function roundPrice(rawPrice: number): number {
  return Math.sign(rawPrice) * Math.round(Math.abs(rawPrice));
}

/**
 * Check a record can be sent to a marketplace.
 * Returns the first problem found, or null when the record is usable.
 */
export function validateRecord(record: ProductRecord): ValidationError | null {
  const { identifier, stockQuantity, rawPrice } = record;

  if (identifier.trim() === '') {
    return new ValidationError('Record has an empty identifier', identifier, 'identifier', 'INVALID_IDENTIFIER');
  }

  if (!Number.isInteger(stockQuantity) || stockQuantity < 0) {
    return new ValidationError(
      `Stock of ${identifier} must be a non-negative integer, got ${stockQuantity}`,
      identifier,
      'stockQuantity',
      'INVALID_STOCK'
    );
  }

  if (!Number.isFinite(rawPrice) || rawPrice <= 0) {
    return new ValidationError(
      `Price of ${identifier} must be a positive number, got ${rawPrice}`,
      identifier,
      'rawPrice',
      'INVALID_PRICE'
    );
  }

  // 0 < price < 0.5 would be listed for free
  if (roundPrice(rawPrice) < 1) {
    return new ValidationError(
      `Price of ${identifier} rounds to zero, got ${rawPrice}`,
      identifier,
      'rawPrice',
      'INVALID_PRICE'
    );
  }

  return null;
}

function duplicateOf(record: ProductRecord): ValidationError {
  return new ValidationError(
    `Identifier ${record.identifier} appears more than once in the supplier catalog`,
    record.identifier,
    'identifier',
    'DUPLICATE_IDENTIFIER'
  );
}

function compareIdentifiers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Validate the records selected by `include`, keeping the first valid record
 * of each identifier. Later repeats of a kept identifier are skipped.
 */
function selectValidRecords(
  records: readonly ProductRecord[],
  include: (record: ProductRecord) => boolean
): { valid: Map<string, ProductRecord>; skipped: SkippedRecord[] } {
  const valid = new Map<string, ProductRecord>();
  const skipped: SkippedRecord[] = [];

  for (const record of records) {
    if (!include(record)) continue;

    const error = validateRecord(record) ?? (valid.has(record.identifier) ? duplicateOf(record) : null);
    if (error) {
      skipped.push({ record, error });
      continue;
    }

    valid.set(record.identifier, record);
  }

  return { valid, skipped };
}

// ============================================================================
// Reconciliation
// ============================================================================

/**
 * Supplier records the marketplace does not list yet, as uploads with rounded
 * prices. Listed identifiers are never uploaded again, so running this twice
 * against the same listings yields the same batch.
 */
export function computeUploadBatch(
  knownIdentifiers: ReadonlySet<string>,
  supplierRecords: readonly ProductRecord[],
  deliveryType?: DeliveryType
): UploadBatch {
  const { valid, skipped } = selectValidRecords(
    supplierRecords,
    (record) => !knownIdentifiers.has(record.identifier)
  );

  const uploads: ListingUpload[] = Array.from(valid.values())
    .map((record) => ({
      identifier: record.identifier,
      price: roundPrice(record.rawPrice),
      stockQuantity: record.stockQuantity,
      ...(deliveryType ? { deliveryType } : {}),
    }))
    .sort((a, b) => compareIdentifiers(a.identifier, b.identifier));

  return { uploads, skipped };
}

/**
 * Stock for every listed identifier. Listings the supplier no longer carries,
 * or carries with an unusable record, go to zero.
 */
export function computeStockUpdates(
  knownIdentifiers: ReadonlySet<string>,
  supplierRecords: readonly ProductRecord[]
): StockUpdatePlan {
  const { valid, skipped } = selectValidRecords(supplierRecords, (record) =>
    knownIdentifiers.has(record.identifier)
  );

  const updates = Array.from(knownIdentifiers)
    .sort(compareIdentifiers)
    .map((identifier) => ({
      identifier,
      stockQuantity: valid.get(identifier)?.stockQuantity ?? 0,
    }));

  return { updates, skipped };
}

/**
 * Rounded prices for listed identifiers the supplier carries with a usable
 * record. Other listings keep their current price.
 */
export function computePriceUpdates(
  knownIdentifiers: ReadonlySet<string>,
  supplierRecords: readonly ProductRecord[]
): PriceUpdatePlan {
  const { valid, skipped } = selectValidRecords(supplierRecords, (record) =>
    knownIdentifiers.has(record.identifier)
  );

  const updates = Array.from(valid.values())
    .map((record) => ({ identifier: record.identifier, price: roundPrice(record.rawPrice) }))
    .sort((a, b) => compareIdentifiers(a.identifier, b.identifier));

  return { updates, skipped };
}

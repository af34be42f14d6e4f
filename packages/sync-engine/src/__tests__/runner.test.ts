/**
 * Reconciliation Runner Tests
 * Tests run sequencing, reporting and error propagation against fake collaborators
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  FetchError,
  UploadError,
  type ListingUpload,
  type MarketplaceClient,
  type MarketplaceType,
  type PriceUpdate,
  type ProductRecord,
  type StockUpdate,
  type SupplierFeedFetcher,
  type UploadResult,
} from '@feedsync/integrations';
import { ReconciliationRunner, shareCatalog } from '../runner.js';

// Fake collaborators
function allSucceeded(identifiers: string[]): UploadResult {
  return { succeeded: identifiers, failed: [] };
}

function createMarketplace(listed: string[], marketplace: MarketplaceType = 'ozon') {
  return {
    marketplace,
    listActiveIdentifiers: vi.fn(async (): Promise<ReadonlySet<string>> => new Set(listed)),
    uploadListings: vi.fn(async (batch: ListingUpload[]) => allSucceeded(batch.map((u) => u.identifier))),
    updateStocks: vi.fn(async (updates: StockUpdate[]) => allSucceeded(updates.map((u) => u.identifier))),
    updatePrices: vi.fn(async (updates: PriceUpdate[]) => allSucceeded(updates.map((u) => u.identifier))),
  } satisfies MarketplaceClient;
}

function createSupplier(records: ProductRecord[]) {
  return {
    source: 'casio',
    fetchCurrentCatalog: vi.fn(async () => records),
  } satisfies SupplierFeedFetcher;
}

const logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const catalog: ProductRecord[] = [
  { identifier: 'CA001', stockQuantity: 5, rawPrice: 99.99 },
  { identifier: 'CA002', stockQuantity: 3, rawPrice: 149.5 },
];

describe('ReconciliationRunner', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('addMissingListings', () => {
    it('should upload the supplier items the marketplace lacks', async () => {
      const marketplace = createMarketplace(['CA001']);
      const supplier = createSupplier(catalog);
      const runner = new ReconciliationRunner({ marketplace, supplier, logger });

      const report = await runner.addMissingListings();

      expect(marketplace.uploadListings).toHaveBeenCalledWith([
        { identifier: 'CA002', price: 150, stockQuantity: 3 },
      ]);
      expect(report).toEqual({
        marketplace: 'ozon',
        mode: 'add-missing',
        listed: 1,
        supplied: 2,
        candidates: 1,
        uploaded: ['CA002'],
        skipped: [],
        failed: [],
      });
    });

    it('should read the marketplace before the supplier feed', async () => {
      const marketplace = createMarketplace([]);
      const supplier = createSupplier(catalog);
      const runner = new ReconciliationRunner({ marketplace, supplier, logger });

      await runner.addMissingListings();

      const listedAt = marketplace.listActiveIdentifiers.mock.invocationCallOrder[0];
      const fetchedAt = supplier.fetchCurrentCatalog.mock.invocationCallOrder[0];
      const uploadedAt = marketplace.uploadListings.mock.invocationCallOrder[0];
      expect(listedAt).toBeLessThan(fetchedAt);
      expect(fetchedAt).toBeLessThan(uploadedAt);
    });

    it('should tag uploads with the campaign delivery type', async () => {
      const marketplace = createMarketplace(['CA001'], 'yandex-market');
      const runner = new ReconciliationRunner({
        marketplace,
        supplier: createSupplier(catalog),
        logger,
        deliveryType: 'FBS',
      });

      const report = await runner.addMissingListings();

      expect(marketplace.uploadListings).toHaveBeenCalledWith([
        { identifier: 'CA002', price: 150, stockQuantity: 3, deliveryType: 'FBS' },
      ]);
      expect(report.deliveryType).toBe('FBS');
      expect(report.marketplace).toBe('yandex-market');
    });

    it('should not call the marketplace when there is nothing to upload', async () => {
      const marketplace = createMarketplace(['CA001', 'CA002']);
      const runner = new ReconciliationRunner({ marketplace, supplier: createSupplier(catalog), logger });

      const report = await runner.addMissingListings();

      expect(marketplace.uploadListings).not.toHaveBeenCalled();
      expect(report.candidates).toBe(0);
      expect(report.uploaded).toEqual([]);
      expect(logger.info).toHaveBeenCalledWith('Nothing to upload to ozon');
    });

    it('should give every empty run its own result lists', async () => {
      const supplier = createSupplier(catalog);
      const first = await new ReconciliationRunner({
        marketplace: createMarketplace(['CA001', 'CA002']),
        supplier,
        logger,
      }).addMissingListings();
      first.uploaded.push('CA999');
      first.failed.push(new UploadError('Offer is archived', 'ozon', 'CA999', 'ARCHIVED'));

      const second = await new ReconciliationRunner({
        marketplace: createMarketplace(['CA001', 'CA002']),
        supplier,
        logger,
      }).addMissingListings();

      expect(second.uploaded).toEqual([]);
      expect(second.failed).toEqual([]);
    });

    it('should log and report skipped records', async () => {
      const bad: ProductRecord = { identifier: 'CA004', stockQuantity: -1, rawPrice: 100 };
      const marketplace = createMarketplace(['CA001']);
      const runner = new ReconciliationRunner({
        marketplace,
        supplier: createSupplier([...catalog, bad]),
        logger,
      });

      const report = await runner.addMissingListings();

      expect(report.uploaded).toEqual(['CA002']);
      expect(report.skipped).toHaveLength(1);
      expect(report.skipped[0].record).toBe(bad);
      expect(logger.warn).toHaveBeenCalledWith(
        'Skipped CA004: Stock of CA004 must be a non-negative integer, got -1'
      );
    });

    it('should log and report identifiers the marketplace rejected', async () => {
      const marketplace = createMarketplace([]);
      const rejection = new UploadError('Price below minimum', 'ozon', 'CA002', 'PRICE_TOO_LOW');
      marketplace.uploadListings.mockResolvedValueOnce({ succeeded: ['CA001'], failed: [rejection] });
      const runner = new ReconciliationRunner({ marketplace, supplier: createSupplier(catalog), logger });

      const report = await runner.addMissingListings();

      expect(report.uploaded).toEqual(['CA001']);
      expect(report.failed).toEqual([rejection]);
      expect(logger.error).toHaveBeenCalledWith('CA002 rejected by ozon [PRICE_TOO_LOW]: Price below minimum');
    });

    it('should abort when the marketplace cannot be read', async () => {
      const marketplace = createMarketplace([]);
      marketplace.listActiveIdentifiers.mockRejectedValueOnce(
        new FetchError('Request failed with status code 401', 'ozon', 'AUTH_ERROR', 401)
      );
      const supplier = createSupplier(catalog);
      const runner = new ReconciliationRunner({ marketplace, supplier, logger });

      await expect(runner.addMissingListings()).rejects.toMatchObject({
        name: 'FetchError',
        code: 'AUTH_ERROR',
      });
      expect(supplier.fetchCurrentCatalog).not.toHaveBeenCalled();
    });

    it('should abort when the supplier feed cannot be read', async () => {
      const marketplace = createMarketplace([]);
      const supplier = createSupplier(catalog);
      supplier.fetchCurrentCatalog.mockRejectedValueOnce(
        new FetchError('connect ETIMEDOUT', 'casio', 'NETWORK_ERROR')
      );
      const runner = new ReconciliationRunner({ marketplace, supplier, logger });

      await expect(runner.addMissingListings()).rejects.toBeInstanceOf(FetchError);
      expect(marketplace.uploadListings).not.toHaveBeenCalled();
    });
  });

  describe('syncExistingListings', () => {
    const feed: ProductRecord[] = [
      { identifier: 'CA001', stockQuantity: 5, rawPrice: 99.99 },
      { identifier: 'CA002', stockQuantity: 3, rawPrice: 149.5 },
      { identifier: 'CA003', stockQuantity: -2, rawPrice: 10 },
    ];

    it('should restock, zero and reprice existing listings', async () => {
      const marketplace = createMarketplace(['CA009', 'CA003', 'CA001']);
      const runner = new ReconciliationRunner({ marketplace, supplier: createSupplier(feed), logger });

      const report = await runner.syncExistingListings();

      expect(marketplace.updateStocks).toHaveBeenCalledWith([
        { identifier: 'CA001', stockQuantity: 5 },
        { identifier: 'CA003', stockQuantity: 0 },
        { identifier: 'CA009', stockQuantity: 0 },
      ]);
      expect(marketplace.updatePrices).toHaveBeenCalledWith([{ identifier: 'CA001', price: 100 }]);
      expect(marketplace.uploadListings).not.toHaveBeenCalled();
      expect(report).toMatchObject({
        mode: 'sync',
        listed: 3,
        supplied: 3,
        candidates: 3,
        uploaded: ['CA001', 'CA003', 'CA009'],
        failed: [],
      });
    });

    it('should count a record rejected by both passes once', async () => {
      const marketplace = createMarketplace(['CA003']);
      const runner = new ReconciliationRunner({ marketplace, supplier: createSupplier(feed), logger });

      const report = await runner.syncExistingListings();

      expect(report.skipped.map((s) => s.record.identifier)).toEqual(['CA003']);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(marketplace.updatePrices).not.toHaveBeenCalled();
    });

    it('should update stock before price', async () => {
      const marketplace = createMarketplace(['CA001']);
      const runner = new ReconciliationRunner({ marketplace, supplier: createSupplier(feed), logger });

      await runner.syncExistingListings();

      expect(marketplace.updateStocks.mock.invocationCallOrder[0]).toBeLessThan(
        marketplace.updatePrices.mock.invocationCallOrder[0]
      );
    });

    it('should report an identifier whose price update failed', async () => {
      const marketplace = createMarketplace(['CA001', 'CA002']);
      const rejection = new UploadError('Price changed too much', 'ozon', 'CA002', 'PRICE_CHANGE_LIMIT');
      marketplace.updatePrices.mockResolvedValueOnce({ succeeded: ['CA001'], failed: [rejection] });
      const runner = new ReconciliationRunner({ marketplace, supplier: createSupplier(feed), logger });

      const report = await runner.syncExistingListings();

      expect(report.uploaded).toEqual(['CA001']);
      expect(report.failed).toEqual([rejection]);
    });

    it('should do nothing when the marketplace lists nothing', async () => {
      const marketplace = createMarketplace([]);
      const runner = new ReconciliationRunner({ marketplace, supplier: createSupplier(feed), logger });

      const report = await runner.syncExistingListings();

      expect(marketplace.updateStocks).not.toHaveBeenCalled();
      expect(marketplace.updatePrices).not.toHaveBeenCalled();
      expect(report.candidates).toBe(0);
    });
  });
});

describe('shareCatalog', () => {
  it('should download the catalog once for several runs', async () => {
    const supplier = createSupplier(catalog);
    const shared = shareCatalog(supplier);

    const [first, second] = await Promise.all([shared.fetchCurrentCatalog(), shared.fetchCurrentCatalog()]);

    expect(first).toBe(catalog);
    expect(second).toBe(catalog);
    expect(supplier.fetchCurrentCatalog).toHaveBeenCalledTimes(1);
    expect(shared.source).toBe('casio');
  });

  it('should retry the download after a failure', async () => {
    const supplier = createSupplier(catalog);
    supplier.fetchCurrentCatalog.mockRejectedValueOnce(new FetchError('socket hang up', 'casio', 'NETWORK_ERROR'));
    const shared = shareCatalog(supplier);

    await expect(shared.fetchCurrentCatalog()).rejects.toBeInstanceOf(FetchError);
    await expect(shared.fetchCurrentCatalog()).resolves.toBe(catalog);
    expect(supplier.fetchCurrentCatalog).toHaveBeenCalledTimes(2);
  });
});

/**
 * Ozon Seller API Client
 * Lists offer IDs and imports prices and stocks in chunks
 */

import type { AxiosInstance } from 'axios';
import type PQueue from 'p-queue';
import { createApiRateLimiter } from '../utils/rate-limiter.js';
import { withApiRetry } from '../utils/retry.js';
import { createHttpClient, parseResponse, toFetchError } from '../utils/http.js';
import { chunk } from '../utils/batch.js';
import { BaseMarketplaceClient, combineUploadResults, type UploadResult, type UploadError } from '../unified.js';
import type { PriceUpdate, StockUpdate } from '../types.js';
import {
  ozonImportResponseSchema,
  ozonProductListResponseSchema,
  type OzonClientConfig,
  type OzonPriceItem,
  type OzonProductListRequest,
  type OzonStockItem,
} from './types.js';

const OZON_API_BASE_URL = 'https://api-seller.ozon.ru';

const PRODUCT_LIST_PAGE_SIZE = 1000;
export const OZON_PRICE_CHUNK_SIZE = 1000;
export const OZON_STOCK_CHUNK_SIZE = 100;

export class OzonApiClient extends BaseMarketplaceClient {
  readonly marketplace = 'ozon' as const;

  private readonly config: Required<Pick<OzonClientConfig, 'baseUrl' | 'timeout' | 'retryAttempts' | 'retryMinTimeout'>> & OzonClientConfig;
  private readonly httpClient: AxiosInstance;
  private readonly rateLimiter: PQueue;

  constructor(config: OzonClientConfig) {
    super();
    this.config = {
      baseUrl: OZON_API_BASE_URL,
      timeout: 30000,
      retryAttempts: 3,
      retryMinTimeout: 1000,
      ...config,
    };

    this.httpClient = createHttpClient('ozon', {
      baseUrl: this.config.baseUrl,
      timeout: this.config.timeout,
      adapter: this.config.adapter,
      headers: {
        'Client-Id': this.config.clientId,
        'Api-Key': this.config.apiKey,
      },
    });

    this.rateLimiter = createApiRateLimiter('ozon');
  }

  // ============================================================================
  // Listing Operations
  // ============================================================================

  /**
   * Offer IDs of every product in the store, whatever its visibility
   */
  async listActiveIdentifiers(): Promise<ReadonlySet<string>> {
    const offerIds = new Set<string>();
    let collected = 0;
    let lastId = '';

    while (true) {
      const body: OzonProductListRequest = {
        filter: { visibility: 'ALL' },
        last_id: lastId,
        limit: PRODUCT_LIST_PAGE_SIZE,
      };
      const data = await this.rateLimitedRequest(() => this.httpClient.post('/v2/product/list', body));
      const { result } = parseResponse(ozonProductListResponseSchema, data, 'ozon', '/v2/product/list');

      for (const item of result.items) {
        offerIds.add(item.offer_id);
      }
      collected += result.items.length;
      lastId = result.last_id;

      if (result.items.length === 0 || collected >= result.total) {
        break;
      }
    }

    return offerIds;
  }

  // ============================================================================
  // Import Operations
  // ============================================================================

  async updatePrices(updates: PriceUpdate[]): Promise<UploadResult> {
    return this.importInChunks(
      '/v1/product/import/prices',
      updates.map((update): OzonPriceItem => ({
        auto_action_enabled: 'UNKNOWN',
        currency_code: 'RUB',
        offer_id: update.identifier,
        old_price: '0',
        price: String(update.price),
      })),
      OZON_PRICE_CHUNK_SIZE,
      (items) => ({ prices: items })
    );
  }

  async updateStocks(updates: StockUpdate[]): Promise<UploadResult> {
    return this.importInChunks(
      '/v1/product/import/stocks',
      updates.map((update): OzonStockItem => ({
        offer_id: update.identifier,
        stock: update.stockQuantity,
      })),
      OZON_STOCK_CHUNK_SIZE,
      (items) => ({ stocks: items })
    );
  }

  /**
   * Send items chunk by chunk. A failed request marks its whole chunk as failed
   * and the remaining chunks are still sent.
   */
  private async importInChunks<T extends { offer_id: string }>(
    path: string,
    items: T[],
    chunkSize: number,
    toBody: (items: T[]) => Record<string, T[]>
  ): Promise<UploadResult> {
    const failed: UploadError[] = [];

    for (const part of chunk(items, chunkSize)) {
      try {
        const data = await this.rateLimitedRequest(() => this.httpClient.post(path, toBody(part)));
        const { result } = parseResponse(ozonImportResponseSchema, data, 'ozon', path);
        const byOfferId = new Map(result.map((entry) => [entry.offer_id, entry]));

        for (const item of part) {
          const entry = byOfferId.get(item.offer_id);
          if (!entry) {
            failed.push(this.uploadFailure(item.offer_id, `No result returned by ${path}`, 'MISSING_RESULT'));
            continue;
          }
          if (!entry.updated || entry.errors.length > 0) {
            const [first] = entry.errors;
            failed.push(
              this.uploadFailure(
                item.offer_id,
                first?.message || first?.code || 'Item was not updated',
                first?.code ?? 'NOT_UPDATED'
              )
            );
          }
        }
      } catch (error) {
        const fetchError = toFetchError(error, 'ozon');
        for (const item of part) {
          failed.push(this.uploadFailure(item.offer_id, fetchError.message, fetchError.code));
        }
      }
    }

    return combineUploadResults(
      items.map((item) => item.offer_id),
      { succeeded: [], failed }
    );
  }

  // ============================================================================
  // Helper Methods
  // ============================================================================

  private async rateLimitedRequest(request: () => Promise<{ data: unknown }>): Promise<unknown> {
    return this.rateLimiter.add(
      () =>
        withApiRetry(
          async () => {
            const response = await request();
            return response.data;
          },
          {
            retries: this.config.retryAttempts,
            minTimeout: this.config.retryMinTimeout,
            onRetry: this.config.onRetry,
          }
        ),
      { throwOnTimeout: true }
    );
  }
}

export function createOzonClient(config: OzonClientConfig): OzonApiClient {
  return new OzonApiClient(config);
}

/**
 * Yandex Market Partner API Client
 * Campaign-scoped offer listing, stock and price updates
 */

import type { AxiosInstance } from 'axios';
import type PQueue from 'p-queue';
import { createApiRateLimiter } from '../utils/rate-limiter.js';
import { withApiRetry } from '../utils/retry.js';
import { createHttpClient, parseResponse, toFetchError } from '../utils/http.js';
import { chunk } from '../utils/batch.js';
import { BaseMarketplaceClient, combineUploadResults, type UploadResult, type UploadError } from '../unified.js';
import type { DeliveryType, ListingUpload, PriceUpdate, StockUpdate } from '../types.js';
import {
  yandexOfferMappingResponseSchema,
  yandexStatusResponseSchema,
  type YandexMarketClientConfig,
  type YandexPriceOffer,
  type YandexStockSku,
} from './types.js';

const YANDEX_MARKET_API_BASE_URL = 'https://api.partner.market.yandex.ru';

const OFFER_MAPPING_PAGE_SIZE = 200;
export const YANDEX_STOCK_CHUNK_SIZE = 2000;
export const YANDEX_PRICE_CHUNK_SIZE = 500;

export class YandexMarketApiClient extends BaseMarketplaceClient {
  readonly marketplace = 'yandex-market' as const;

  private readonly config: Required<Pick<YandexMarketClientConfig, 'baseUrl' | 'timeout' | 'retryAttempts' | 'retryMinTimeout'>> & YandexMarketClientConfig;
  private readonly httpClient: AxiosInstance;
  private readonly rateLimiter: PQueue;

  constructor(config: YandexMarketClientConfig) {
    super();
    this.config = {
      baseUrl: YANDEX_MARKET_API_BASE_URL,
      timeout: 30000,
      retryAttempts: 3,
      retryMinTimeout: 1000,
      ...config,
    };

    this.httpClient = createHttpClient('yandex-market', {
      baseUrl: this.config.baseUrl,
      timeout: this.config.timeout,
      adapter: this.config.adapter,
      headers: {
        Authorization: `Bearer ${this.config.token}`,
      },
    });

    this.rateLimiter = createApiRateLimiter('yandex-market');
  }

  get deliveryType(): DeliveryType {
    return this.config.deliveryType;
  }

  get campaignId(): string {
    return this.config.campaignId;
  }

  // ============================================================================
  // Listing Operations
  // ============================================================================

  /**
   * Shop SKUs of every offer mapped in the campaign
   */
  async listActiveIdentifiers(): Promise<ReadonlySet<string>> {
    const path = `/campaigns/${this.config.campaignId}/offer-mapping-entries`;
    const shopSkus = new Set<string>();
    let pageToken: string | undefined;

    do {
      const params: Record<string, string | number> = { limit: OFFER_MAPPING_PAGE_SIZE };
      if (pageToken) {
        params.page_token = pageToken;
      }

      const data = await this.rateLimitedRequest(() => this.httpClient.get(path, { params }));
      const { result } = parseResponse(yandexOfferMappingResponseSchema, data, 'yandex-market', path);

      for (const entry of result.offerMappingEntries) {
        shopSkus.add(entry.offer.shopSku);
      }

      pageToken = result.offerMappingEntries.length > 0 ? result.paging.nextPageToken : undefined;
    } while (pageToken);

    return shopSkus;
  }

  // ============================================================================
  // Update Operations
  // ============================================================================

  async updateStocks(updates: StockUpdate[]): Promise<UploadResult> {
    const path = `/campaigns/${this.config.campaignId}/offers/stocks`;
    const updatedAt = new Date().toISOString();

    return this.sendInChunks(
      updates,
      YANDEX_STOCK_CHUNK_SIZE,
      (part) => {
        const skus: YandexStockSku[] = part.map((update) => ({
          sku: update.identifier,
          warehouseId: this.config.warehouseId,
          items: [{ count: update.stockQuantity, type: 'FIT', updatedAt }],
        }));
        return this.httpClient.put(path, { skus });
      },
      path
    );
  }

  async updatePrices(updates: PriceUpdate[]): Promise<UploadResult> {
    const path = `/campaigns/${this.config.campaignId}/offer-prices/updates`;

    return this.sendInChunks(
      updates,
      YANDEX_PRICE_CHUNK_SIZE,
      (part) => {
        const offers: YandexPriceOffer[] = part.map((update) => ({
          id: update.identifier,
          price: { value: update.price, currencyId: 'RUR' },
        }));
        return this.httpClient.post(path, { offers });
      },
      path
    );
  }

  /**
   * A campaign ships with a single delivery type, so uploads tagged for the
   * other one are refused before anything is sent.
   */
  protected rejectUploads(batch: ListingUpload[]): UploadError[] {
    return batch
      .filter((upload) => upload.deliveryType !== undefined && upload.deliveryType !== this.config.deliveryType)
      .map((upload) =>
        this.uploadFailure(
          upload.identifier,
          `Upload tagged ${upload.deliveryType} sent to ${this.config.deliveryType} campaign ${this.config.campaignId}`,
          'DELIVERY_TYPE_MISMATCH'
        )
      );
  }

  /**
   * The API answers one status per request, so a chunk succeeds or fails as a whole
   */
  private async sendInChunks<T extends { identifier: string }>(
    updates: T[],
    chunkSize: number,
    send: (part: T[]) => Promise<{ data: unknown }>,
    path: string
  ): Promise<UploadResult> {
    const failed: UploadError[] = [];

    for (const part of chunk(updates, chunkSize)) {
      try {
        const data = await this.rateLimitedRequest(() => send(part));
        const { status } = parseResponse(yandexStatusResponseSchema, data, 'yandex-market', path);
        if (status !== 'OK') {
          for (const update of part) {
            failed.push(this.uploadFailure(update.identifier, `${path} answered status ${status}`, 'REJECTED'));
          }
        }
      } catch (error) {
        const fetchError = toFetchError(error, 'yandex-market');
        for (const update of part) {
          failed.push(this.uploadFailure(update.identifier, fetchError.message, fetchError.code));
        }
      }
    }

    return combineUploadResults(
      updates.map((update) => update.identifier),
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

export function createYandexMarketClient(config: YandexMarketClientConfig): YandexMarketApiClient {
  return new YandexMarketApiClient(config);
}

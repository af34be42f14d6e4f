/**
 * Common types for all integrations
 */

import type { AxiosAdapter } from 'axios';

export type MarketplaceType = 'ozon' | 'yandex-market';

export type SupplierSource = 'casio';

export type IntegrationSource = MarketplaceType | SupplierSource;

/**
 * FBS: seller ships from its own warehouse.
 * DBS: seller delivers directly to the buyer.
 */
export type DeliveryType = 'FBS' | 'DBS';

export const DELIVERY_TYPES: readonly DeliveryType[] = ['FBS', 'DBS'];

/**
 * One row of the supplier feed, already mapped to typed fields
 */
export interface ProductRecord {
  readonly identifier: string;
  readonly stockQuantity: number;
  /** Price as published by the supplier, may carry fractional currency units */
  readonly rawPrice: number;
}

export interface ListingUpload {
  identifier: string;
  /** Whole currency units */
  price: number;
  stockQuantity: number;
  /** Set for Yandex Market campaigns only */
  deliveryType?: DeliveryType;
}

export interface StockUpdate {
  identifier: string;
  stockQuantity: number;
}

export interface PriceUpdate {
  identifier: string;
  price: number;
}

export interface HttpClientConfig {
  baseUrl?: string;
  timeout?: number;
  retryAttempts?: number;
  /** Minimum delay between retries in milliseconds */
  retryMinTimeout?: number;
  /** Called before each retry instead of the default console warning */
  onRetry?: (error: Error, attempt: number) => void;
  /** Replaces the network transport, used by tests */
  adapter?: AxiosAdapter;
}

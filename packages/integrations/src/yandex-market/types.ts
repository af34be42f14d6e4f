/**
 * Yandex Market Partner API Types
 * Campaign offer mappings, stock and price updates
 */

import { z } from 'zod';
import type { DeliveryType, HttpClientConfig } from '../types.js';

// ============================================================================
// Client Configuration
// ============================================================================

/**
 * One client per campaign: an FBS or a DBS campaign, each with its own warehouse
 */
export interface YandexMarketClientConfig extends HttpClientConfig {
  /** Partner API OAuth token */
  token: string;
  campaignId: string;
  warehouseId: number;
  deliveryType: DeliveryType;
}

// ============================================================================
// Offer Mappings
// ============================================================================

export const yandexOfferMappingResponseSchema = z.object({
  status: z.string().optional(),
  result: z.object({
    paging: z
      .object({
        nextPageToken: z.string().optional(),
      })
      .default({}),
    offerMappingEntries: z.array(
      z.object({
        offer: z.object({
          shopSku: z.string(),
        }),
      })
    ),
  }),
});

export type YandexOfferMappingResponse = z.infer<typeof yandexOfferMappingResponseSchema>;

// ============================================================================
// Stocks & Prices
// ============================================================================

export type YandexStockType = 'FIT';

export interface YandexStockSku {
  sku: string;
  warehouseId: number;
  items: Array<{
    count: number;
    type: YandexStockType;
    updatedAt: string;
  }>;
}

export interface YandexPriceOffer {
  id: string;
  price: {
    value: number;
    currencyId: 'RUR';
  };
}

export const yandexStatusResponseSchema = z.object({
  status: z.string(),
});

export type YandexStatusResponse = z.infer<typeof yandexStatusResponseSchema>;

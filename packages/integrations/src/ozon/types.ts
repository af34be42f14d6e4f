/**
 * Ozon Seller API Types
 * Request and response shapes of the product list and import endpoints
 */

import { z } from 'zod';
import type { HttpClientConfig } from '../types.js';

// ============================================================================
// Client Configuration
// ============================================================================

export interface OzonClientConfig extends HttpClientConfig {
  clientId: string;
  /** Seller API key */
  apiKey: string;
}

// ============================================================================
// Product List
// ============================================================================

export type OzonVisibility = 'ALL' | 'VISIBLE' | 'INVISIBLE' | 'ARCHIVED';

export interface OzonProductListRequest {
  filter: {
    visibility: OzonVisibility;
  };
  last_id: string;
  limit: number;
}

export const ozonProductListResponseSchema = z.object({
  result: z.object({
    items: z.array(
      z.object({
        product_id: z.number().optional(),
        offer_id: z.string(),
      })
    ),
    total: z.number().int().nonnegative(),
    last_id: z.string(),
  }),
});

export type OzonProductListResponse = z.infer<typeof ozonProductListResponseSchema>;
export type OzonProductListItem = OzonProductListResponse['result']['items'][number];

// ============================================================================
// Price & Stock Import
// ============================================================================

export type OzonAutoActionState = 'UNKNOWN' | 'ENABLED' | 'DISABLED';

export interface OzonPriceItem {
  auto_action_enabled: OzonAutoActionState;
  currency_code: 'RUB';
  offer_id: string;
  old_price: string;
  price: string;
}

export interface OzonStockItem {
  offer_id: string;
  stock: number;
}

export const ozonImportResponseSchema = z.object({
  result: z.array(
    z.object({
      product_id: z.number().optional(),
      offer_id: z.string(),
      updated: z.boolean(),
      errors: z
        .array(
          z.object({
            code: z.string(),
            message: z.string().optional(),
          })
        )
        .default([]),
    })
  ),
});

export type OzonImportResponse = z.infer<typeof ozonImportResponseSchema>;
export type OzonImportResultItem = OzonImportResponse['result'][number];

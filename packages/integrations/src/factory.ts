/**
 * Client Factory
 * Creates marketplace clients from credentials
 */

import type { MarketplaceClient } from './unified.js';
import type { DeliveryType, HttpClientConfig, MarketplaceType } from './types.js';
import { createOzonClient } from './ozon/client.js';
import { createYandexMarketClient } from './yandex-market/client.js';

// ============================================================================
// Factory Types
// ============================================================================

export interface OzonCredentials {
  type: 'ozon';
  clientId: string;
  sellerToken: string;
}

export interface YandexMarketCredentials {
  type: 'yandex-market';
  token: string;
  campaignId: string;
  warehouseId: number;
  deliveryType: DeliveryType;
}

export type MarketplaceCredentials = OzonCredentials | YandexMarketCredentials;

// ============================================================================
// Client Factory
// ============================================================================

/**
 * Create a marketplace client for the given credentials
 */
export function createMarketplaceClient(
  credentials: MarketplaceCredentials,
  options: HttpClientConfig = {}
): MarketplaceClient {
  switch (credentials.type) {
    case 'ozon':
      return createOzonClient({
        ...options,
        clientId: credentials.clientId,
        apiKey: credentials.sellerToken,
      });

    case 'yandex-market':
      return createYandexMarketClient({
        ...options,
        token: credentials.token,
        campaignId: credentials.campaignId,
        warehouseId: credentials.warehouseId,
        deliveryType: credentials.deliveryType,
      });

    default:
      throw new UnknownMarketplaceError(describeUnknown(credentials));
  }
}

function describeUnknown(credentials: never): string {
  const value: unknown = credentials;
  if (typeof value === 'object' && value !== null && 'type' in value) {
    return String(value.type);
  }
  return String(value);
}

export function isMarketplaceType(value: string): value is MarketplaceType {
  return value === 'ozon' || value === 'yandex-market';
}

// ============================================================================
// Error Classes
// ============================================================================

export class UnknownMarketplaceError extends Error {
  constructor(type: string) {
    super(`Unknown marketplace: ${type}`);
    this.name = 'UnknownMarketplaceError';
  }
}

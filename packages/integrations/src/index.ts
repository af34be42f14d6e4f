/**
 * FeedSync - Integrations Package
 * Marketplace connectors for Ozon and Yandex Market, and the Casio supplier feed
 *
 * @packageDocumentation
 */

// ============================================================================
// Unified Interface & Base Types
// ============================================================================

export {
  type MarketplaceClient,
  type SupplierFeedFetcher,
  type UploadResult,
  type FetchErrorCode,
  BaseMarketplaceClient,
  combineUploadResults,
  IntegrationError,
  FetchError,
  UploadError,
} from './unified.js';

// ============================================================================
// Factory
// ============================================================================

export {
  createMarketplaceClient,
  isMarketplaceType,
  UnknownMarketplaceError,
  type MarketplaceCredentials,
  type OzonCredentials,
  type YandexMarketCredentials,
} from './factory.js';

// ============================================================================
// Ozon Integration
// ============================================================================

export {
  OzonApiClient,
  createOzonClient,
  OZON_PRICE_CHUNK_SIZE,
  OZON_STOCK_CHUNK_SIZE,
} from './ozon/index.js';

export type { OzonClientConfig } from './ozon/types.js';

// ============================================================================
// Yandex Market Integration
// ============================================================================

export {
  YandexMarketApiClient,
  createYandexMarketClient,
  YANDEX_PRICE_CHUNK_SIZE,
  YANDEX_STOCK_CHUNK_SIZE,
} from './yandex-market/index.js';

export type { YandexMarketClientConfig } from './yandex-market/types.js';

// ============================================================================
// Casio Feed
// ============================================================================

export {
  CasioFeedFetcher,
  createCasioFeedFetcher,
  CASIO_FEED_URL,
  parseCatalogRows,
  parseCatalogWorkbook,
  parsePriceText,
  parseStockText,
  type CasioFeedConfig,
} from './casio/index.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  DELIVERY_TYPES,
  type DeliveryType,
  type HttpClientConfig,
  type IntegrationSource,
  type ListingUpload,
  type MarketplaceType,
  type PriceUpdate,
  type ProductRecord,
  type StockUpdate,
  type SupplierSource,
} from './types.js';

// ============================================================================
// Utilities
// ============================================================================

export {
  chunk,
  withRetry,
  withApiRetry,
  isRetryableError,
  isRateLimitError,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
} from './utils/index.js';

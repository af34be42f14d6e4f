/**
 * Yandex Market Integration
 * Partner API connector for FBS and DBS campaigns
 */

export * from './types.js';

export {
  YandexMarketApiClient,
  createYandexMarketClient,
  YANDEX_PRICE_CHUNK_SIZE,
  YANDEX_STOCK_CHUNK_SIZE,
} from './client.js';

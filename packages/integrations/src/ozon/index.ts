/**
 * Ozon Integration
 * Seller API connector for offer listing and price/stock import
 */

export * from './types.js';

export {
  OzonApiClient,
  createOzonClient,
  OZON_PRICE_CHUNK_SIZE,
  OZON_STOCK_CHUNK_SIZE,
} from './client.js';

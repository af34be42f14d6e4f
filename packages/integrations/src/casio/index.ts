/**
 * Casio Integration
 * Manufacturer stock and price feed
 */

export type { CasioFeedConfig } from './types.js';

export { CasioFeedFetcher, createCasioFeedFetcher, CASIO_FEED_URL } from './feed.js';

export {
  parseCatalogRows,
  parseCatalogWorkbook,
  parsePriceText,
  parseStockText,
  CASIO_COLUMNS,
  DEFAULT_HEADER_ROW,
  OVERSTOCK_QUANTITY,
} from './parser.js';

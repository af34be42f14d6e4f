/**
 * Casio Feed Types
 */

import type { HttpClientConfig } from '../types.js';

export interface CasioFeedConfig extends Omit<HttpClientConfig, 'baseUrl'> {
  /** Location of the zipped remnants workbook */
  url?: string;
  /** Row index of the column titles in the sheet */
  headerRow?: number;
}

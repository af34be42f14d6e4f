/**
 * Casio Supplier Feed
 * Downloads the zipped remnants workbook and reads it in memory
 */

import type { AxiosInstance } from 'axios';
import type PQueue from 'p-queue';
import JSZip from 'jszip';
import { createApiRateLimiter } from '../utils/rate-limiter.js';
import { withApiRetry } from '../utils/retry.js';
import { createHttpClient } from '../utils/http.js';
import { FetchError, type SupplierFeedFetcher } from '../unified.js';
import type { ProductRecord } from '../types.js';
import { DEFAULT_HEADER_ROW, parseCatalogWorkbook } from './parser.js';
import type { CasioFeedConfig } from './types.js';

export const CASIO_FEED_URL = 'https://timeworld.ru/upload/files/ostatki.zip';

const WORKBOOK_ENTRY_PATTERN = /\.xlsx?$/i;

export class CasioFeedFetcher implements SupplierFeedFetcher {
  readonly source = 'casio' as const;

  private readonly config: Required<Pick<CasioFeedConfig, 'url' | 'headerRow' | 'timeout' | 'retryAttempts' | 'retryMinTimeout'>> & CasioFeedConfig;
  private readonly httpClient: AxiosInstance;
  private readonly rateLimiter: PQueue;

  constructor(config: CasioFeedConfig = {}) {
    this.config = {
      url: CASIO_FEED_URL,
      headerRow: DEFAULT_HEADER_ROW,
      timeout: 60000,
      retryAttempts: 3,
      retryMinTimeout: 1000,
      ...config,
    };

    this.httpClient = createHttpClient('casio', {
      baseUrl: '',
      timeout: this.config.timeout,
      adapter: this.config.adapter,
    });

    this.rateLimiter = createApiRateLimiter('casio');
  }

  async fetchCurrentCatalog(): Promise<ProductRecord[]> {
    const archive = await this.downloadArchive();
    const workbook = await this.extractWorkbook(archive);
    return parseCatalogWorkbook(workbook, this.config.headerRow);
  }

  private async downloadArchive(): Promise<Uint8Array> {
    const data = await this.rateLimiter.add(
      () =>
        withApiRetry(
          async () => {
            const response = await this.httpClient.get<unknown>(this.config.url, {
              responseType: 'arraybuffer',
              headers: { Accept: 'application/zip, application/octet-stream' },
            });
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

    if (data instanceof Uint8Array) {
      return data;
    }
    if (data instanceof ArrayBuffer) {
      return new Uint8Array(data);
    }
    throw new FetchError('Casio feed download returned no binary content', 'casio', 'BAD_RESPONSE');
  }

  private async extractWorkbook(archive: Uint8Array): Promise<Uint8Array> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(archive);
    } catch (error) {
      throw new FetchError(
        `Casio feed is not a zip archive: ${error instanceof Error ? error.message : 'unknown error'}`,
        'casio',
        'BAD_RESPONSE'
      );
    }

    const entry = Object.values(zip.files).find(
      (file) => !file.dir && WORKBOOK_ENTRY_PATTERN.test(file.name)
    );
    if (!entry) {
      throw new FetchError('Casio feed archive contains no workbook', 'casio', 'BAD_RESPONSE');
    }

    return entry.async('uint8array');
  }
}

export function createCasioFeedFetcher(config?: CasioFeedConfig): CasioFeedFetcher {
  return new CasioFeedFetcher(config);
}

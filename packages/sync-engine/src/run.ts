/**
 * Command Line Runs
 * Parses arguments, wires clients from configuration and maps outcomes to
 * exit codes.
 */

import { parseArgs } from 'node:util';
import {
  createCasioFeedFetcher,
  createMarketplaceClient,
  FetchError,
  isMarketplaceType,
  type CasioFeedConfig,
  type HttpClientConfig,
  type MarketplaceClient,
  type MarketplaceCredentials,
  type MarketplaceType,
  type SupplierFeedFetcher,
} from '@feedsync/integrations';
import { loadConfig, ozonCredentials, yandexCampaigns, type Config } from './config.js';
import { ConfigError } from './errors.js';
import { createConsoleLogger } from './logger.js';
import { createReconciliationRunner, shareCatalog } from './runner.js';
import { RUN_MODES, type Logger, type RunMode, type RunReport } from './types.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export const USAGE = 'Usage: feedsync <ozon|yandex-market> [--mode add-missing|sync]';

export interface CliDependencies {
  createClient: (credentials: MarketplaceCredentials, options: HttpClientConfig) => MarketplaceClient;
  createSupplier: (config: CasioFeedConfig) => SupplierFeedFetcher;
  createLogger: (config: Config) => Logger;
}

const defaultDependencies: CliDependencies = {
  createClient: createMarketplaceClient,
  createSupplier: createCasioFeedFetcher,
  createLogger: (config) => createConsoleLogger('FeedSync', { debug: config.debug }),
};

export interface CliArguments {
  marketplace: MarketplaceType;
  mode: RunMode;
}

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((mode) => mode === value);
}

const CLI_OPTIONS = {
  mode: { type: 'string', short: 'm', default: 'add-missing' },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${message}\n${USAGE}`);
  }
}

/**
 * Read `<marketplace> [--mode <mode>]`; throws ConfigError on anything else
 */
export function parseCliArguments(argv: string[]): CliArguments {
  const parsed = readArgs(argv);

  const [marketplace, ...extra] = parsed.positionals;
  if (marketplace === undefined || extra.length > 0 || !isMarketplaceType(marketplace)) {
    throw new ConfigError(USAGE);
  }

  const mode = parsed.values.mode ?? 'add-missing';
  if (!isRunMode(mode)) {
    throw new ConfigError(`Unknown mode "${mode}"\n${USAGE}`);
  }

  return { marketplace, mode };
}

function credentialsFor(marketplace: MarketplaceType, config: Config): MarketplaceCredentials[] {
  return marketplace === 'ozon' ? [ozonCredentials(config)] : yandexCampaigns(config);
}

/**
 * Run one mode against every configured account of a marketplace and
 * return the process exit code
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv,
  deps: CliDependencies = defaultDependencies
): Promise<number> {
  let config: Config;
  let args: CliArguments;
  try {
    args = parseCliArguments(argv);
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return EXIT_FATAL;
    }
    throw error;
  }

  const logger = deps.createLogger(config);
  const http: HttpClientConfig = {
    timeout: config.http.timeout,
    retryAttempts: config.http.retryAttempts,
    onRetry: (error, attempt) => logger.warn(`Retrying request (attempt ${attempt}): ${error.message}`),
  };

  try {
    const accounts = credentialsFor(args.marketplace, config);
    const supplier = shareCatalog(
      deps.createSupplier({ url: config.casioFeedUrl, retryAttempts: http.retryAttempts, onRetry: http.onRetry })
    );

    const reports: RunReport[] = [];
    for (const credentials of accounts) {
      const runner = createReconciliationRunner({
        marketplace: deps.createClient(credentials, http),
        supplier,
        logger,
        ...(credentials.type === 'yandex-market' ? { deliveryType: credentials.deliveryType } : {}),
      });

      reports.push(
        args.mode === 'sync' ? await runner.syncExistingListings() : await runner.addMissingListings()
      );
    }

    return reports.some((report) => report.failed.length > 0) ? EXIT_PARTIAL : EXIT_OK;
  } catch (error) {
    if (error instanceof FetchError) {
      const status = error.statusCode === undefined ? '' : ` (HTTP ${error.statusCode})`;
      logger.error(`Run aborted, ${error.source} unreachable [${error.code}]${status}: ${error.message}`);
      return EXIT_FATAL;
    }
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_FATAL;
    }
    throw error;
  }
}

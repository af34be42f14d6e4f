/**
 * Configuration
 * Environment parsing and marketplace credential selection
 */

import { z } from 'zod';
import {
  CASIO_FEED_URL,
  DELIVERY_TYPES,
  type OzonCredentials,
  type YandexMarketCredentials,
} from '@feedsync/integrations';
import { ConfigError } from './errors.js';

// ============================================================================
// Environment Schema
// ============================================================================

/** Unset and blank variables read the same */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const optionalCampaignId = z.preprocess(
  blankToUndefined,
  z.string().trim().regex(/^\d+$/, 'Expected a numeric campaign id').optional()
);

const optionalWarehouseId = z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional());

const booleanFlag = z.preprocess(
  blankToUndefined,
  z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1')
);

export const envSchema = z
  .object({
    OZON_CLIENT_ID: optionalText,
    OZON_SELLER_TOKEN: optionalText,
    YANDEX_MARKET_TOKEN: optionalText,
    YANDEX_FBS_CAMPAIGN_ID: optionalCampaignId,
    YANDEX_FBS_WAREHOUSE_ID: optionalWarehouseId,
    YANDEX_DBS_CAMPAIGN_ID: optionalCampaignId,
    YANDEX_DBS_WAREHOUSE_ID: optionalWarehouseId,
    CASIO_FEED_URL: z.preprocess(blankToUndefined, z.string().url().default(CASIO_FEED_URL)),
    HTTP_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(30000)),
    HTTP_RETRY_ATTEMPTS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(10).default(3)),
    DEBUG: booleanFlag,
  })
  .transform((env) => ({
    ozon: {
      clientId: env.OZON_CLIENT_ID,
      sellerToken: env.OZON_SELLER_TOKEN,
    },
    yandexMarket: {
      token: env.YANDEX_MARKET_TOKEN,
      campaigns: {
        FBS: { campaignId: env.YANDEX_FBS_CAMPAIGN_ID, warehouseId: env.YANDEX_FBS_WAREHOUSE_ID },
        DBS: { campaignId: env.YANDEX_DBS_CAMPAIGN_ID, warehouseId: env.YANDEX_DBS_WAREHOUSE_ID },
      },
    },
    casioFeedUrl: env.CASIO_FEED_URL,
    http: {
      timeout: env.HTTP_TIMEOUT_MS,
      retryAttempts: env.HTTP_RETRY_ATTEMPTS,
    },
    debug: env.DEBUG,
  }));

export type Config = z.output<typeof envSchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse configuration from environment variables.
 * Every invalid variable is listed in the thrown ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  return parsed.data;
}

// ============================================================================
// Credentials
// ============================================================================

export function ozonCredentials(config: Config): OzonCredentials {
  const { clientId, sellerToken } = config.ozon;
  const missing = [
    ...(clientId ? [] : ['OZON_CLIENT_ID']),
    ...(sellerToken ? [] : ['OZON_SELLER_TOKEN']),
  ];

  if (!clientId || !sellerToken) {
    throw new ConfigError(`Ozon credentials are missing: ${missing.join(', ')}`, missing);
  }

  return { type: 'ozon', clientId, sellerToken };
}

/**
 * Credentials of every configured Yandex Market campaign, FBS first.
 * A campaign id without its warehouse id is an error, as is configuring none.
 */
export function yandexCampaigns(config: Config): YandexMarketCredentials[] {
  const { token, campaigns } = config.yandexMarket;
  const configured = DELIVERY_TYPES.filter((deliveryType) => campaigns[deliveryType].campaignId !== undefined);

  if (configured.length === 0) {
    const issues = ['YANDEX_FBS_CAMPAIGN_ID', 'YANDEX_DBS_CAMPAIGN_ID'];
    throw new ConfigError('No Yandex Market campaign is configured', issues);
  }

  const credentials: YandexMarketCredentials[] = [];
  const missing: string[] = token ? [] : ['YANDEX_MARKET_TOKEN'];

  for (const deliveryType of configured) {
    const { campaignId, warehouseId } = campaigns[deliveryType];
    if (warehouseId === undefined) {
      missing.push(`YANDEX_${deliveryType}_WAREHOUSE_ID`);
      continue;
    }
    if (token && campaignId) {
      credentials.push({ type: 'yandex-market', token, campaignId, warehouseId, deliveryType });
    }
  }

  if (missing.length > 0) {
    throw new ConfigError(`Yandex Market credentials are missing: ${missing.join(', ')}`, missing);
  }

  return credentials;
}

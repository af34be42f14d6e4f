/**
 * Configuration Tests
 * Tests environment parsing and credential selection
 */

import { describe, it, expect } from 'vitest';
import { CASIO_FEED_URL } from '@feedsync/integrations';
import { loadConfig, ozonCredentials, yandexCampaigns } from '../config.js';
import { ConfigError } from '../errors.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.casioFeedUrl).toBe(CASIO_FEED_URL);
    expect(config.http).toEqual({ timeout: 30000, retryAttempts: 3 });
    expect(config.debug).toBe(false);
    expect(config.ozon.clientId).toBeUndefined();
  });

  it('should read blank variables as unset', () => {
    const config = loadConfig({ HTTP_TIMEOUT_MS: '', OZON_CLIENT_ID: '  ', DEBUG: '' });

    expect(config.http.timeout).toBe(30000);
    expect(config.ozon.clientId).toBeUndefined();
    expect(config.debug).toBe(false);
  });

  it('should parse numbers and flags', () => {
    const config = loadConfig({
      HTTP_TIMEOUT_MS: '5000',
      HTTP_RETRY_ATTEMPTS: '0',
      DEBUG: '1',
      YANDEX_FBS_CAMPAIGN_ID: '1001',
      YANDEX_FBS_WAREHOUSE_ID: '55',
    });

    expect(config.http).toEqual({ timeout: 5000, retryAttempts: 0 });
    expect(config.debug).toBe(true);
    expect(config.yandexMarket.campaigns.FBS).toEqual({ campaignId: '1001', warehouseId: 55 });
  });

  it('should list every invalid variable', () => {
    const error = configError(() =>
      loadConfig({ YANDEX_FBS_CAMPAIGN_ID: 'abc', HTTP_TIMEOUT_MS: 'soon', DEBUG: 'yes' })
    );

    expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
      'YANDEX_FBS_CAMPAIGN_ID',
      'HTTP_TIMEOUT_MS',
      'DEBUG',
    ]);
    expect(error.issues[0]).toBe('YANDEX_FBS_CAMPAIGN_ID: Expected a numeric campaign id');
    expect(error.message.startsWith('Invalid environment configuration: ')).toBe(true);
  });

  it('should reject a feed URL that is not a URL', () => {
    expect(() => loadConfig({ CASIO_FEED_URL: 'ostatki.zip' })).toThrow(ConfigError);
  });
});

describe('ozonCredentials', () => {
  it('should build credentials from the environment', () => {
    const config = loadConfig({ OZON_CLIENT_ID: 'test-client', OZON_SELLER_TOKEN: 'test-secret' });

    expect(ozonCredentials(config)).toEqual({
      type: 'ozon',
      clientId: 'test-client',
      sellerToken: 'test-secret',
    });
  });

  it('should name the missing variables', () => {
    const error = configError(() => ozonCredentials(loadConfig({ OZON_CLIENT_ID: 'test-client' })));

    expect(error.message).toBe('Ozon credentials are missing: OZON_SELLER_TOKEN');
    expect(error.issues).toEqual(['OZON_SELLER_TOKEN']);
  });
});

describe('yandexCampaigns', () => {
  const base = { YANDEX_MARKET_TOKEN: 'test-token' };

  it('should return FBS before DBS', () => {
    const config = loadConfig({
      ...base,
      YANDEX_DBS_CAMPAIGN_ID: '2002',
      YANDEX_DBS_WAREHOUSE_ID: '77',
      YANDEX_FBS_CAMPAIGN_ID: '1001',
      YANDEX_FBS_WAREHOUSE_ID: '55',
    });

    expect(yandexCampaigns(config)).toEqual([
      { type: 'yandex-market', token: 'test-token', campaignId: '1001', warehouseId: 55, deliveryType: 'FBS' },
      { type: 'yandex-market', token: 'test-token', campaignId: '2002', warehouseId: 77, deliveryType: 'DBS' },
    ]);
  });

  it('should return only the configured campaign', () => {
    const config = loadConfig({ ...base, YANDEX_DBS_CAMPAIGN_ID: '2002', YANDEX_DBS_WAREHOUSE_ID: '77' });

    expect(yandexCampaigns(config).map((c) => c.deliveryType)).toEqual(['DBS']);
  });

  it('should fail when no campaign is configured', () => {
    expect(() => yandexCampaigns(loadConfig(base))).toThrow('No Yandex Market campaign is configured');
  });

  it('should fail when a campaign has no warehouse', () => {
    const config = loadConfig({ ...base, YANDEX_FBS_CAMPAIGN_ID: '1001' });

    expect(() => yandexCampaigns(config)).toThrow(
      'Yandex Market credentials are missing: YANDEX_FBS_WAREHOUSE_ID'
    );
  });

  it('should fail without a token', () => {
    const config = loadConfig({ YANDEX_FBS_CAMPAIGN_ID: '1001', YANDEX_FBS_WAREHOUSE_ID: '55' });

    expect(() => yandexCampaigns(config)).toThrow('Yandex Market credentials are missing: YANDEX_MARKET_TOKEN');
  });
});

/**
 * Client Factory Tests
 */

import { describe, it, expect } from 'vitest';
import { createMarketplaceClient, isMarketplaceType } from '../factory.js';
import { OzonApiClient } from '../ozon/client.js';
import { YandexMarketApiClient } from '../yandex-market/client.js';

describe('createMarketplaceClient', () => {
  it('should create an Ozon client', () => {
    const client = createMarketplaceClient({ type: 'ozon', clientId: 'test-client', sellerToken: 'test-secret' });

    expect(client).toBeInstanceOf(OzonApiClient);
    expect(client.marketplace).toBe('ozon');
  });

  it('should create a Yandex Market client bound to its campaign', () => {
    const client = createMarketplaceClient({
      type: 'yandex-market',
      token: 'test-token',
      campaignId: '2002',
      warehouseId: 7,
      deliveryType: 'DBS',
    });

    expect(client).toBeInstanceOf(YandexMarketApiClient);
    expect(client.marketplace).toBe('yandex-market');
    if (client instanceof YandexMarketApiClient) {
      expect(client.deliveryType).toBe('DBS');
      expect(client.campaignId).toBe('2002');
    }
  });
});

describe('isMarketplaceType', () => {
  it('should accept known marketplaces only', () => {
    expect(isMarketplaceType('ozon')).toBe(true);
    expect(isMarketplaceType('yandex-market')).toBe(true);
    expect(isMarketplaceType('wildberries')).toBe(false);
  });
});

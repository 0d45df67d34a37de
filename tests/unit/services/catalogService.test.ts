import { describe, it, expect, vi } from 'vitest';
import { CatalogService } from '../../../src/services/catalog/catalogService';
import type { SportsDataGateway } from '../../../src/services/catalog/dataGatewayClient';
import { InMemoryAccountStore } from '../../../src/repositories';
import type { Catalog } from '../../../src/types';
import { createCatalog } from '../../fixtures/factories';

function gatewayReturning(catalog: Catalog): SportsDataGateway {
  return {
    fetchCatalog: vi.fn(async () => catalog),
    fetchMatches: vi.fn(async () => []),
  };
}

describe('CatalogService', () => {
  it('starts empty', () => {
    const service = new CatalogService(gatewayReturning(createCatalog()));

    expect(service.getSnapshot()).toEqual({});
    expect(service.sportCount()).toBe(0);
  });

  it('loads and freezes the catalog on refresh', async () => {
    const service = new CatalogService(gatewayReturning(createCatalog()));

    await service.refresh();

    expect(service.sportCount()).toBe(3);
    expect(Object.isFrozen(service.getSnapshot())).toBe(true);
    expect(Object.isFrozen(service.getSnapshot().soccer[0])).toBe(true);
  });

  it('keeps running with an empty catalog when the gateway has nothing', async () => {
    const service = new CatalogService(gatewayReturning({}));

    await expect(service.refresh()).resolves.toEqual({});
    expect(service.sportCount()).toBe(0);
  });

  describe('seedPlaceholderBets', () => {
    it('inserts one pending row per active tournament into an empty ledger', async () => {
      const service = new CatalogService(gatewayReturning(createCatalog()));
      await service.refresh();
      const store = new InMemoryAccountStore();

      const inserted = await service.seedPlaceholderBets(store, 10);

      expect(inserted).toBe(3);
      expect(await store.countAllBets()).toBe(3);
    });

    it('does nothing once the ledger has rows', async () => {
      const service = new CatalogService(gatewayReturning(createCatalog()));
      await service.refresh();
      const store = new InMemoryAccountStore();
      await service.seedPlaceholderBets(store, 10);

      await expect(service.seedPlaceholderBets(store, 10)).resolves.toBe(0);
      expect(await store.countAllBets()).toBe(3);
    });

    it('writes the tournament key and title with no user or match', async () => {
      const service = new CatalogService(gatewayReturning({ basketball: createCatalog().basketball }));
      await service.refresh();
      const store = new InMemoryAccountStore();
      const appendBets = vi.spyOn(store, 'appendBets');

      await service.seedPlaceholderBets(store, 10);

      expect(appendBets).toHaveBeenCalledTimes(1);
      expect(appendBets).toHaveBeenCalledWith([
        {
          user_id: null,
          sport_key: 'basketball_nba',
          event_name: 'NBA',
          match_id: null,
          status: 'pending',
          cost: 10,
        },
      ]);
    });

    it('writes nothing when no tournament is active', async () => {
      const service = new CatalogService(gatewayReturning({}));
      await service.refresh();
      const store = new InMemoryAccountStore();
      const appendBets = vi.spyOn(store, 'appendBets');

      await expect(service.seedPlaceholderBets(store, 10)).resolves.toBe(0);
      expect(appendBets).not.toHaveBeenCalled();
    });

    it('reports zero when the store fails', async () => {
      const service = new CatalogService(gatewayReturning(createCatalog()));
      await service.refresh();
      const store = new InMemoryAccountStore();
      vi.spyOn(store, 'countAllBets').mockRejectedValue(new Error('db down'));

      await expect(service.seedPlaceholderBets(store, 10)).resolves.toBe(0);
    });
  });
});

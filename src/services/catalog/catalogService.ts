/**
 * Catalog Service
 *
 * Holds the process-wide sport → tournament snapshot. It is fetched once at
 * startup and never refreshed afterwards; a failed fetch leaves the snapshot
 * empty and the server keeps running.
 */

import type { AccountStore } from '../../repositories';
import type { Catalog, NewBet } from '../../types';
import { createLogger, errorMessage } from '../../utils/logger';
import { activeTournaments, freezeCatalog, listSports } from './catalogSnapshot';
import type { SportsDataGateway } from './dataGatewayClient';

const logger = createLogger('catalogService');

export class CatalogService {
  private snapshot: Readonly<Catalog> = freezeCatalog({});

  constructor(private readonly gateway: SportsDataGateway) {}

  getSnapshot(): Readonly<Catalog> {
    return this.snapshot;
  }

  sportCount(): number {
    return listSports(this.snapshot).length;
  }

  /**
   * Load the catalog. Never throws: the gateway already degrades to `{}`.
   */
  async refresh(): Promise<Readonly<Catalog>> {
    const catalog = await this.gateway.fetchCatalog();
    const sports = listSports(catalog);
    if (!sports.length) {
      logger.error({}, 'sports catalog unavailable — continuing with an empty catalog');
    } else {
      logger.info({ sports: sports.length }, 'sports catalog loaded');
    }
    this.snapshot = freezeCatalog(catalog);
    return this.snapshot;
  }

  /**
   * One-time bootstrap: insert a placeholder ledger row per active
   * tournament, only while the ledger is still empty.
   */
  async seedPlaceholderBets(store: AccountStore, cost: number): Promise<number> {
    try {
      const existing = await store.countAllBets();
      if (existing > 0) {
        logger.debug({ existing }, 'ledger already populated — skipping seed');
        return 0;
      }

      const rows: NewBet[] = [];
      for (const sport of listSports(this.snapshot)) {
        for (const tournament of activeTournaments(this.snapshot, sport)) {
          rows.push({
            user_id: null,
            sport_key: tournament.key,
            event_name: tournament.title,
            match_id: null,
            status: 'pending',
            cost,
          });
        }
      }

      if (rows.length) {
        await store.appendBets(rows);
        logger.info({ inserted: rows.length }, 'placeholder bets seeded');
      }
      return rows.length;
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'failed to seed placeholder bets');
      return 0;
    }
  }
}

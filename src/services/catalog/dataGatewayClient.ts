/**
 * Sports data gateway client.
 *
 * Fetches the sport → tournament catalog and per-tournament match lists
 * (with embedded odds). Every failure mode (timeout, non-2xx, malformed
 * body, open circuit) is logged and surfaces as an empty result.
 */

import { createLogger, errorMessage } from '../../utils/logger';
import { CircuitBreaker, CircuitOpenError } from '../../utils/circuitBreaker';
import { catalogSchema, matchSchema, tournamentSchema, type Catalog, type Match, type Tournament } from '../../types';

const logger = createLogger('dataGatewayClient');

const CATALOG_PATH = '/fetch_sports_list';
const MATCHES_PATH = '/fetch_event_list';

export interface SportsDataGateway {
  fetchCatalog(): Promise<Catalog>;
  fetchMatches(eventKey: string): Promise<Match[]>;
}

export interface DataGatewayClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  breaker?: CircuitBreaker;
  fetchImpl?: typeof fetch;
}

export class DataGatewayClient implements SportsDataGateway {
  private readonly baseUrl: string;
  private readonly breaker: CircuitBreaker;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: DataGatewayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.breaker = options.breaker ?? new CircuitBreaker({ name: 'dataGateway' });
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchCatalog(): Promise<Catalog> {
    const body = await this.getJson(`${this.baseUrl}${CATALOG_PATH}`);
    if (body === null) return {};

    const parsed = catalogSchema.safeParse(body);
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues.length }, 'catalog response is not a sport → tournaments map');
      return {};
    }

    const catalog: Catalog = {};
    for (const [sport, rawTournaments] of Object.entries(parsed.data)) {
      catalog[sport] = rawTournaments.flatMap((raw): Tournament[] => {
        const tournament = tournamentSchema.safeParse(raw);
        if (!tournament.success) {
          logger.warn({ sport }, 'dropping malformed tournament');
          return [];
        }
        return [tournament.data];
      });
    }
    return catalog;
  }

  async fetchMatches(eventKey: string): Promise<Match[]> {
    const url = `${this.baseUrl}${MATCHES_PATH}?event_key=${encodeURIComponent(eventKey)}`;
    const body = await this.getJson(url);
    if (body === null) return [];
    if (!Array.isArray(body)) {
      logger.error({ eventKey }, 'match response is not a list');
      return [];
    }

    return body.flatMap((raw: unknown): Match[] => {
      const match = matchSchema.safeParse(raw);
      if (!match.success) {
        logger.warn({ eventKey }, 'dropping malformed match');
        return [];
      }
      return [match.data];
    });
  }

  private async getJson(url: string): Promise<unknown | null> {
    try {
      return await this.breaker.call(async () => {
        const res = await this.fetchImpl(url, {
          headers: {
            Authorization: `Bearer ${this.options.token}`,
            'Content-Type': 'application/json',
          },
          signal: AbortSignal.timeout(this.options.timeoutMs),
        });
        if (!res.ok) {
          throw new Error(`HTTP ${res.status}`);
        }
        const body: unknown = await res.json();
        return body;
      });
    } catch (err) {
      if (err instanceof CircuitOpenError) {
        logger.warn({ url }, 'data gateway circuit open — skipping request');
      } else {
        logger.error({ url, error: errorMessage(err) }, 'data gateway request failed');
      }
      return null;
    }
  }
}

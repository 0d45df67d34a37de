/**
 * Inbound de-duplication by Twilio `MessageSid`.
 *
 * Twilio retries a webhook it considers failed. The first delivery of a SID
 * claims it for a short processing window; once the turn has run the claim
 * is kept for the full TTL and later deliveries are acknowledged without
 * processing. A claim whose process died mid-turn lapses with the window,
 * so Twilio's retry is handled.
 */

import { INBOUND_DEDUPE_PREFIX } from '../../constants/betting';
import { createLogger, errorMessage } from '../../utils/logger';
import type { RedisCommandClient } from '../../utils/redisClient';

const logger = createLogger('inboundDedupe');

/** Sweep expired in-memory entries once the map grows past this. */
const SWEEP_THRESHOLD = 10_000;

export interface InboundDeduplicator {
  /** True when nobody is processing or has processed `messageSid`. */
  claim(messageSid: string): Promise<boolean>;
  /** The turn ran; remember the SID for the full TTL. */
  complete(messageSid: string): Promise<void>;
  /** The turn failed; let a redelivery be processed. */
  release(messageSid: string): Promise<void>;
}

export interface InboundDeduplicatorOptions {
  ttlSeconds: number;
  processingTtlSeconds: number;
}

export function inboundMessageKey(messageSid: string): string {
  return `${INBOUND_DEDUPE_PREFIX}:${messageSid}`;
}

export class RedisInboundDeduplicator implements InboundDeduplicator {
  constructor(
    private readonly redis: RedisCommandClient,
    private readonly options: InboundDeduplicatorOptions,
  ) {}

  async claim(messageSid: string): Promise<boolean> {
    try {
      const acquired = await this.redis.set(
        inboundMessageKey(messageSid),
        'processing',
        'EX',
        this.options.processingTtlSeconds,
        'NX',
      );
      return acquired === 'OK';
    } catch (err) {
      logger.error({ messageSid, error: errorMessage(err) }, 'dedupe check failed, processing anyway');
      return true;
    }
  }

  async complete(messageSid: string): Promise<void> {
    try {
      await this.redis.set(inboundMessageKey(messageSid), 'done', 'EX', this.options.ttlSeconds);
    } catch (err) {
      logger.warn({ messageSid, error: errorMessage(err) }, 'could not mark message processed');
    }
  }

  async release(messageSid: string): Promise<void> {
    try {
      await this.redis.del(inboundMessageKey(messageSid));
    } catch (err) {
      logger.warn({ messageSid, error: errorMessage(err) }, 'could not release message claim');
    }
  }
}

export interface InMemoryInboundDeduplicatorOptions extends InboundDeduplicatorOptions {
  now?: () => number;
}

export class InMemoryInboundDeduplicator implements InboundDeduplicator {
  private readonly seen = new Map<string, number>();
  private readonly now: () => number;

  constructor(private readonly options: InMemoryInboundDeduplicatorOptions) {
    this.now = options.now ?? Date.now;
  }

  async claim(messageSid: string): Promise<boolean> {
    const now = this.now();
    if (this.seen.size > SWEEP_THRESHOLD) {
      this.sweep(now);
    }

    const expiresAt = this.seen.get(messageSid);
    if (expiresAt !== undefined && expiresAt > now) {
      return false;
    }
    this.seen.set(messageSid, now + this.options.processingTtlSeconds * 1000);
    return true;
  }

  async complete(messageSid: string): Promise<void> {
    this.seen.set(messageSid, this.now() + this.options.ttlSeconds * 1000);
  }

  async release(messageSid: string): Promise<void> {
    this.seen.delete(messageSid);
  }

  private sweep(now: number): void {
    for (const [sid, expiresAt] of this.seen) {
      if (expiresAt <= now) this.seen.delete(sid);
    }
  }
}

/**
 * Redis Lock
 *
 * Cross-process mutual exclusion per key: `SET key token NX PX ttl`, polled
 * until acquired or the wait budget runs out. Release only deletes the key
 * while it still holds our token, so a lock that expired and was taken by
 * someone else is left alone.
 */

import { randomUUID } from 'node:crypto';
import { AppError } from '../errors';
import { CONVERSATION_BUSY } from '../constants/errorMessages';
import { createLogger, errorMessage } from './logger';
import type { RedisCommandClient } from './redisClient';

const logger = createLogger('redisLock');

export const RELEASE_LOCK_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

export interface RedisLockOptions {
  prefix: string;
  /** Lock lifetime; bounds how long a crashed holder blocks the key. */
  ttlMs: number;
  /** Give up acquiring after this long. */
  waitMs: number;
  retryDelayMs?: number;
  now?: () => number;
}

const DEFAULT_RETRY_DELAY_MS = 50;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RedisLock {
  private readonly retryDelayMs: number;
  private readonly now: () => number;

  constructor(
    private readonly redis: RedisCommandClient,
    private readonly options: RedisLockOptions,
  ) {
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run `fn` while holding the lock for `key`.
   * Throws `AppError.conflict` when the lock cannot be taken within `waitMs`.
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lockKey = `${this.options.prefix}:${key}`;
    const token = randomUUID();
    await this.acquire(lockKey, token);

    try {
      return await fn();
    } finally {
      await this.release(lockKey, token);
    }
  }

  private async acquire(lockKey: string, token: string): Promise<void> {
    const deadline = this.now() + this.options.waitMs;
    for (;;) {
      const acquired = await this.redis.set(lockKey, token, 'PX', this.options.ttlMs, 'NX');
      if (acquired === 'OK') return;

      if (this.now() >= deadline) {
        logger.warn({ lockKey, waitMs: this.options.waitMs }, 'lock wait budget exhausted');
        throw AppError.conflict(CONVERSATION_BUSY, { lockKey });
      }
      await sleep(this.retryDelayMs);
    }
  }

  private async release(lockKey: string, token: string): Promise<void> {
    try {
      const released = await this.redis.eval(RELEASE_LOCK_SCRIPT, 1, lockKey, token);
      if (released !== 1) {
        logger.warn({ lockKey }, 'lock expired before release');
      }
    } catch (err) {
      // The key still expires after ttlMs.
      logger.error({ lockKey, error: errorMessage(err) }, 'failed to release lock');
    }
  }
}

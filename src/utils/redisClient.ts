/**
 * Shared Redis Client
 *
 * One lazily created connection shared by the conversation store, the
 * per-user lock and the inbound de-duplication. Redis is optional: when
 * `REDIS_URL` is unset the server falls back to in-process stores.
 */

import Redis from 'ioredis';
import type { ConnectionOptions } from 'bullmq';
import { getEnv } from '../config/env';
import { createLogger, errorMessage } from './logger';

const logger = createLogger('redis');

/** Maximum reconnect attempts before giving up. */
const MAX_RECONNECT_RETRIES = 20;

/** Base delay for exponential backoff (ms). */
const BASE_RECONNECT_DELAY_MS = 500;

/** Hard cap on reconnect delay (ms). */
const MAX_RECONNECT_DELAY_MS = 30_000;

let sharedRedis: Redis | null = null;

/**
 * The commands the stores and locks issue, spelled the way they call them.
 * `Redis` satisfies it; tests hand in the in-memory mock.
 */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', ttlSeconds: number): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', ttlSeconds: number, condition: 'NX'): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number, condition: 'NX'): Promise<string | null>;
  del(key: string): Promise<number>;
  eval(script: string, numKeys: number, key: string, arg: string): Promise<unknown>;
  ping(): Promise<string>;
}

function requireRedisUrl(): string {
  const url = getEnv().REDIS_URL;
  if (!url) {
    throw new Error('[redis] REDIS_URL not configured');
  }
  return url;
}

function buildRedis(): Redis {
  const client = new Redis(requireRedisUrl(), {
    retryStrategy(times: number): number | null {
      if (times > MAX_RECONNECT_RETRIES) {
        logger.error({ attempts: times }, 'max reconnect retries exceeded, giving up');
        return null;
      }
      const delay = Math.min(
        BASE_RECONNECT_DELAY_MS * Math.pow(2, times - 1),
        MAX_RECONNECT_DELAY_MS,
      );
      logger.warn({ attempt: times, delayMs: delay }, 'reconnecting…');
      return delay;
    },
    maxRetriesPerRequest: null,
  });
  client.on('error', (err: unknown) => {
    logger.error({ error: errorMessage(err) }, 'connection error');
  });
  logger.info({}, 'client initialized');
  return client;
}

/**
 * Get the shared Redis client instance.
 * Creates the connection on first call.
 */
export function getRedisClient(): Redis {
  if (sharedRedis) {
    return sharedRedis;
  }
  sharedRedis = buildRedis();
  return sharedRedis;
}

/**
 * BullMQ manages its own connections; hand it the parsed URL.
 */
export function getRedisConnectionOptions(): ConnectionOptions {
  const parsed = new URL(requireRedisUrl());
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    username: parsed.username || undefined,
    ...(parsed.protocol === 'rediss:' && { tls: {} }),
  };
}

/**
 * Close the shared Redis connection.
 */
export async function closeRedisClient(): Promise<void> {
  if (!sharedRedis) return;
  const client = sharedRedis;
  sharedRedis = null;
  try {
    await client.quit();
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'quit error');
  }
}

/**
 * Health Check Utilities
 *
 * Health check functions for the server's dependencies, used by the
 * /health endpoint. Redis and Supabase are only checked when configured.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { createLogger, errorMessage } from '../utils/logger';
import type { RedisCommandClient } from '../utils/redisClient';

const logger = createLogger('healthCheck');

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface HealthCheckResult {
  ok: boolean;
  latencyMs?: number;
  error?: string;
}

export interface CatalogHealthResult extends HealthCheckResult {
  sports: number;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    redis?: HealthCheckResult;
    supabase?: HealthCheckResult;
    catalog: CatalogHealthResult;
  };
}

export interface HealthDependencies {
  redis?: Pick<RedisCommandClient, 'ping'>;
  supabase?: SupabaseClient;
  catalog: { sportCount(): number };
}

// ─────────────────────────────────────────────────────────────────────────────
// Individual Health Checks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check Redis connectivity by sending a PING command.
 */
export async function checkRedisHealth(redis: Pick<RedisCommandClient, 'ping'>): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    const result = await redis.ping();
    const latencyMs = Date.now() - start;

    if (result === 'PONG') {
      return { ok: true, latencyMs };
    }
    return { ok: false, latencyMs, error: `Unexpected PING response: ${result}` };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn({ error: message }, 'Redis health check failed');
    return { ok: false, latencyMs: Date.now() - start, error: message };
  }
}

/**
 * Check Supabase connectivity with a one-row read of the accounts table.
 */
export async function checkSupabaseHealth(supabase: SupabaseClient): Promise<HealthCheckResult> {
  const start = Date.now();
  try {
    const { error } = await supabase.from('users').select('user_id').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      // Permission denied still proves the connection works.
      if (error.code === 'PGRST301' || error.code === '42501') {
        return { ok: true, latencyMs };
      }
      return { ok: false, latencyMs, error: error.message };
    }
    return { ok: true, latencyMs };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn({ error: message }, 'Supabase health check failed');
    return { ok: false, latencyMs: Date.now() - start, error: message };
  }
}

export function checkCatalogHealth(catalog: { sportCount(): number }): CatalogHealthResult {
  const sports = catalog.sportCount();
  return sports > 0 ? { ok: true, sports } : { ok: false, sports, error: 'Sports catalog is empty' };
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregated Health Check
// ─────────────────────────────────────────────────────────────────────────────

const startTime = Date.now();

export async function getHealthStatus(deps: HealthDependencies): Promise<HealthStatus> {
  const [redis, supabase] = await Promise.all([
    deps.redis ? checkRedisHealth(deps.redis) : Promise.resolve(undefined),
    deps.supabase ? checkSupabaseHealth(deps.supabase) : Promise.resolve(undefined),
  ]);
  const catalog = checkCatalogHealth(deps.catalog);

  const results = [redis, supabase, catalog].filter(
    (result): result is HealthCheckResult => result !== undefined,
  );
  const passing = results.filter((result) => result.ok).length;

  let status: HealthStatus['status'];
  if (passing === results.length) {
    status = 'healthy';
  } else if (passing > 0) {
    status = 'degraded';
  } else {
    status = 'unhealthy';
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: {
      ...(redis ? { redis } : {}),
      ...(supabase ? { supabase } : {}),
      catalog,
    },
  };
}

/**
 * Unit Tests: Health Check
 */

import { describe, it, expect } from 'vitest';
import {
  checkCatalogHealth,
  checkRedisHealth,
  checkSupabaseHealth,
  getHealthStatus,
} from '../../../src/infrastructure/healthCheck';
import { MockRedisClient } from '../../helpers/mockRedis';
import { MockSupabaseClient, asMockSupabase } from '../../helpers/mockSupabase';

const catalogWith = (sports: number) => ({ sportCount: () => sports });

describe('healthCheck', () => {
  describe('checkRedisHealth', () => {
    it('passes when PING answers PONG', async () => {
      const result = await checkRedisHealth(new MockRedisClient());

      expect(result.ok).toBe(true);
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('reports an unexpected reply', async () => {
      const result = await checkRedisHealth({ ping: async () => 'LOADING' });

      expect(result).toMatchObject({ ok: false, error: 'Unexpected PING response: LOADING' });
    });

    it('reports a connection error', async () => {
      const redis = new MockRedisClient();
      redis.failWith = new Error('Connection refused');

      await expect(checkRedisHealth(redis)).resolves.toMatchObject({ ok: false, error: 'Connection refused' });
    });
  });

  describe('checkSupabaseHealth', () => {
    it('passes on a successful read', async () => {
      const supabase = new MockSupabaseClient();
      supabase.mockTable('users').setResult([]);

      await expect(checkSupabaseHealth(asMockSupabase(supabase))).resolves.toMatchObject({ ok: true });
    });

    it('treats permission denied as reachable', async () => {
      const supabase = new MockSupabaseClient();
      supabase.mockTable('users').setResult(null, { message: 'permission denied', code: '42501' });

      await expect(checkSupabaseHealth(asMockSupabase(supabase))).resolves.toMatchObject({ ok: true });
    });

    it('fails on other errors', async () => {
      const supabase = new MockSupabaseClient();
      supabase.mockTable('users').setResult(null, { message: 'relation does not exist', code: '42P01' });

      await expect(checkSupabaseHealth(asMockSupabase(supabase))).resolves.toMatchObject({
        ok: false,
        error: 'relation does not exist',
      });
    });
  });

  describe('checkCatalogHealth', () => {
    it('fails when the catalog is empty', () => {
      expect(checkCatalogHealth(catalogWith(0))).toEqual({ ok: false, sports: 0, error: 'Sports catalog is empty' });
      expect(checkCatalogHealth(catalogWith(4))).toEqual({ ok: true, sports: 4 });
    });
  });

  describe('getHealthStatus', () => {
    it('is healthy when every configured check passes', async () => {
      const status = await getHealthStatus({ redis: new MockRedisClient(), catalog: catalogWith(2) });

      expect(status.status).toBe('healthy');
      expect(Object.keys(status.checks).sort()).toEqual(['catalog', 'redis']);
    });

    it('only checks the catalog without redis or supabase', async () => {
      const status = await getHealthStatus({ catalog: catalogWith(1) });

      expect(status.status).toBe('healthy');
      expect(status.checks).toEqual({ catalog: { ok: true, sports: 1 } });
    });

    it('is degraded when some checks fail', async () => {
      const status = await getHealthStatus({ redis: new MockRedisClient(), catalog: catalogWith(0) });

      expect(status.status).toBe('degraded');
    });

    it('is unhealthy when every check fails', async () => {
      const redis = new MockRedisClient();
      redis.failWith = new Error('down');

      const status = await getHealthStatus({ redis, catalog: catalogWith(0) });

      expect(status.status).toBe('unhealthy');
    });
  });
});

import { describe, it, expect, beforeEach } from 'vitest';
import { RedisLock, RELEASE_LOCK_SCRIPT } from '../../../src/utils/redisLock';
import { AppError } from '../../../src/errors';
import { createMockRedis, type MockRedisClient } from '../../helpers/mockRedis';

function withReleaseScript(redis: MockRedisClient): MockRedisClient {
  redis.defineScript(RELEASE_LOCK_SCRIPT, async (client, [key], [token]) => {
    if ((await client.get(key)) === token) {
      return client.del(key);
    }
    return 0;
  });
  return redis;
}

describe('RedisLock', () => {
  let redis: MockRedisClient;

  beforeEach(() => {
    redis = withReleaseScript(createMockRedis());
  });

  it('holds the key with a PX expiry while fn runs and deletes it afterwards', async () => {
    const clock = 50_000;
    redis = withReleaseScript(createMockRedis({ now: () => clock }));
    const lock = new RedisLock(redis, { prefix: 'lock', ttlMs: 15_000, waitMs: 1_000, now: () => clock });

    const result = await lock.withLock('user-1', async () => {
      expect(await redis.get('lock:user-1')).not.toBeNull();
      expect(redis.ttlMs('lock:user-1')).toBe(15_000);
      return 'done';
    });

    expect(result).toBe('done');
    expect(await redis.get('lock:user-1')).toBeNull();
  });

  it('releases the lock when fn throws', async () => {
    const lock = new RedisLock(redis, { prefix: 'lock', ttlMs: 15_000, waitMs: 1_000 });

    await expect(
      lock.withLock('user-1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(await redis.get('lock:user-1')).toBeNull();
  });

  it('rejects with a 409 when the lock stays taken past the wait budget', async () => {
    await redis.set('lock:user-1', 'other-holder', 'PX', 15_000, 'NX');
    const lock = new RedisLock(redis, { prefix: 'lock', ttlMs: 15_000, waitMs: 0 });

    const attempt = lock.withLock('user-1', async () => 'never');

    await expect(attempt).rejects.toBeInstanceOf(AppError);
    await expect(attempt).rejects.toMatchObject({ statusCode: 409, code: 'CONFLICT' });
    expect(await redis.get('lock:user-1')).toBe('other-holder');
  });

  it('acquires once the current holder lets go', async () => {
    await redis.set('lock:user-1', 'other-holder', 'PX', 15_000, 'NX');
    const lock = new RedisLock(redis, { prefix: 'lock', ttlMs: 15_000, waitMs: 2_000, retryDelayMs: 5 });

    setTimeout(() => {
      void redis.del('lock:user-1');
    }, 20);

    await expect(lock.withLock('user-1', async () => 'acquired')).resolves.toBe('acquired');
  });

  it('leaves a lock taken over by another holder in place', async () => {
    const lock = new RedisLock(redis, { prefix: 'lock', ttlMs: 15_000, waitMs: 1_000 });

    await lock.withLock('user-1', async () => {
      // Simulate expiry followed by another process taking the key.
      await redis.set('lock:user-1', 'new-holder', 'EX', 15);
    });

    expect(await redis.get('lock:user-1')).toBe('new-holder');
  });
});

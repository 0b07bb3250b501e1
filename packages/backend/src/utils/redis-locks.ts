/**
 * Distributed lock helpers on top of SET NX EX.
 *
 * Used by the mirror reconciliation sweep so only one instance sweeps at a time.
 */

import type { RedisConnection } from './redis';
import { logger } from './logger';

/**
 * Lua script to release a lock only if the caller owns it.
 * Prevents accidentally releasing another instance's lock.
 *
 * KEYS[1] = lock key
 * ARGV[1] = expected lock value (owner identifier)
 * Returns: 1 if released, 0 if not owned
 */
export const RELEASE_LOCK_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
else
  return 0
end
`;

/**
 * Lua script to renew a lock only if the caller owns it.
 *
 * KEYS[1] = lock key
 * ARGV[1] = expected lock value (owner identifier)
 * ARGV[2] = new TTL in seconds
 * Returns: 1 if renewed, 0 if lock was taken by another instance
 */
export const RENEW_LOCK_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('expire', KEYS[1], ARGV[2])
else
  return 0
end
`;

export interface DistributedLocks {
  /** true if acquired, false if held by another instance */
  acquire(lockKey: string, instanceId: string, ttlSeconds: number): Promise<boolean>;
  /** false if the lock was lost */
  renew(lockKey: string, instanceId: string, ttlSeconds: number): Promise<boolean>;
  release(lockKey: string, instanceId: string, context?: string): Promise<void>;
}

export type LockConnection = Pick<RedisConnection, 'setNX' | 'eval'>;

/**
 * Locks backed by a Redis connection. When Redis is unreachable, acquisition
 * succeeds so a single instance keeps working with only its local guard.
 */
export function createRedisLocks(connection: LockConnection): DistributedLocks {
  return {
    async acquire(lockKey, instanceId, ttlSeconds) {
      try {
        const result = await connection.setNX(lockKey, instanceId, ttlSeconds);
        return result === 'OK';
      } catch (error) {
        logger.warn({ error, lockKey }, 'Redis unavailable for lock - using local guard only');
        return true;
      }
    },

    async renew(lockKey, instanceId, ttlSeconds) {
      try {
        const result = await connection.eval(RENEW_LOCK_SCRIPT, 1, lockKey, instanceId, ttlSeconds);
        return result === 1;
      } catch (error) {
        logger.warn({ error, lockKey }, 'Failed to renew lock');
        return false;
      }
    },

    async release(lockKey, instanceId, context) {
      try {
        await connection.eval(RELEASE_LOCK_SCRIPT, 1, lockKey, instanceId);
      } catch (error) {
        logger.warn({ error, lockKey, context }, 'Failed to release lock');
      }
    },
  };
}

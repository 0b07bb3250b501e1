/**
 * Tests for the Redis-backed sweep lock and the locked task runner
 */

jest.mock('../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

import { LockedTaskRunner } from '../utils/locked-task-runner';
import { createRedisLocks, RELEASE_LOCK_SCRIPT, RENEW_LOCK_SCRIPT, type LockConnection } from '../utils/redis-locks';
import { MemoryLocks } from './support/memory-locks';

/**
 * Evaluates the two lock scripts against a Map, the way Redis would
 */
class FakeLockConnection implements LockConnection {
  readonly values = new Map<string, string>();
  down = false;

  async setNX(key: string, value: string): Promise<'OK' | 'EXISTS'> {
    if (this.down) throw new Error('ECONNREFUSED');
    if (this.values.has(key)) return 'EXISTS';
    this.values.set(key, value);
    return 'OK';
  }

  async eval(script: string, _numKeys: number, ...args: (string | number)[]): Promise<unknown> {
    if (this.down) throw new Error('ECONNREFUSED');
    const [key, owner] = args.map(String);
    if (this.values.get(key) !== owner) return 0;
    if (script === RELEASE_LOCK_SCRIPT) this.values.delete(key);
    return script === RENEW_LOCK_SCRIPT || script === RELEASE_LOCK_SCRIPT ? 1 : 0;
  }
}

describe('createRedisLocks', () => {
  it('grants the lock to one owner at a time', async () => {
    const locks = createRedisLocks(new FakeLockConnection());

    expect(await locks.acquire('lock:test', 'a', 60)).toBe(true);
    expect(await locks.acquire('lock:test', 'b', 60)).toBe(false);
  });

  it('renews and releases only for the owner', async () => {
    const connection = new FakeLockConnection();
    const locks = createRedisLocks(connection);
    await locks.acquire('lock:test', 'a', 60);

    expect(await locks.renew('lock:test', 'b', 60)).toBe(false);
    expect(await locks.renew('lock:test', 'a', 60)).toBe(true);

    await locks.release('lock:test', 'b');
    expect(connection.values.get('lock:test')).toBe('a');
    await locks.release('lock:test', 'a');
    expect(connection.values.has('lock:test')).toBe(false);
  });

  it('falls back to the local guard when Redis is down', async () => {
    const connection = new FakeLockConnection();
    connection.down = true;
    const locks = createRedisLocks(connection);

    expect(await locks.acquire('lock:test', 'a', 60)).toBe(true);
    expect(await locks.renew('lock:test', 'a', 60)).toBe(false);
    await expect(locks.release('lock:test', 'a')).resolves.toBeUndefined();
  });
});

describe('LockedTaskRunner', () => {
  const settings = {
    lockKey: 'lock:test-task',
    lockTtlSeconds: 60,
    renewalIntervalMs: 10_000,
    instanceId: 'instance-a',
  };

  it('runs the task under the lock and releases it', async () => {
    const locks = new MemoryLocks();
    const runner = new LockedTaskRunner(settings, locks);

    const outcome = await runner.run(async (ctx) => {
      expect(locks.held.get('lock:test-task')).toBe('instance-a');
      expect(ctx.isLockValid()).toBe(true);
      return 3;
    });

    expect(outcome).toEqual({ acquired: true, result: 3 });
    expect(locks.held.size).toBe(0);
  });

  it('skips the task when another instance holds the lock', async () => {
    const locks = new MemoryLocks();
    locks.held.set('lock:test-task', 'instance-b');
    const task = jest.fn(async () => 1);

    const outcome = await new LockedTaskRunner(settings, locks).run(task);

    expect(outcome).toEqual({ acquired: false });
    expect(task).not.toHaveBeenCalled();
  });

  it('reports a failed task and still releases the lock', async () => {
    const locks = new MemoryLocks();

    const outcome = await new LockedTaskRunner(settings, locks).run(async () => {
      throw new Error('sweep crashed');
    });

    expect(outcome.acquired).toBe(true);
    expect(outcome.error?.message).toBe('sweep crashed');
    expect(locks.held.size).toBe(0);
  });
});

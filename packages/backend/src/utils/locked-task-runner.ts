/**
 * Locked Task Runner
 *
 * "acquire distributed lock → run task → release", with the lock renewed
 * while the task runs.
 *
 * Usage:
 *   const runner = new LockedTaskRunner({
 *     lockKey: 'lock:mirror-reconcile',
 *     lockTtlSeconds: 120,
 *     renewalIntervalMs: 30_000,
 *     instanceId: 'mirror-reconcile-pid-123',
 *   }, locks);
 *
 *   const result = await runner.run(async (ctx) => {
 *     // ctx.isLockValid() - check before expensive work
 *     await doWork();
 *   });
 */

import type { DistributedLocks } from './redis-locks';
import { logger } from './logger';

export interface LockedTaskRunnerConfig {
  /** Redis key for the distributed lock */
  lockKey: string;
  /** Lock TTL in seconds */
  lockTtlSeconds: number;
  /** How often to renew the lock (ms) */
  renewalIntervalMs: number;
  /** Unique identifier for this instance (for lock ownership) */
  instanceId: string;
  /** Context label for log messages */
  context?: string;
}

export interface LockedTaskContext {
  /** Returns false if the lock was lost during execution */
  isLockValid: () => boolean;
}

export interface LockedTaskResult<T> {
  /** Whether the lock was acquired */
  acquired: boolean;
  /** The result from the task function (undefined if lock was not acquired) */
  result?: T;
  /** Any error thrown during execution */
  error?: Error;
}

export class LockedTaskRunner {
  private readonly config: Required<LockedTaskRunnerConfig>;

  constructor(config: LockedTaskRunnerConfig, private readonly locks: DistributedLocks) {
    this.config = {
      ...config,
      context: config.context || config.lockKey,
    };
  }

  /**
   * Attempt to acquire the lock and run the given task.
   *
   * - If the lock cannot be acquired, returns { acquired: false } immediately.
   * - If the lock is acquired, starts renewal and runs the task.
   * - On completion (success or error), stops renewal and releases the lock.
   */
  async run<T>(
    task: (ctx: LockedTaskContext) => Promise<T>
  ): Promise<LockedTaskResult<T>> {
    const { lockKey, lockTtlSeconds, renewalIntervalMs, instanceId, context } = this.config;

    const acquired = await this.locks.acquire(lockKey, instanceId, lockTtlSeconds);
    if (!acquired) {
      logger.debug({ lockKey, instanceId, context }, 'Lock held by another instance - skipping');
      return { acquired: false };
    }

    let lockValid = true;
    let renewalId: NodeJS.Timeout | null = null;

    const stopRenewal = () => {
      if (renewalId) {
        clearInterval(renewalId);
        renewalId = null;
      }
    };

    renewalId = setInterval(() => {
      this.locks
        .renew(lockKey, instanceId, lockTtlSeconds)
        .then((renewed) => {
          if (!renewed && lockValid) {
            lockValid = false;
            logger.warn({ lockKey, instanceId, context }, 'Lock renewal failed - lock was taken by another instance');
            stopRenewal();
          }
        })
        .catch((err: unknown) => {
          logger.warn({ err, lockKey, context }, 'Lock renewal errored');
        });
    }, renewalIntervalMs);

    const ctx: LockedTaskContext = {
      isLockValid: () => lockValid,
    };

    try {
      const result = await task(ctx);
      return { acquired: true, result };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error({ err: error, lockKey, context }, 'Locked task failed');
      return { acquired: true, error };
    } finally {
      stopRenewal();
      await this.locks.release(lockKey, instanceId, context);
    }
  }
}

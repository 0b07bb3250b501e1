import type { DistributedLocks } from '../../utils/redis-locks';

/**
 * Lock table held in memory, keyed like the Redis locks
 */
export class MemoryLocks implements DistributedLocks {
  readonly held = new Map<string, string>();

  async acquire(key: string, instanceId: string): Promise<boolean> {
    if (this.held.has(key)) return false;
    this.held.set(key, instanceId);
    return true;
  }

  async renew(key: string, instanceId: string): Promise<boolean> {
    return this.held.get(key) === instanceId;
  }

  async release(key: string, instanceId: string): Promise<void> {
    if (this.held.get(key) === instanceId) this.held.delete(key);
  }
}

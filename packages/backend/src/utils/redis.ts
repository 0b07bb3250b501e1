import Redis from 'ioredis';
import { config } from '../config';
import { logger } from './logger';

/**
 * Redis is used for coordination of periodic jobs only (sweep locks).
 * Booking and queue correctness never depends on it; PostgreSQL row locks do that.
 */

interface RedisHealthState {
  isHealthy: boolean;
  consecutiveFailures: number;
  lastFailureTime: Date | null;
  lastSuccessTime: Date | null;
}

// After this many consecutive failures, distributed locks are not attempted
const UNHEALTHY_THRESHOLD = 3;

export class RedisConnection {
  private client: Redis | null = null;
  private healthState: RedisHealthState = {
    isHealthy: true,
    consecutiveFailures: 0,
    lastFailureTime: null,
    lastSuccessTime: null,
  };

  constructor(url: string) {
    try {
      this.client = new Redis(url, { maxRetriesPerRequest: 2 });
      this.client.on('error', (err) => {
        this.recordFailure();
        logger.error({ err }, 'Redis connection error');
      });
      this.client.on('ready', () => {
        this.recordSuccess();
        logger.info('Redis ready');
      });
      this.client.on('reconnecting', () => {
        logger.info('Redis reconnecting');
      });
    } catch (err) {
      logger.warn(
        { err },
        'Redis not available - sweep locking falls back to a local guard. ' +
        'Running several instances without Redis makes reconciliation sweeps overlap.'
      );
    }
  }

  private recordSuccess(): void {
    const wasUnhealthy = !this.healthState.isHealthy;
    this.healthState.isHealthy = true;
    this.healthState.consecutiveFailures = 0;
    this.healthState.lastSuccessTime = new Date();

    if (wasUnhealthy) {
      logger.info('Redis connection restored');
    }
  }

  private recordFailure(): void {
    this.healthState.consecutiveFailures++;
    this.healthState.lastFailureTime = new Date();
    this.healthState.isHealthy = this.healthState.consecutiveFailures < UNHEALTHY_THRESHOLD;
  }

  getHealthState(): RedisHealthState {
    return { ...this.healthState };
  }

  /**
   * Set a key only if it doesn't exist (for distributed locks)
   * Returns: 'OK' if lock acquired, 'EXISTS' if key exists, throws if Redis unavailable/error
   */
  async setNX(key: string, value: string, ttlSeconds: number): Promise<'OK' | 'EXISTS'> {
    if (!this.client) {
      throw new Error('Redis not available - cannot acquire distributed lock');
    }
    if (!this.healthState.isHealthy) {
      throw new Error('Redis unhealthy - distributed lock skipped');
    }
    try {
      const result = await this.client.set(key, value, 'EX', ttlSeconds, 'NX');
      this.recordSuccess();
      return result === 'OK' ? 'OK' : 'EXISTS';
    } catch (err) {
      this.recordFailure();
      logger.error({ err, key }, 'Redis setNX error - lock operation failed');
      throw err;
    }
  }

  /**
   * Execute a Lua script atomically
   */
  async eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown> {
    if (!this.client) {
      throw new Error('Redis not available - cannot execute Lua script');
    }
    try {
      return await this.client.eval(script, numKeys, ...args);
    } catch (err) {
      logger.error({ err, numKeys }, 'Redis eval error');
      throw err;
    }
  }

  /**
   * Used by /health/ready
   */
  async checkHealth(): Promise<{
    connected: boolean;
    latencyMs?: number;
    error?: string;
  }> {
    if (!this.client) {
      return { connected: false, error: 'Redis client not initialized' };
    }

    const startTime = Date.now();
    try {
      await this.client.ping();
      return {
        connected: true,
        latencyMs: Date.now() - startTime,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      return {
        connected: false,
        error: message,
      };
    }
  }

  /**
   * Gracefully close the Redis connection during shutdown
   */
  async quit(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.quit();
      logger.info('Redis connection closed gracefully');
    } catch (err) {
      logger.warn({ err }, 'Error closing Redis connection');
    }
  }
}

// Export singleton instance
export const redis = new RedisConnection(config.redisUrl);

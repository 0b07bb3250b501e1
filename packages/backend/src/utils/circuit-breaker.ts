/**
 * Circuit breakers for the external APIs (Sheets, Claude, Telegram).
 *
 * A breaker counts failures inside a rolling window. Once the threshold is
 * reached it opens and rejects calls until `resetTimeout` has passed, then lets
 * a single trial call through. Enough successful trials close it again; a
 * failed trial reopens it.
 */

import { logger } from './logger';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name: string;
  /** Failures inside `failureWindow` that open the circuit */
  failureThreshold: number;
  /** How long the circuit stays open before a trial call, ms */
  resetTimeout: number;
  /** Successful trial calls that close the circuit */
  successThreshold: number;
  failureWindow: number;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  /** Failures inside the current window */
  failures: number;
  totalRequests: number;
  rejectedRequests: number;
  lastFailure: Date | null;
  openedAt: Date | null;
}

export class CircuitBreakerError extends Error {
  constructor(readonly circuitName: string) {
    super(`Circuit breaker '${circuitName}' is open`);
    this.name = 'CircuitBreakerError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureTimes: number[] = [];
  private trialSuccesses = 0;
  private trialInFlight = false;
  private openedAt: number | null = null;
  private totalRequests = 0;
  private rejectedRequests = 0;

  constructor(
    private readonly options: CircuitBreakerOptions,
    private readonly now: () => number = Date.now
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.totalRequests++;
    const trial = this.admit();
    if (trial === null) {
      this.rejectedRequests++;
      logger.warn({ circuitBreaker: this.options.name, state: this.state }, 'Circuit breaker rejected request');
      throw new CircuitBreakerError(this.options.name);
    }

    try {
      const result = await fn();
      this.recordSuccess(trial);
      return result;
    } catch (error) {
      this.recordFailure(trial, error);
      throw error;
    } finally {
      if (trial) this.trialInFlight = false;
    }
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.recentFailures().length,
      totalRequests: this.totalRequests,
      rejectedRequests: this.rejectedRequests,
      lastFailure: this.failureTimes.length > 0 ? new Date(this.failureTimes[this.failureTimes.length - 1]) : null,
      openedAt: this.openedAt === null ? null : new Date(this.openedAt),
    };
  }

  /** null when rejected, otherwise whether the call is a trial */
  private admit(): boolean | null {
    if (this.state === 'open') {
      if (this.openedAt !== null && this.now() - this.openedAt < this.options.resetTimeout) return null;
      this.moveTo('half-open');
    }
    if (this.state === 'half-open') {
      if (this.trialInFlight) return null;
      this.trialInFlight = true;
      return true;
    }
    return false;
  }

  private recordSuccess(trial: boolean): void {
    if (!trial) {
      this.failureTimes = [];
      return;
    }
    this.trialSuccesses++;
    if (this.trialSuccesses >= this.options.successThreshold) this.moveTo('closed');
  }

  private recordFailure(trial: boolean, error: unknown): void {
    this.failureTimes = [...this.recentFailures(), this.now()];
    logger.warn(
      {
        circuitBreaker: this.options.name,
        state: this.state,
        failures: this.failureTimes.length,
        error: error instanceof Error ? error.message : String(error),
      },
      'Circuit breaker recorded failure'
    );
    if (trial || this.failureTimes.length >= this.options.failureThreshold) this.moveTo('open');
  }

  private recentFailures(): number[] {
    const windowStart = this.now() - this.options.failureWindow;
    return this.failureTimes.filter((time) => time > windowStart);
  }

  private moveTo(state: CircuitState): void {
    logger.info({ circuitBreaker: this.options.name, from: this.state, to: state }, 'Circuit breaker state transition');
    this.state = state;
    this.trialSuccesses = 0;
    if (state === 'open') this.openedAt = this.now();
    if (state === 'closed') {
      this.failureTimes = [];
      this.openedAt = null;
    }
  }
}

const breakers = new Map<string, CircuitBreaker>();

/** The process-wide breaker for one external API */
export function breakerFor(options: CircuitBreakerOptions): CircuitBreaker {
  let breaker = breakers.get(options.name);
  if (!breaker) {
    breaker = new CircuitBreaker(options);
    breakers.set(options.name, breaker);
  }
  return breaker;
}

export function breakerStats(): Record<string, CircuitBreakerStats> {
  return Object.fromEntries([...breakers].map(([name, breaker]) => [name, breaker.getStats()]));
}

export const CIRCUIT_BREAKER_CONFIGS = {
  SHEETS_API: {
    name: 'sheets-api',
    failureThreshold: 5,
    resetTimeout: 30_000,
    successThreshold: 2,
    failureWindow: 60_000,
  },
  CLAUDE_API: {
    name: 'claude-api',
    failureThreshold: 3,
    // Longer, rate limits take a while to clear
    resetTimeout: 60_000,
    successThreshold: 1,
    failureWindow: 120_000,
  },
  TELEGRAM_API: {
    name: 'telegram-api',
    failureThreshold: 5,
    resetTimeout: 30_000,
    successThreshold: 2,
    failureWindow: 60_000,
  },
} as const satisfies Record<string, CircuitBreakerOptions>;

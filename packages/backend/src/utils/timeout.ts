/**
 * Deadlines for external calls and background work
 */

import { logger } from './logger';

export const DEFAULT_TIMEOUTS = {
  /** One Sheets or Telegram call, also the default for a background task */
  EXTERNAL_API: 15_000,
  /** One chat turn run in the background (model call plus booking) */
  TURN: 3 * 60 * 1000,
  /** Full reconciliation sweep across every project */
  RECONCILE_SWEEP: 10 * 60 * 1000,
} as const;

const STATS_WINDOW_MS = 5 * 60 * 1000;
const DEGRADED_TIMEOUT_COUNT = 5;

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Operation name and time of each timeout inside the stats window */
let recentTimeouts: Array<{ operation: string; at: number }> = [];

function pruneTimeouts(now: number): void {
  recentTimeouts = recentTimeouts.filter((entry) => entry.at >= now - STATS_WINDOW_MS);
}

function recordTimeout(operation: string): void {
  const now = Date.now();
  pruneTimeouts(now);
  recentTimeouts.push({ operation, at: now });
  if (recentTimeouts.length >= DEGRADED_TIMEOUT_COUNT) {
    logger.warn({ ...getTimeoutStats() }, 'High timeout rate, an external service may be degraded');
  }
}

/** Timeouts in the last few minutes, for /health/tasks */
export function getTimeoutStats(): { recentCount: number; windowMinutes: number; byOperation: Record<string, number> } {
  pruneTimeouts(Date.now());
  const byOperation: Record<string, number> = {};
  for (const { operation } of recentTimeouts) {
    byOperation[operation] = (byOperation[operation] ?? 0) + 1;
  }
  return { recentCount: recentTimeouts.length, windowMinutes: STATS_WINDOW_MS / 60_000, byOperation };
}

/**
 * Reject with TimeoutError when `promise` has not settled within `timeoutMs`.
 * The underlying work is not cancelled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  context?: Record<string, unknown>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      recordTimeout(operation);
      logger.warn({ operation, timeoutMs, ...context }, 'Operation timed out');
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry loop for calls to the language model API. Rate limits and transient
 * failures are retried on their own delay schedules; anything else is thrown
 * at once. With a breaker, the whole loop counts as one call.
 */

import { CLAUDE_API } from '../constants';
import { classifyApiError, retryAfterMs, type FailureKind } from './anthropic-client';
import type { CircuitBreaker } from './circuit-breaker';
import { logger } from './logger';
import { sleep } from './timeout';

export interface RetryPolicy {
  /** One entry per retry */
  rateLimitDelaysMs: readonly number[];
  transientDelaysMs: readonly number[];
  /** Longest server Retry-After honoured */
  maxRetryAfterMs: number;
  /** Up to this fraction of each delay is added at random */
  jitterFactor: number;
}

export const MODEL_RETRY_POLICY: RetryPolicy = {
  rateLimitDelaysMs: CLAUDE_API.RATE_LIMIT_DELAYS_MS,
  transientDelaysMs: CLAUDE_API.TRANSIENT_DELAYS_MS,
  maxRetryAfterMs: CLAUDE_API.MAX_RETRY_AFTER_MS,
  jitterFactor: CLAUDE_API.JITTER_FACTOR,
};

export interface ResilientCallOptions {
  /** Names the call in log lines */
  context: string;
  traceId: string;
  breaker?: CircuitBreaker;
  policy?: RetryPolicy;
  classify?: (error: unknown) => FailureKind;
  retryAfter?: (error: unknown) => number | null;
  wait?: (ms: number) => Promise<void>;
}

export async function resilientCall<T>(operation: () => Promise<T>, options: ResilientCallOptions): Promise<T> {
  const {
    context,
    traceId,
    breaker,
    policy = MODEL_RETRY_POLICY,
    classify = classifyApiError,
    retryAfter = retryAfterMs,
    wait = sleep,
  } = options;

  const withRetries = async (): Promise<T> => {
    const retries: Record<Exclude<FailureKind, 'fatal'>, number> = { 'rate-limit': 0, transient: 0 };

    for (;;) {
      try {
        return await operation();
      } catch (error) {
        const kind = classify(error);
        if (kind === 'fatal') throw error;

        const delays = kind === 'rate-limit' ? policy.rateLimitDelaysMs : policy.transientDelaysMs;
        const retry = retries[kind]++;
        if (retry >= delays.length) {
          logger.error({ traceId, context, kind, retries: retry }, 'Retries exhausted');
          throw error;
        }

        const serverDelay = kind === 'rate-limit' ? retryAfter(error) : null;
        const base = serverDelay === null ? delays[retry] : Math.min(serverDelay, policy.maxRetryAfterMs);
        const delayMs = Math.floor(base + base * policy.jitterFactor * Math.random());
        logger.warn({ traceId, context, kind, retry: retry + 1, delayMs }, 'Model call failed, retrying');
        await wait(delayMs);
      }
    }
  };

  return breaker ? breaker.execute(withRetries) : withRetries();
}

/**
 * Anthropic client factory and the error classification used when retrying.
 */

import Anthropic, { APIConnectionError, APIError, RateLimitError } from '@anthropic-ai/sdk';
import { TIMEOUTS } from '../constants';

/** How a failed API call should be treated by the retry loop */
export type FailureKind = 'rate-limit' | 'transient' | 'fatal';

/**
 * Client configured with the API-level timeout from constants
 */
export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({
    apiKey,
    timeout: TIMEOUTS.ANTHROPIC_API_MS,
  });
}

/**
 * 429 is a rate limit; connection failures (timeouts included) and 5xx are transient
 */
export function classifyApiError(error: unknown): FailureKind {
  if (error instanceof RateLimitError) return 'rate-limit';
  if (error instanceof APIConnectionError) return 'transient';
  if (error instanceof APIError && typeof error.status === 'number' && error.status >= 500) return 'transient';
  return 'fatal';
}

/** The server's Retry-After, in ms, when the error carries one */
export function retryAfterMs(error: unknown): number | null {
  if (!(error instanceof APIError)) return null;
  const header = error.headers?.['retry-after'];
  const seconds = header ? Number.parseInt(header, 10) : Number.NaN;
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : null;
}

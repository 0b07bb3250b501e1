/**
 * Centralized constants for the backend application.
 * HEADERS is imported from the shared package.
 */
export { HEADERS } from '@slotkeeper/shared';

// Input validation limits
export const INPUT_LIMITS = {
  MAX_MESSAGE_LENGTH: 4000, // Telegram caps a message at 4096 characters
  MAX_ID_LENGTH: 128,
  MAX_NAME_LENGTH: 255,
} as const;

// Rate limiting
export const RATE_LIMITS = {
  ADMIN_ENDPOINTS: {
    max: 60, // 60 requests per minute for admin reads
    timeWindowMs: 60000,
  },
  ADMIN_MUTATIONS: {
    max: 20, // 20 booking mutations or sweeps per minute
    timeWindowMs: 60000,
  },
  WEBHOOK: {
    max: 300, // chat platforms burst on retries
    timeWindowMs: 60000,
  },
} as const;

// API timeouts
export const TIMEOUTS = {
  ANTHROPIC_API_MS: 60000, // 60 seconds
  TELEGRAM_API_MS: 10000, // 10 seconds
} as const;

// Claude API retry settings. Kept short: a client is waiting for the reply.
export const CLAUDE_API = {
  // One delay per retry of a rate limit (429) error
  RATE_LIMIT_DELAYS_MS: [5000, 15000],
  // One delay per retry of a connection or 5xx error
  TRANSIENT_DELAYS_MS: [1000, 3000],
  // A longer server Retry-After is capped to this
  MAX_RETRY_AFTER_MS: 30000,
  // Add jitter up to 10% of delay to prevent thundering herd
  JITTER_FACTOR: 0.1,
} as const;

// What the assistant is shown about the calendar
export const ASSISTANT_CONTEXT = {
  // Days of free slots listed, starting today
  FREE_SLOT_DAYS: 3,
  // Free start times listed per specialist and day
  MAX_SLOTS_PER_DAY: 8,
  // Earlier messages of the conversation sent with each turn
  HISTORY_MESSAGES: 20,
} as const;

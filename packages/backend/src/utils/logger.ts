import pino from 'pino';
import { config } from '../config';

/**
 * Mask a chat-platform client identifier or phone number for logging
 * Examples:
 *   "380501234567" -> "38***67"
 *   "ab" -> "a***"
 */
export function maskIdentifier(value: string | undefined | null): string {
  if (!value) return '[none]';
  if (value.length <= 4) return value[0] + '***';
  return value.slice(0, 2) + '***' + value.slice(-2);
}

// Redaction paths for pino - masks client contact details in production
const redactPaths = config.env === 'production' ? [
  'clientPhone',
  'phone',
  '*.clientPhone',
  '*.phone',
] : [];

export const logger = pino({
  level: config.logLevel,
  redact: {
    paths: redactPaths,
    censor: (value) => {
      if (typeof value === 'string') {
        return maskIdentifier(value);
      }
      return '[REDACTED]';
    },
  },
  transport:
    config.env === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
          },
        }
      : undefined,
});

interface TokenUsageParams {
  traceId: string;
  service: string;
  model: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  latency: number;
}

export function logTokenUsage(params: TokenUsageParams): void {
  logger.info(
    {
      type: 'token_usage',
      ...params,
    },
    `Token usage: ${params.totalTokens} tokens (${params.promptTokens} prompt, ${params.completionTokens} completion) in ${params.latency}ms`
  );
}

import { z } from 'zod';
import { logger } from './logger';

/**
 * Maximum JSON input sizes. Model replies are small; anything larger is
 * rejected before parsing.
 */
export const JSON_SIZE_LIMITS = {
  DEFAULT: 1_000_000,   // 1MB
  MODEL_REPLY: 100_000, // 100KB
} as const;

/**
 * Safely parse JSON and validate it against a schema.
 * Returns the fallback when the input is empty, too large, malformed or invalid.
 *
 * @param options.context - Context string for logging
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  fallback: T,
  options: {
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    context?: string;
    maxSize?: number;
  }
): T {
  if (!json) {
    return fallback;
  }

  const { context, schema, maxSize = JSON_SIZE_LIMITS.DEFAULT } = options;

  if (json.length > maxSize) {
    logger.warn(
      { context, size: json.length, maxSize },
      'JSON input exceeds size limit - rejecting'
    );
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    logger.warn(
      { error, context, jsonPreview: json.substring(0, 100) },
      'Failed to parse JSON'
    );
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    logger.warn(
      {
        context,
        errors: result.error.errors.slice(0, 3), // Limit logged errors
        jsonPreview: json.substring(0, 100),
      },
      'JSON schema validation failed - using fallback'
    );
    return fallback;
  }
  return result.data;
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pull the JSON object out of a model reply: the body of a ```json fence if
 * there is one, otherwise the text from the first "{" to the last "}".
 */
export function extractJsonObject(text: string): string | null {
  const fenced = FENCED_BLOCK.exec(text);
  const candidate = fenced ? fenced[1] : text;

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return candidate.slice(start, end + 1);
}

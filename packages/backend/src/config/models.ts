/**
 * Model configuration for the booking assistant.
 *
 * Aliases without a date suffix resolve to the latest release of that model.
 * ANTHROPIC_MODEL overrides the primary model.
 */

export const CLAUDE_MODELS = {
  /**
   * Reads a client turn and answers with a reply plus a booking directive.
   * Fast model: the directive is small structured output.
   */
  ASSISTANT: 'claude-haiku-4-5',
} as const;

export const MODEL_CONFIG = {
  assistant: {
    primary: CLAUDE_MODELS.ASSISTANT,
    maxTokens: 1024,
    temperature: 0.3, // Low temperature for a consistent JSON shape
  },
} as const;

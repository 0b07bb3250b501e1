import type Anthropic from '@anthropic-ai/sdk';
import { MODEL_CONFIG } from '../config/models';
import { breakerFor, CIRCUIT_BREAKER_CONFIGS } from '../utils/circuit-breaker';
import { logger, logTokenUsage } from '../utils/logger';
import { resilientCall } from '../utils/resilient-call';

export interface HistoryMessage {
  role: 'client' | 'assistant';
  text: string;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  traceId: string;
  /** Earlier messages of the conversation, oldest first */
  history?: readonly HistoryMessage[];
}

export interface ModelMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface AIResponse {
  content: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  latency: number;
}

/**
 * A single-turn text completion. The turn processor depends on this rather
 * than on the SDK so it can run against a scripted model in tests.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<AIResponse>;
}

export interface AIServiceParams {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * The message list sent to the model: history then the new prompt. The API
 * wants alternating roles starting with the user, so a leading assistant
 * message is dropped and consecutive messages of one role are joined.
 */
export function toModelMessages(history: readonly HistoryMessage[], prompt: string): ModelMessage[] {
  const messages: ModelMessage[] = [];
  const entries: ModelMessage[] = [
    ...history.map((entry): ModelMessage => ({
      role: entry.role === 'client' ? 'user' : 'assistant',
      content: entry.text,
    })),
    { role: 'user', content: prompt },
  ];

  for (const entry of entries) {
    const last = messages[messages.length - 1];
    if (!last && entry.role === 'assistant') continue;
    if (last && last.role === entry.role) {
      last.content = `${last.content}\n\n${entry.content}`;
    } else {
      messages.push({ ...entry });
    }
  }
  return messages;
}

export class AIService implements CompletionClient {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(private readonly client: Anthropic, params: AIServiceParams = {}) {
    this.model = params.model || MODEL_CONFIG.assistant.primary;
    this.maxTokens = params.maxTokens || MODEL_CONFIG.assistant.maxTokens;
    this.temperature = params.temperature ?? MODEL_CONFIG.assistant.temperature;
  }

  async complete({ system, prompt, traceId, history = [] }: CompletionRequest): Promise<AIResponse> {
    const startTime = Date.now();

    try {
      const response = await resilientCall(
        () =>
          this.client.messages.create({
            model: this.model,
            max_tokens: this.maxTokens,
            temperature: this.temperature,
            system,
            messages: toModelMessages(history, prompt),
          }),
        { context: 'assistant-turn', traceId, breaker: breakerFor(CIRCUIT_BREAKER_CONFIGS.CLAUDE_API) }
      );

      const latency = Date.now() - startTime;

      // Extract text content from response
      const textContent = response.content.find((block) => block.type === 'text');
      const content = textContent?.type === 'text' ? textContent.text : '';

      const usage = {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      };

      logTokenUsage({
        traceId,
        service: 'anthropic',
        model: this.model,
        promptTokens: usage.promptTokens,
        completionTokens: usage.completionTokens,
        totalTokens: usage.totalTokens,
        latency,
      });

      return { content, usage, latency };
    } catch (error) {
      logger.error({ err: error, traceId }, 'AI service error');
      throw new Error(`AI service failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}

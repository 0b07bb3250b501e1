import { z } from 'zod';
import { TIMEOUTS } from '../constants';
import { breakerFor, CIRCUIT_BREAKER_CONFIGS } from '../utils/circuit-breaker';
import { logger, maskIdentifier } from '../utils/logger';
import type { ChannelAdapter } from './channel-adapter';

const TELEGRAM_API_BASE = 'https://api.telegram.org';

const telegramResultSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

/**
 * The subset of a Telegram update the webhook reads
 */
export const telegramUpdateSchema = z.object({
  update_id: z.number(),
  message: z
    .object({
      chat: z.object({ id: z.union([z.number(), z.string()]) }),
      from: z
        .object({
          first_name: z.string().optional(),
          last_name: z.string().optional(),
        })
        .optional(),
      text: z.string().optional(),
    })
    .optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Replies through the Telegram Bot API sendMessage method
 */
export class TelegramChannel implements ChannelAdapter {
  readonly name = 'telegram';
  private readonly breaker = breakerFor(CIRCUIT_BREAKER_CONFIGS.TELEGRAM_API);

  constructor(
    private readonly botToken: string,
    private readonly fetchFn: FetchLike = fetch
  ) {}

  async deliver(clientId: string, text: string): Promise<void> {
    if (!this.botToken) {
      throw new Error('Telegram bot token is not configured');
    }

    await this.breaker.execute(async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), TIMEOUTS.TELEGRAM_API_MS);

      try {
        const response = await this.fetchFn(`${TELEGRAM_API_BASE}/bot${this.botToken}/sendMessage`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ chat_id: clientId, text }),
          signal: controller.signal,
        });

        const parsed = telegramResultSchema.safeParse(await response.json());
        if (!response.ok || !parsed.success || !parsed.data.ok) {
          const description = parsed.success ? parsed.data.description : undefined;
          throw new Error(`Telegram API error: ${response.status}${description ? ` - ${description}` : ''}`);
        }
      } finally {
        clearTimeout(timeoutId);
      }
    });

    logger.debug({ clientId: maskIdentifier(clientId) }, 'Telegram reply sent');
  }
}

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { HEADERS, type InboundEvent, type InboundWebhookResponse } from '@slotkeeper/shared';
import type { ChannelAdapter } from '../channels/channel-adapter';
import { InlineReplyChannel } from '../channels/inline-reply.channel';
import { telegramUpdateSchema } from '../channels/telegram.channel';
import { INPUT_LIMITS, RATE_LIMITS } from '../constants';
import { requireSecret } from '../middleware/auth';
import type { MirrorReconciler } from '../services/mirror-reconciler.service';
import type { TurnRunner } from '../services/turn-runner.service';
import { runBackgroundTask } from '../utils/background-task';
import { logger, maskIdentifier } from '../utils/logger';
import { DEFAULT_TIMEOUTS } from '../utils/timeout';
import { Errors, sendError, sendSuccess } from '../utils/response';

export interface WebhookRouteOptions {
  runner: TurnRunner;
  reconciler: MirrorReconciler;
  /** Null when no bot token is configured */
  telegram: ChannelAdapter | null;
  webhookSecret: string;
}

// Chat platforms send flags as booleans or as "true"/"false" strings
const flag = z
  .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
  .default(false);

const inboundSchema = z.object({
  projectId: z.string().min(1).max(INPUT_LIMITS.MAX_ID_LENGTH),
  clientId: z.string().min(1).max(INPUT_LIMITS.MAX_ID_LENGTH),
  text: z.string().max(INPUT_LIMITS.MAX_MESSAGE_LENGTH),
  retry: flag,
  count: z.coerce.number().int().min(0).default(0),
});

const mirrorEditSchema = z.object({
  projectId: z.string().min(1).max(INPUT_LIMITS.MAX_ID_LENGTH),
  sheetName: z.string().min(1).max(INPUT_LIMITS.MAX_NAME_LENGTH),
});

const projectParamsSchema = z.object({
  projectId: z.string().min(1).max(INPUT_LIMITS.MAX_ID_LENGTH),
});

const webhookRateLimit = {
  rateLimit: {
    max: RATE_LIMITS.WEBHOOK.max,
    timeWindow: RATE_LIMITS.WEBHOOK.timeWindowMs,
  },
};

export async function webhookRoutes(fastify: FastifyInstance, options: WebhookRouteOptions) {
  const { runner, reconciler, telegram } = options;

  fastify.addHook('preHandler', requireSecret(HEADERS.WEBHOOK_SECRET, options.webhookSecret));

  /**
   * POST /api/webhooks/inbound
   * Runs the turn while the request is open and answers with the reply inline
   */
  fastify.post('/api/webhooks/inbound', { config: webhookRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const validation = inboundSchema.safeParse(request.body);
    if (!validation.success) {
      return Errors.validationFailed(reply, validation.error);
    }

    const { projectId, clientId, text, retry, count } = validation.data;
    const event: InboundEvent = { projectId, clientId, text, retry, deliveryCount: count };
    const channel = new InlineReplyChannel();

    logger.info(
      { requestId: request.id, projectId, clientId: maskIdentifier(clientId), retry, count },
      'Inbound message received'
    );

    const result = await runner.run(event, channel);

    let response: InboundWebhookResponse;
    if (result.outcome === 'delivered' && channel.reply !== null) {
      response = { send_status: 'TRUE', reply: channel.reply, queueItemId: result.queueItemId };
    } else if (result.outcome === 'skipped') {
      response = { send_status: 'FALSE', reason: 'skipped' };
    } else if (result.outcome === 'delivered') {
      response = { send_status: 'FALSE', reason: 'failed', queueItemId: result.queueItemId };
    } else {
      response = { send_status: 'FALSE', reason: result.outcome, queueItemId: result.queueItemId };
    }
    return reply.send(response);
  });

  /**
   * POST /api/webhooks/telegram/:projectId
   * Acknowledges at once; the turn runs in the background and replies through the Bot API
   */
  fastify.post('/api/webhooks/telegram/:projectId', { config: webhookRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    if (!telegram) {
      return sendError(reply, 503, 'Telegram channel is not configured', { code: 'CHANNEL_DISABLED' });
    }

    const params = projectParamsSchema.safeParse(request.params);
    if (!params.success) {
      return Errors.validationFailed(reply, params.error);
    }
    const update = telegramUpdateSchema.safeParse(request.body);
    if (!update.success) {
      return Errors.validationFailed(reply, update.error);
    }

    const message = update.data.message;
    const text = message?.text?.trim();
    if (!message || !text) {
      // Stickers, edits, joins: nothing to answer
      return sendSuccess(reply, { accepted: false });
    }

    const event: InboundEvent = {
      projectId: params.data.projectId,
      clientId: String(message.chat.id),
      text: text.slice(0, INPUT_LIMITS.MAX_MESSAGE_LENGTH),
      retry: false,
      deliveryCount: 1,
    };

    runBackgroundTask(() => runner.run(event, telegram), {
      name: 'telegram-turn',
      timeoutMs: DEFAULT_TIMEOUTS.TURN,
      context: { projectId: event.projectId, updateId: update.data.update_id },
    });

    return sendSuccess(reply, { accepted: true });
  });

  /**
   * POST /api/webhooks/mirror-edit
   * Called by the spreadsheet's edit trigger with the worksheet that changed
   */
  fastify.post('/api/webhooks/mirror-edit', { config: webhookRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const validation = mirrorEditSchema.safeParse(request.body);
    if (!validation.success) {
      return Errors.validationFailed(reply, validation.error);
    }

    const { projectId, sheetName } = validation.data;
    const specialist = reconciler.scheduleSpecialist(projectId, sheetName);
    logger.info({ requestId: request.id, projectId, specialist }, 'Mirror edit received, reconciliation scheduled');

    return sendSuccess(reply, { projectId, specialist }, { statusCode: 202, message: 'Reconciliation scheduled' });
  });
}

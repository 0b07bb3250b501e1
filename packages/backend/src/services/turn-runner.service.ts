/**
 * Turn Runner
 *
 * The one path every channel takes for an inbound message:
 *   submit → markProcessing → process (no lock held) → claimWinner → record + deliver on WIN
 *
 * Only winning turns enter the dialogue history, so a superseded reply is
 * never shown to the model as something the client saw.
 *
 * Work for a turn that loses the claim still runs to completion; its reply is
 * discarded at claim time.
 */

import type { InboundEvent, TurnOutcome, WinnerClaim } from '@slotkeeper/shared';
import type { ChannelAdapter } from '../channels/channel-adapter';
import type { ProjectCatalogue } from '../config/projects';
import type { DialogueStore } from '../stores/dialogue.store';
import type { QueuedMessage } from '../stores/queue.store';
import { StoreUnavailableError, errorMessage } from '../utils/errors';
import { logger, maskIdentifier } from '../utils/logger';
import type { MessageCoordinator } from './message-coordinator.service';
import type { TurnProcessor, TurnResult } from './turn-processor.service';

export type TurnRunResult =
  | { outcome: Extract<TurnOutcome, 'skipped'> }
  | { outcome: Extract<TurnOutcome, 'delivered'>; queueItemId: string; replyText: string }
  | { outcome: Extract<TurnOutcome, 'superseded'>; queueItemId: string }
  | { outcome: Extract<TurnOutcome, 'failed'>; queueItemId: string; error: string };

export class TurnRunner {
  constructor(
    private readonly coordinator: MessageCoordinator,
    private readonly processor: TurnProcessor,
    private readonly catalogue: ProjectCatalogue,
    private readonly dialogues: DialogueStore
  ) {}

  /**
   * Run one inbound event to its outcome. StoreUnavailableError is rethrown
   * after the item has been marked failed (when the store lets us).
   */
  async run(event: InboundEvent, channel: ChannelAdapter): Promise<TurnRunResult> {
    const project = this.catalogue.get(event.projectId);
    const logContext = {
      projectId: event.projectId,
      clientId: maskIdentifier(event.clientId),
      channel: channel.name,
    };

    const submitted = await this.coordinator.submit(event);
    if (submitted.kind === 'skip') {
      return { outcome: 'skipped' };
    }

    const queueItemId = submitted.item.id;
    let item: QueuedMessage;
    let result: TurnResult;
    try {
      item = (await this.coordinator.markProcessing(queueItemId)) ?? submitted.item;
      result = await this.processor.process({ item, project });
    } catch (error) {
      logger.error({ err: error, ...logContext, queueItemId }, 'Turn processing failed');
      await this.markFailedSafely(queueItemId);
      if (error instanceof StoreUnavailableError) throw error;
      return { outcome: 'failed', queueItemId, error: errorMessage(error) };
    }

    let claim: WinnerClaim;
    try {
      claim = await this.coordinator.claimWinner(queueItemId);
    } catch (error) {
      logger.error({ err: error, ...logContext, queueItemId }, 'Winner claim failed');
      await this.markFailedSafely(queueItemId);
      throw error;
    }

    if (claim === 'LOSE') {
      logger.info({ ...logContext, queueItemId }, 'Turn superseded, reply discarded');
      return { outcome: 'superseded', queueItemId };
    }

    await this.recordSafely(item, result);

    const { replyText } = result;
    try {
      await channel.deliver(event.clientId, replyText);
    } catch (error) {
      // The turn is already COMPLETED; only the delivery is lost
      logger.error({ err: error, ...logContext, queueItemId }, 'Reply delivery failed');
      return { outcome: 'failed', queueItemId, error: errorMessage(error) };
    }

    logger.info({ ...logContext, queueItemId }, 'Reply delivered');
    return { outcome: 'delivered', queueItemId, replyText };
  }

  /**
   * Store the turn in the dialogue history, with any feedback. The reply is
   * still delivered when this fails.
   */
  private async recordSafely(item: QueuedMessage, result: TurnResult): Promise<void> {
    const { projectId, clientId } = item;
    try {
      await this.dialogues.append([
        { projectId, clientId, role: 'client', text: item.aggregatedText },
        { projectId, clientId, role: 'assistant', text: result.replyText },
      ]);
      if (result.feedback) {
        await this.dialogues.recordFeedback({
          projectId,
          clientId,
          bookingId: result.booking?.id ?? null,
          rating: result.feedback.rating,
          comment: result.feedback.comment,
        });
        logger.info(
          { projectId, clientId: maskIdentifier(clientId), queueItemId: item.id, rating: result.feedback.rating },
          'Client feedback recorded'
        );
      }
    } catch (error) {
      logger.error(
        { err: error, projectId, clientId: maskIdentifier(clientId), queueItemId: item.id },
        'Could not record dialogue'
      );
    }
  }

  private async markFailedSafely(queueItemId: string): Promise<void> {
    try {
      await this.coordinator.markFailed(queueItemId);
    } catch (error) {
      logger.error({ err: error, queueItemId }, 'Could not mark turn as failed');
    }
  }
}

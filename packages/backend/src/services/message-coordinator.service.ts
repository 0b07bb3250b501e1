/**
 * Inbound Message Coordinator
 *
 * Turns concurrent and duplicate deliveries of one client's messages into
 * exactly one visible reply:
 * - submit() folds every still-open message of the client into a new PENDING row
 * - claimWinner() lets only the latest row of the client complete
 *
 * Every decision is taken under the client's lock (QueueStore.withClientLock),
 * which covers all rows of that client, not just the row being claimed.
 */

import { QUEUE_STATUS, type InboundEvent, type QueueStatus, type WinnerClaim } from '@slotkeeper/shared';
import type { ClientQueueScope, QueueStatusCounts, QueueStore, QueuedMessage } from '../stores/queue.store';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export type SubmitResult =
  | { kind: 'skip' }
  | { kind: 'queued'; item: QueuedMessage };

// ============================================
// Status transitions
// ============================================

const TRANSITIONS: Record<QueueStatus, readonly QueueStatus[]> = {
  PENDING: [QUEUE_STATUS.PROCESSING, QUEUE_STATUS.SUPERSEDED],
  PROCESSING: [QUEUE_STATUS.COMPLETED, QUEUE_STATUS.CANCELLED, QUEUE_STATUS.SUPERSEDED],
  COMPLETED: [],
  CANCELLED: [],
  SUPERSEDED: [],
};

export function isTerminal(status: QueueStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: QueueStatus, to: QueueStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Legal path from `from` to `to`, passing through PROCESSING when the
 * direct edge does not exist (PENDING -> COMPLETED, PENDING -> CANCELLED).
 */
export function transitionPath(from: QueueStatus, to: QueueStatus): QueueStatus[] | null {
  if (canTransition(from, to)) return [to];
  if (canTransition(from, QUEUE_STATUS.PROCESSING) && canTransition(QUEUE_STATUS.PROCESSING, to)) {
    return [QUEUE_STATUS.PROCESSING, to];
  }
  return null;
}

const OPEN_STATUSES: readonly QueueStatus[] = [QUEUE_STATUS.PENDING, QUEUE_STATUS.PROCESSING];

export class MessageCoordinator {
  constructor(private readonly store: QueueStore) {}

  /**
   * Record an inbound message.
   *
   * A redelivery flagged as a retry with a zero delivery count is the channel
   * replaying a message it already handed over, and is skipped without writing.
   */
  async submit(event: InboundEvent): Promise<SubmitResult> {
    if (!event.projectId || !event.clientId) {
      throw new ValidationError('projectId and clientId are required');
    }
    const text = event.text.trim();
    if (!text) {
      throw new ValidationError('Message text is empty', { projectId: event.projectId });
    }

    if (event.retry && event.deliveryCount === 0) {
      logger.info(
        { projectId: event.projectId, clientId: event.clientId },
        'Skipping replayed delivery'
      );
      return { kind: 'skip' };
    }

    return this.store.withClientLock(event.projectId, event.clientId, async (scope) => {
      const open = scope.rows.filter((row) => OPEN_STATUSES.includes(row.status));
      const aggregatedText = [...open.map((row) => row.aggregatedText), text].join(' ');

      await scope.setStatus(open.map((row) => row.id), QUEUE_STATUS.SUPERSEDED);
      const item = await scope.insertPending({
        projectId: event.projectId,
        clientId: event.clientId,
        originalText: text,
        aggregatedText,
        retryCount: event.retry ? event.deliveryCount : 0,
      });

      logger.info(
        {
          queueItemId: item.id,
          projectId: item.projectId,
          clientId: item.clientId,
          superseded: open.map((row) => row.id),
        },
        open.length > 0 ? 'Queued message, folded earlier open messages' : 'Queued message'
      );

      return { kind: 'queued', item };
    });
  }

  /**
   * PENDING -> PROCESSING. A row that was superseded meanwhile is returned as is;
   * its computation may run but its output will lose at claim time.
   */
  async markProcessing(itemId: string): Promise<QueuedMessage | null> {
    const found = await this.store.findById(itemId);
    if (!found) return null;

    return this.store.withClientLock(found.projectId, found.clientId, async (scope) => {
      const item = scope.rows.find((row) => row.id === itemId);
      if (!item) return null;

      if (item.status === QUEUE_STATUS.PENDING) {
        await scope.setStatus([item.id], QUEUE_STATUS.PROCESSING);
      }
      return scope.rows.find((row) => row.id === itemId) ?? null;
    });
  }

  /**
   * Decide whether `itemId` may deliver its reply.
   *
   * WIN only when the item is the latest non-cancelled row of its client and is
   * still open. The winner becomes COMPLETED and any other open row SUPERSEDED.
   * A loser becomes SUPERSEDED unless it already reached a terminal state.
   */
  async claimWinner(itemId: string): Promise<WinnerClaim> {
    const found = await this.store.findById(itemId);
    if (!found) {
      logger.warn({ queueItemId: itemId }, 'Winner claim for unknown queue item');
      return 'LOSE';
    }

    return this.store.withClientLock(found.projectId, found.clientId, async (scope) => {
      const item = scope.rows.find((row) => row.id === itemId);
      if (!item) {
        logger.warn({ queueItemId: itemId }, 'Queue item vanished before winner claim');
        return 'LOSE';
      }

      const candidates = scope.rows.filter((row) => row.status !== QUEUE_STATUS.CANCELLED);
      const latest = candidates[candidates.length - 1];

      if (latest && latest.id === item.id && !isTerminal(item.status)) {
        await this.moveTo(scope, item, QUEUE_STATUS.COMPLETED);

        const others = scope.rows.filter((row) => row.id !== item.id && !isTerminal(row.status));
        await scope.setStatus(others.map((row) => row.id), QUEUE_STATUS.SUPERSEDED);

        logger.info(
          { queueItemId: item.id, projectId: item.projectId, clientId: item.clientId },
          'Winner claim: WIN'
        );
        return 'WIN';
      }

      if (!isTerminal(item.status)) {
        await this.moveTo(scope, item, QUEUE_STATUS.SUPERSEDED);
      }

      logger.info(
        {
          queueItemId: item.id,
          projectId: item.projectId,
          clientId: item.clientId,
          latestId: latest?.id,
          status: item.status,
        },
        'Winner claim: LOSE'
      );
      return 'LOSE';
    });
  }

  /**
   * Processing failed. Open rows become CANCELLED; terminal rows are left alone.
   */
  async markFailed(itemId: string): Promise<void> {
    const found = await this.store.findById(itemId);
    if (!found) return;

    await this.store.withClientLock(found.projectId, found.clientId, async (scope) => {
      const item = scope.rows.find((row) => row.id === itemId);
      if (!item || isTerminal(item.status)) return;

      await this.moveTo(scope, item, QUEUE_STATUS.CANCELLED);
      logger.warn(
        { queueItemId: item.id, projectId: item.projectId, clientId: item.clientId },
        'Queue item marked failed'
      );
    });
  }

  async getQueueStats(projectId?: string): Promise<QueueStatusCounts> {
    return this.store.countByStatus(projectId);
  }

  private async moveTo(scope: ClientQueueScope, item: QueuedMessage, to: QueueStatus): Promise<void> {
    const path = transitionPath(item.status, to);
    if (!path) {
      throw new Error(`Illegal queue transition ${item.status} -> ${to} for ${item.id}`);
    }
    for (const step of path) {
      await scope.setStatus([item.id], step);
    }
  }
}

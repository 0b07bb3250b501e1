import type { QueueStatus } from '@slotkeeper/shared';

export interface QueuedMessage {
  id: string;
  /** Insertion order; breaks ties between equal createdAt values */
  seq: number;
  projectId: string;
  clientId: string;
  originalText: string;
  aggregatedText: string;
  status: QueueStatus;
  retryCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewQueuedMessage {
  projectId: string;
  clientId: string;
  originalText: string;
  aggregatedText: string;
  retryCount: number;
}

/**
 * Operations available while one client's rows are locked.
 * `rows` is every row of the client, oldest first by (createdAt, seq).
 */
export interface ClientQueueScope {
  readonly rows: readonly QueuedMessage[];
  insertPending(input: NewQueuedMessage): Promise<QueuedMessage>;
  setStatus(ids: readonly string[], status: QueueStatus): Promise<void>;
}

export type QueueStatusCounts = Record<QueueStatus, number>;

export interface QueueStore {
  /**
   * Serialize against every other submit/claim for (projectId, clientId).
   * The scope is only valid until `fn` settles.
   */
  withClientLock<T>(
    projectId: string,
    clientId: string,
    fn: (scope: ClientQueueScope) => Promise<T>
  ): Promise<T>;
  findById(id: string): Promise<QueuedMessage | null>;
  countByStatus(projectId?: string): Promise<QueueStatusCounts>;
}

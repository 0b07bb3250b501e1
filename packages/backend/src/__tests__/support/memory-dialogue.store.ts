import { randomUUID } from 'crypto';
import type {
  DialogueMessage,
  DialogueStore,
  Feedback,
  NewDialogueMessage,
  NewFeedback,
} from '../../stores/dialogue.store';
import { StoreUnavailableError } from '../../utils/errors';

/**
 * Dialogue store held in memory, messages kept in append order
 */
export class MemoryDialogueStore implements DialogueStore {
  readonly messages: DialogueMessage[] = [];
  readonly feedback: Feedback[] = [];

  /** When set, every operation fails as if the database were down */
  unavailable = false;

  async append(messages: readonly NewDialogueMessage[]): Promise<void> {
    this.assertAvailable();
    for (const message of messages) {
      this.messages.push({ id: randomUUID(), ...message, createdAt: new Date() });
    }
  }

  async recent(projectId: string, clientId: string, limit: number): Promise<DialogueMessage[]> {
    this.assertAvailable();
    const own = this.messages.filter((message) => message.projectId === projectId && message.clientId === clientId);
    return own.slice(Math.max(0, own.length - limit));
  }

  async recordFeedback(input: NewFeedback): Promise<Feedback> {
    this.assertAvailable();
    const feedback: Feedback = { id: randomUUID(), ...input, createdAt: new Date() };
    this.feedback.push(feedback);
    return feedback;
  }

  async listFeedback(projectId: string, limit: number): Promise<Feedback[]> {
    this.assertAvailable();
    return this.feedback
      .filter((entry) => entry.projectId === projectId)
      .reverse()
      .slice(0, limit);
  }

  /** `role: text` lines of one client, oldest first */
  transcript(projectId: string, clientId: string): string[] {
    return this.messages
      .filter((message) => message.projectId === projectId && message.clientId === clientId)
      .map((message) => `${message.role}: ${message.text}`);
  }

  private assertAvailable(): void {
    if (this.unavailable) {
      throw new StoreUnavailableError('Database unavailable during test');
    }
  }
}

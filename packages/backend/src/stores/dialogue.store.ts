export type DialogueRole = 'client' | 'assistant';

export interface DialogueMessage {
  id: string;
  projectId: string;
  clientId: string;
  role: DialogueRole;
  text: string;
  createdAt: Date;
}

export interface NewDialogueMessage {
  projectId: string;
  clientId: string;
  role: DialogueRole;
  text: string;
}

export interface Feedback {
  id: string;
  projectId: string;
  clientId: string;
  /** Booking the turn created, changed or cancelled, if any */
  bookingId: string | null;
  /** 1-5 */
  rating: number | null;
  comment: string;
  createdAt: Date;
}

export type NewFeedback = Omit<Feedback, 'id' | 'createdAt'>;

/**
 * Conversation history per client, and feedback clients leave in chat
 */
export interface DialogueStore {
  /** Stored in the order given */
  append(messages: readonly NewDialogueMessage[]): Promise<void>;
  /** The last `limit` messages of the client, oldest first */
  recent(projectId: string, clientId: string, limit: number): Promise<DialogueMessage[]>;
  recordFeedback(input: NewFeedback): Promise<Feedback>;
  /** Newest first */
  listFeedback(projectId: string, limit: number): Promise<Feedback[]>;
}

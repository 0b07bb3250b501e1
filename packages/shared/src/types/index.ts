/**
 * Shared wire contracts for slotkeeper.
 *
 * These types describe the JSON exchanged between channel adapters and the backend.
 * Dates are `YYYY-MM-DD` strings, times are `HH:MM` strings, timestamps are ISO 8601.
 */

// ============================================
// Queue
// ============================================

export const QUEUE_STATUS = {
  PENDING: 'PENDING',
  PROCESSING: 'PROCESSING',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  SUPERSEDED: 'SUPERSEDED',
} as const;

export type QueueStatus = (typeof QUEUE_STATUS)[keyof typeof QUEUE_STATUS];

/**
 * One inbound chat event as delivered by a channel adapter.
 * `retry` and `deliveryCount` come from the channel's redelivery metadata.
 */
export interface InboundEvent {
  projectId: string;
  clientId: string;
  text: string;
  retry: boolean;
  deliveryCount: number;
}

export type WinnerClaim = 'WIN' | 'LOSE';

export type TurnOutcome = 'skipped' | 'delivered' | 'superseded' | 'failed';

/**
 * Synchronous webhook reply. `send_status` follows the inline-reply
 * convention of chat-bot platforms: only 'TRUE' responses are shown to the user.
 */
export type InboundWebhookResponse =
  | { send_status: 'TRUE'; reply: string; queueItemId: string }
  | { send_status: 'FALSE'; reason: Exclude<TurnOutcome, 'delivered'>; queueItemId?: string };

// ============================================
// Bookings
// ============================================

export const BOOKING_STATUS = {
  ACTIVE: 'active',
  CANCELLED: 'cancelled',
} as const;

export type BookingStatus = (typeof BOOKING_STATUS)[keyof typeof BOOKING_STATUS];

export interface BookingView {
  id: string;
  projectId: string;
  specialist: string;
  date: string;
  startTime: string;
  endTime: string;
  durationSlots: number;
  clientId: string;
  clientName: string | null;
  clientPhone: string | null;
  serviceName: string | null;
  status: BookingStatus;
  createdAt: string;
  updatedAt: string;
}

export interface AvailableSlotsView {
  specialist: string;
  date: string;
  durationSlots: number;
  slots: string[];
}

export interface DialogueMessageView {
  role: 'client' | 'assistant';
  text: string;
  createdAt: string;
}

export interface FeedbackView {
  id: string;
  clientId: string;
  bookingId: string | null;
  rating: number | null;
  comment: string;
  createdAt: string;
}

// ============================================
// API Response
// ============================================

export interface ApiResponse<T> {
  success: true;
  data?: T;
  message?: string;
  count?: number;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
  details?: unknown;
}

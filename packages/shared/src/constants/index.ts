/**
 * Constants shared between channel adapters and the backend.
 */

// HTTP headers checked by backend middleware
export const HEADERS = {
  WEBHOOK_SECRET: 'x-webhook-secret',
  ADMIN_SECRET: 'x-admin-secret',
} as const;

// Marker written into continuation rows of a multi-slot booking in the spreadsheet mirror
export const MIRROR_CONTINUATION_MARKER = '-';

export type { QueueStatus, BookingStatus } from '../types';
export { QUEUE_STATUS, BOOKING_STATUS } from '../types';

/**
 * Error taxonomy shared by the coordinator, allocator and mirror.
 *
 * Only ValidationError and ConflictError are surfaced to callers as business
 * rejections. MirrorSyncError is logged and swallowed by booking operations.
 * StoreUnavailableError fails the whole turn.
 */

export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  readonly code = 'VALIDATION_FAILED';
  readonly statusCode = 400;
}

export type ConflictSource = 'local' | 'mirror';

export class ConflictError extends AppError {
  readonly code = 'SLOT_CONFLICT';
  readonly statusCode = 409;
  readonly source: ConflictSource;

  constructor(message: string, source: ConflictSource, details?: Record<string, unknown>) {
    super(message, details);
    this.source = source;
  }
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

export class StoreUnavailableError extends AppError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly statusCode = 503;
}

export class MirrorSyncError extends AppError {
  readonly code = 'MIRROR_SYNC_FAILED';
  readonly statusCode = 502;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

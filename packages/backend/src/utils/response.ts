import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import type { ApiResponse, ErrorResponse } from '@slotkeeper/shared';

/**
 * Standardized API response utilities
 * Ensures consistent response format across all endpoints
 */

export type SuccessResponse<T = unknown> = ApiResponse<T>;

/**
 * Send a successful response with data
 */
export function sendSuccess<T>(
  reply: FastifyReply,
  data: T,
  options?: {
    statusCode?: number;
    message?: string;
    count?: number;
  }
): FastifyReply {
  const response: SuccessResponse<T> = {
    success: true,
    data,
  };

  if (options?.message) response.message = options.message;
  if (options?.count !== undefined) response.count = options.count;

  return reply.status(options?.statusCode ?? 200).send(response);
}

/**
 * Send an error response
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  error: string,
  options?: { code?: string; details?: unknown }
): FastifyReply {
  const response: ErrorResponse = {
    success: false,
    error,
  };

  if (options?.code) response.code = options.code;
  if (options?.details !== undefined) response.details = options.details;

  return reply.status(statusCode).send(response);
}

/**
 * Common error responses
 */
export const Errors = {
  unauthorized: (reply: FastifyReply) =>
    sendError(reply, 401, 'Unauthorized', { code: 'UNAUTHORIZED' }),

  notFound: (reply: FastifyReply, resource = 'Resource') =>
    sendError(reply, 404, `${resource} not found`, { code: 'NOT_FOUND' }),

  validationFailed: (reply: FastifyReply, error: ZodError) =>
    sendError(reply, 400, 'Invalid request', {
      code: 'VALIDATION_FAILED',
      details: error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    }),

  internal: (reply: FastifyReply, message = 'Internal server error') =>
    sendError(reply, 500, message, { code: 'INTERNAL_ERROR' }),
};

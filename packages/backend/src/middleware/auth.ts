import type { FastifyReply, FastifyRequest } from 'fastify';
import { timingSafeEqual } from 'crypto';
import { logger } from '../utils/logger';
import { Errors } from '../utils/response';

/**
 * Constant-time string comparison, so response time does not reveal how much
 * of a secret matched.
 */
export function safeCompare(a: string, b: string): boolean {
  // Pad shorter string to match length (comparison will fail, but timing is consistent)
  const aBuffer = Buffer.from(a);
  const bBuffer = Buffer.from(b);

  const maxLen = Math.max(aBuffer.length, bBuffer.length);
  const aPadded = Buffer.alloc(maxLen);
  const bPadded = Buffer.alloc(maxLen);
  aBuffer.copy(aPadded);
  bBuffer.copy(bPadded);

  // Evaluate both conditions unconditionally to avoid timing leak from && short-circuit
  const lengthOk = aBuffer.length === bBuffer.length ? 1 : 0;
  const contentOk = timingSafeEqual(aPadded, bPadded) ? 1 : 0;

  return (lengthOk & contentOk) === 1;
}

/**
 * preHandler that rejects requests whose `header` does not carry `secret`
 */
export function requireSecret(
  header: string,
  secret: string
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined> {
  return async function verifySecret(request, reply) {
    const provided = request.headers[header];
    const valid = typeof provided === 'string' && secret.length > 0 && safeCompare(provided, secret);

    if (!valid) {
      logger.warn({ requestId: request.id, ip: request.ip, header }, 'Unauthorized request - invalid secret');
      return Errors.unauthorized(reply);
    }
    return undefined;
  };
}

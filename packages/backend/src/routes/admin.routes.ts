import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  HEADERS,
  type AvailableSlotsView,
  type BookingView,
  type DialogueMessageView,
  type FeedbackView,
} from '@slotkeeper/shared';
import type { ProjectCatalogue } from '../config/projects';
import { INPUT_LIMITS, RATE_LIMITS } from '../constants';
import { requireSecret } from '../middleware/auth';
import type { MessageCoordinator } from '../services/message-coordinator.service';
import type { MirrorReconciler } from '../services/mirror-reconciler.service';
import type { SlotAllocator } from '../services/slot-allocator.service';
import type { Booking } from '../stores/booking.store';
import type { DialogueStore } from '../stores/dialogue.store';
import { logger, maskIdentifier } from '../utils/logger';
import { Errors, sendError, sendSuccess } from '../utils/response';
import { endTimeOf } from '../utils/slot-time';

export interface AdminRouteOptions {
  coordinator: MessageCoordinator;
  allocator: SlotAllocator;
  reconciler: MirrorReconciler;
  catalogue: ProjectCatalogue;
  dialogues: DialogueStore;
  adminSecret: string;
}

const id = z.string().min(1).max(INPUT_LIMITS.MAX_ID_LENGTH);
const nullableText = z.string().trim().max(INPUT_LIMITS.MAX_NAME_LENGTH).nullable();

const projectQuerySchema = z.object({ projectId: id.optional() });

const slotsQuerySchema = z.object({
  projectId: id,
  specialist: z.string().min(1).max(INPUT_LIMITS.MAX_NAME_LENGTH),
  date: z.string().min(1),
  durationSlots: z.coerce.number().int().positive().default(1),
});

const bookingsQuerySchema = z.object({
  projectId: id,
  clientId: id,
  activeOnly: z.enum(['true', 'false']).default('true').transform((value) => value === 'true'),
});

const listLimit = z.coerce.number().int().positive().max(200).default(50);

const dialogueQuerySchema = z.object({ projectId: id, clientId: id, limit: listLimit });

const feedbackQuerySchema = z.object({ projectId: id, limit: listLimit });

const bookingParamsSchema = z.object({ id: z.string().uuid() });

const allocateSchema = z.object({
  projectId: id,
  specialist: z.string().min(1).max(INPUT_LIMITS.MAX_NAME_LENGTH),
  date: z.string().min(1),
  startTime: z.string().min(1),
  durationSlots: z.number().int().positive().optional(),
  clientId: id,
  clientName: nullableText.optional(),
  clientPhone: nullableText.optional(),
  serviceName: nullableText.optional(),
});

const cancelSchema = z.object({ projectId: id });

const changeSchema = z.object({
  projectId: id,
  specialist: z.string().min(1).max(INPUT_LIMITS.MAX_NAME_LENGTH).optional(),
  date: z.string().min(1).optional(),
  startTime: z.string().min(1).optional(),
  durationSlots: z.number().int().positive().optional(),
  clientName: nullableText.optional(),
  clientPhone: nullableText.optional(),
  serviceName: nullableText.optional(),
});

const reconcileSchema = z
  .object({
    projectId: id.optional(),
    specialist: z.string().min(1).max(INPUT_LIMITS.MAX_NAME_LENGTH).optional(),
  })
  .refine((body) => !body.specialist || body.projectId, {
    message: 'specialist requires projectId',
    path: ['projectId'],
  });

const readRateLimit = {
  rateLimit: {
    max: RATE_LIMITS.ADMIN_ENDPOINTS.max,
    timeWindow: RATE_LIMITS.ADMIN_ENDPOINTS.timeWindowMs,
  },
};

const mutationRateLimit = {
  rateLimit: {
    max: RATE_LIMITS.ADMIN_MUTATIONS.max,
    timeWindow: RATE_LIMITS.ADMIN_MUTATIONS.timeWindowMs,
  },
};

export function toBookingView(booking: Booking, slotMinutes: number): BookingView {
  return {
    id: booking.id,
    projectId: booking.projectId,
    specialist: booking.specialist,
    date: booking.date,
    startTime: booking.startTime,
    endTime: endTimeOf(booking, slotMinutes),
    durationSlots: booking.durationSlots,
    clientId: booking.clientId,
    clientName: booking.clientName,
    clientPhone: booking.clientPhone,
    serviceName: booking.serviceName,
    status: booking.status,
    createdAt: booking.createdAt.toISOString(),
    updatedAt: booking.updatedAt.toISOString(),
  };
}

export async function adminRoutes(fastify: FastifyInstance, options: AdminRouteOptions) {
  const { coordinator, allocator, reconciler, catalogue, dialogues } = options;

  fastify.addHook('preHandler', requireSecret(HEADERS.ADMIN_SECRET, options.adminSecret));

  const view = (booking: Booking) => toBookingView(booking, catalogue.get(booking.projectId).slotMinutes);

  // ============================================
  // Queue
  // ============================================

  fastify.get('/api/admin/queue/stats', { config: readRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const query = projectQuerySchema.safeParse(request.query);
    if (!query.success) {
      return Errors.validationFailed(reply, query.error);
    }
    return sendSuccess(reply, await coordinator.getQueueStats(query.data.projectId));
  });

  // ============================================
  // Dialogue and feedback
  // ============================================

  fastify.get('/api/admin/dialogues', { config: readRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const query = dialogueQuerySchema.safeParse(request.query);
    if (!query.success) {
      return Errors.validationFailed(reply, query.error);
    }

    const { projectId, clientId, limit } = query.data;
    const project = catalogue.get(projectId);
    const messages = await dialogues.recent(project.id, clientId, limit);
    const data: DialogueMessageView[] = messages.map((message) => ({
      role: message.role,
      text: message.text,
      createdAt: message.createdAt.toISOString(),
    }));
    return sendSuccess(reply, data, { count: data.length });
  });

  fastify.get('/api/admin/feedback', { config: readRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const query = feedbackQuerySchema.safeParse(request.query);
    if (!query.success) {
      return Errors.validationFailed(reply, query.error);
    }

    const project = catalogue.get(query.data.projectId);
    const entries = await dialogues.listFeedback(project.id, query.data.limit);
    const data: FeedbackView[] = entries.map((entry) => ({
      id: entry.id,
      clientId: entry.clientId,
      bookingId: entry.bookingId,
      rating: entry.rating,
      comment: entry.comment,
      createdAt: entry.createdAt.toISOString(),
    }));
    return sendSuccess(reply, data, { count: data.length });
  });

  // ============================================
  // Slots and bookings
  // ============================================

  fastify.get('/api/admin/slots', { config: readRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const query = slotsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return Errors.validationFailed(reply, query.error);
    }

    const { projectId, specialist, date, durationSlots } = query.data;
    const slots = await allocator.getAvailableSlots(projectId, specialist, date, durationSlots);
    const project = catalogue.get(projectId);
    const data: AvailableSlotsView = {
      specialist: catalogue.resolveSpecialist(project, specialist),
      date,
      durationSlots,
      slots,
    };
    return sendSuccess(reply, data, { count: slots.length });
  });

  fastify.get('/api/admin/bookings', { config: readRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const query = bookingsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return Errors.validationFailed(reply, query.error);
    }

    const { projectId, clientId, activeOnly } = query.data;
    const bookings = await allocator.listClientBookings(projectId, clientId, activeOnly);
    return sendSuccess(reply, bookings.map(view), { count: bookings.length });
  });

  fastify.get('/api/admin/bookings/stats', { config: readRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const query = projectQuerySchema.safeParse(request.query);
    if (!query.success) {
      return Errors.validationFailed(reply, query.error);
    }
    return sendSuccess(reply, await allocator.getBookingStats(query.data.projectId));
  });

  fastify.post('/api/admin/bookings', { config: mutationRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = allocateSchema.safeParse(request.body);
    if (!body.success) {
      return Errors.validationFailed(reply, body.error);
    }

    const { durationSlots, ...rest } = body.data;
    const booking = await allocator.allocate({
      ...rest,
      durationSlots: durationSlots ?? allocator.durationSlotsFor(rest.projectId, rest.serviceName),
    });

    logger.info(
      { requestId: request.id, bookingId: booking.id, clientId: maskIdentifier(booking.clientId) },
      'Booking created by admin'
    );
    return sendSuccess(reply, view(booking), { statusCode: 201 });
  });

  fastify.post('/api/admin/bookings/:id/cancel', { config: mutationRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const params = bookingParamsSchema.safeParse(request.params);
    if (!params.success) {
      return Errors.validationFailed(reply, params.error);
    }
    const body = cancelSchema.safeParse(request.body);
    if (!body.success) {
      return Errors.validationFailed(reply, body.error);
    }

    const booking = await allocator.cancel(body.data.projectId, params.data.id);
    logger.info({ requestId: request.id, bookingId: booking.id }, 'Booking cancelled by admin');
    return sendSuccess(reply, view(booking));
  });

  fastify.post('/api/admin/bookings/:id/change', { config: mutationRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const params = bookingParamsSchema.safeParse(request.params);
    if (!params.success) {
      return Errors.validationFailed(reply, params.error);
    }
    const body = changeSchema.safeParse(request.body);
    if (!body.success) {
      return Errors.validationFailed(reply, body.error);
    }

    const { projectId, ...changes } = body.data;
    const booking = await allocator.change(projectId, params.data.id, changes);
    logger.info({ requestId: request.id, bookingId: booking.id }, 'Booking changed by admin');
    return sendSuccess(reply, view(booking));
  });

  // ============================================
  // Mirror
  // ============================================

  fastify.post('/api/admin/mirror/reconcile', { config: mutationRateLimit }, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = reconcileSchema.safeParse(request.body ?? {});
    if (!body.success) {
      return Errors.validationFailed(reply, body.error);
    }

    const { projectId, specialist } = body.data;
    if (projectId && specialist) {
      return sendSuccess(reply, await reconciler.reconcileSpecialist(projectId, specialist));
    }

    const result = await reconciler.reconcileAll('manual');
    if (!result) {
      return sendError(reply, 409, 'A reconciliation sweep is already running', { code: 'SWEEP_IN_PROGRESS' });
    }
    return sendSuccess(reply, result);
  });

  fastify.get('/api/admin/mirror/status', { config: readRateLimit }, async (_request: FastifyRequest, reply: FastifyReply) => {
    return sendSuccess(reply, reconciler.getStatus());
  });
}

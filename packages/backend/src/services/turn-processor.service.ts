/**
 * Turn Processor
 *
 * Decides what to do with one (aggregated) client turn. The assistant
 * implementation asks the language model for a reply plus a booking directive
 * and carries the directive out through the slot allocator.
 *
 * A taken slot or an unusable request is a business outcome: the client gets
 * the project's fallback reply. Anything else fails the turn.
 */

import { z } from 'zod';
import type { ProjectConfig } from '../config/projects';
import { ASSISTANT_CONTEXT } from '../constants';
import type { Booking } from '../stores/booking.store';
import type { DialogueStore } from '../stores/dialogue.store';
import type { QueuedMessage } from '../stores/queue.store';
import { addDays, parseFlexibleDate } from '../utils/date-parser';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { extractJsonObject, JSON_SIZE_LIMITS, safeJsonParse } from '../utils/json-parser';
import { logger } from '../utils/logger';
import { parseTime, formatTime } from '../utils/slot-time';
import type { CompletionClient } from './ai.service';
import type { SlotAllocator } from './slot-allocator.service';
import { buildSystemPrompt, type FreeSlotsByDay } from './system-prompt-builder';

export interface TurnInput {
  item: QueuedMessage;
  project: ProjectConfig;
}

export type DirectiveAction = 'none' | 'book' | 'cancel' | 'change';

export interface TurnFeedback {
  comment: string;
  /** 1-5 */
  rating: number | null;
}

export interface TurnResult {
  replyText: string;
  action: DirectiveAction;
  /** Booking created, changed or cancelled by this turn */
  booking?: Booking;
  /** Feedback the client gave in this turn */
  feedback?: TurnFeedback;
}

export interface TurnProcessor {
  process(input: TurnInput): Promise<TurnResult>;
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

export const directiveSchema = z.object({
  reply: z.string().trim().min(1),
  action: z.enum(['none', 'book', 'cancel', 'change']).default('none'),
  specialist: optionalText,
  date: optionalText,
  time: optionalText,
  service: optionalText,
  clientName: optionalText,
  clientPhone: optionalText,
  current: z
    .object({
      date: optionalText,
      time: optionalText,
      service: optionalText,
    })
    .nullish(),
  feedback: optionalText,
  // An out-of-range rating is dropped rather than failing the directive
  rating: z.number().int().min(1).max(5).nullish().catch(null),
});

export type BookingDirective = z.infer<typeof directiveSchema>;

export interface AssistantTurnProcessorDeps {
  completion: CompletionClient;
  allocator: SlotAllocator;
  dialogues: DialogueStore;
  /** Today's date (YYYY-MM-DD) in the business timezone */
  today: () => string;
}

export class AssistantTurnProcessor implements TurnProcessor {
  constructor(private readonly deps: AssistantTurnProcessorDeps) {}

  async process({ item, project }: TurnInput): Promise<TurnResult> {
    const today = this.deps.today();
    const traceId = `turn-${item.id}`;

    const [bookings, freeSlots, history] = await Promise.all([
      this.deps.allocator.listClientBookings(project.id, item.clientId),
      this.collectFreeSlots(project, today),
      this.deps.dialogues.recent(project.id, item.clientId, ASSISTANT_CONTEXT.HISTORY_MESSAGES),
    ]);

    const system = buildSystemPrompt({ project, today, clientId: item.clientId, bookings, freeSlots });
    const response = await this.deps.completion.complete({
      system,
      prompt: item.aggregatedText,
      traceId,
      history,
    });

    const directive = this.parseDirective(response.content, traceId);
    if (!directive) {
      throw new Error('Assistant returned an empty reply');
    }
    const feedback = this.feedbackOf(directive);

    try {
      const booking = await this.execute(directive, item, project, today);
      logger.info(
        { traceId, queueItemId: item.id, projectId: project.id, action: directive.action, bookingId: booking?.id },
        'Turn processed'
      );
      return { replyText: directive.reply, action: directive.action, booking, feedback };
    } catch (error) {
      if (error instanceof ConflictError) {
        logger.info({ traceId, queueItemId: item.id, source: error.source }, 'Requested slot taken, sending fallback reply');
        return { replyText: project.replies.slotTaken, action: directive.action, feedback };
      }
      if (error instanceof ValidationError || error instanceof NotFoundError) {
        logger.info({ traceId, queueItemId: item.id, reason: error.message }, 'Booking request unusable, sending fallback reply');
        return { replyText: project.replies.invalidRequest, action: directive.action, feedback };
      }
      throw error;
    }
  }

  /**
   * The JSON directive in the reply, or the plain reply text with no action
   * when the model did not answer in JSON
   */
  parseDirective(content: string, traceId: string): BookingDirective | null {
    const json = extractJsonObject(content);
    const parsed = safeJsonParse(json, null, {
      schema: directiveSchema.nullable(),
      context: traceId,
      maxSize: JSON_SIZE_LIMITS.MODEL_REPLY,
    });
    if (parsed) return parsed;

    const text = content.trim();
    if (!text) return null;
    logger.warn({ traceId }, 'Assistant reply carried no usable directive, sending it as plain text');
    return directiveSchema.parse({ reply: text, action: 'none' });
  }

  private feedbackOf(directive: BookingDirective): TurnFeedback | undefined {
    const rating = directive.rating ?? null;
    if (directive.feedback === null && rating === null) return undefined;
    return { comment: directive.feedback ?? '', rating };
  }

  private async execute(
    directive: BookingDirective,
    item: QueuedMessage,
    project: ProjectConfig,
    today: string
  ): Promise<Booking | undefined> {
    const { allocator } = this.deps;

    switch (directive.action) {
      case 'none':
        return undefined;

      case 'book': {
        const target = this.requireTarget(directive, today);
        return allocator.allocate({
          projectId: project.id,
          specialist: target.specialist,
          date: target.date,
          startTime: target.startTime,
          durationSlots: allocator.durationSlotsFor(project.id, directive.service),
          clientId: item.clientId,
          clientName: directive.clientName,
          clientPhone: directive.clientPhone,
          serviceName: directive.service,
        });
      }

      case 'cancel': {
        const existing = await this.findReferencedBooking(directive, item, project, today);
        return allocator.cancel(project.id, existing.id);
      }

      case 'change': {
        const existing = await this.findReferencedBooking(directive, item, project, today);
        const date = directive.date ? this.parseDate(directive.date, today) : undefined;
        const startTime = directive.time ? this.parseClock(directive.time) : undefined;
        const serviceChanged = directive.service !== null && directive.service !== existing.serviceName;

        return allocator.change(project.id, existing.id, {
          specialist: directive.specialist ?? undefined,
          date,
          startTime,
          serviceName: serviceChanged ? directive.service : undefined,
          clientName: directive.clientName ?? undefined,
          clientPhone: directive.clientPhone ?? undefined,
        });
      }
    }
  }

  private async findReferencedBooking(
    directive: BookingDirective,
    item: QueuedMessage,
    project: ProjectConfig,
    today: string
  ): Promise<Booking> {
    const current = directive.current;
    const booking = await this.deps.allocator.findClientBooking(project.id, item.clientId, {
      serviceName: current?.service ?? (directive.action === 'cancel' ? directive.service : null),
      date: current?.date ? parseFlexibleDate(current.date, today) : null,
      startTime: current?.time ? this.parseClock(current.time) : null,
    });
    if (!booking) {
      throw new NotFoundError('Client has no upcoming booking', { clientId: item.clientId, projectId: project.id });
    }
    return booking;
  }

  private requireTarget(directive: BookingDirective, today: string): { specialist: string; date: string; startTime: string } {
    if (!directive.specialist || !directive.date || !directive.time) {
      throw new ValidationError('Booking needs a specialist, a date and a time', {
        specialist: directive.specialist,
        date: directive.date,
        time: directive.time,
      });
    }
    return {
      specialist: directive.specialist,
      date: this.parseDate(directive.date, today),
      startTime: this.parseClock(directive.time),
    };
  }

  private parseDate(value: string, today: string): string {
    const date = parseFlexibleDate(value, today);
    if (!date) {
      throw new ValidationError(`Unrecognized date: ${value}`, { date: value });
    }
    return date;
  }

  private parseClock(value: string): string {
    const minutes = parseTime(value);
    if (minutes === null) {
      throw new ValidationError(`Unrecognized time: ${value}`, { time: value });
    }
    return formatTime(minutes);
  }

  private async collectFreeSlots(project: ProjectConfig, today: string): Promise<FreeSlotsByDay[]> {
    const days: FreeSlotsByDay[] = [];
    for (let offset = 0; offset < ASSISTANT_CONTEXT.FREE_SLOT_DAYS; offset++) {
      const date = addDays(today, offset);
      for (const specialist of project.specialists) {
        const slots = await this.deps.allocator.getAvailableSlots(project.id, specialist, date, 1);
        days.push({ specialist, date, slots: slots.slice(0, ASSISTANT_CONTEXT.MAX_SLOTS_PER_DAY) });
      }
    }
    return days;
  }
}

/**
 * System Prompt Builder
 *
 * Assembles what the booking assistant is told about one client turn: the
 * project, its specialists and services, today's date, the client's upcoming
 * bookings and the nearest free start times. The prompt carries no business
 * copy; replies come from the model, fallback texts from the project config.
 */

import type { ProjectConfig } from '../config/projects';
import type { Booking } from '../stores/booking.store';
import { endTimeOf } from '../utils/slot-time';

export interface FreeSlotsByDay {
  specialist: string;
  date: string;
  slots: string[];
}

export interface PromptContext {
  project: ProjectConfig;
  today: string;
  clientId: string;
  bookings: Booking[];
  freeSlots: FreeSlotsByDay[];
}

const DIRECTIVE_FORMAT = `Answer with one JSON object and nothing else:
{
  "reply": string,                         // message sent to the client
  "action": "none" | "book" | "cancel" | "change",
  "specialist": string | null,             // for book/change
  "date": "YYYY-MM-DD" | "DD.MM" | null,   // for book/change
  "time": "HH:MM" | null,                  // for book/change
  "service": string | null,
  "clientName": string | null,
  "clientPhone": string | null,
  "current": { "date": string | null, "time": string | null, "service": string | null } | null
                                           // which existing booking a cancel/change refers to
  "feedback": string | null,               // the client's opinion of the service, when they give one
  "rating": 1 | 2 | 3 | 4 | 5 | null       // only when the client states a score
}
Only use action "book" or "change" when specialist, date and time are all known.`;

function formatServices(project: ProjectConfig): string {
  const entries = Object.entries(project.services);
  if (entries.length === 0) return '- (none configured)';
  return entries.map(([name, minutes]) => `- ${name}: ${minutes} min`).join('\n');
}

function formatBookings(bookings: Booking[], slotMinutes: number): string {
  if (bookings.length === 0) return '- none';
  return bookings
    .map(
      (booking) =>
        `- ${booking.date} ${booking.startTime}-${endTimeOf(booking, slotMinutes)} with ${booking.specialist}` +
        (booking.serviceName ? ` (${booking.serviceName})` : '')
    )
    .join('\n');
}

function formatFreeSlots(freeSlots: FreeSlotsByDay[]): string {
  const lines = freeSlots
    .filter((day) => day.slots.length > 0)
    .map((day) => `- ${day.specialist}, ${day.date}: ${day.slots.join(', ')}`);
  return lines.length > 0 ? lines.join('\n') : '- no free slots in the next days';
}

export function buildSystemPrompt(context: PromptContext): string {
  const { project } = context;

  return [
    `You are the booking assistant of "${project.name}".`,
    `Today is ${context.today}. Business hours ${project.workHours.start}-${project.workHours.end}, slots of ${project.slotMinutes} minutes.`,
    '',
    `Specialists: ${project.specialists.join(', ')}`,
    'Services:',
    formatServices(project),
    '',
    `Upcoming bookings of this client (${context.clientId}):`,
    formatBookings(context.bookings, project.slotMinutes),
    '',
    'Free start times:',
    formatFreeSlots(context.freeSlots),
    '',
    DIRECTIVE_FORMAT,
  ].join('\n');
}

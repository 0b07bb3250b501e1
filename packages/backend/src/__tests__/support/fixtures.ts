import { ProjectCatalogue } from '../../config/projects';
import type { DayKey } from '../../stores/booking.store';

export const PROJECT_ID = 'test-salon';
export const TODAY = '2030-03-04';
export const TOMORROW = '2030-03-05';

export const SLOT_TAKEN_REPLY = 'That time is gone, pick another one.';
export const INVALID_REQUEST_REPLY = 'Could not book that, check the date and time.';

/**
 * One project, two specialists, 09:00-12:00 in 30 minute slots
 */
export function createCatalogue(): ProjectCatalogue {
  return new ProjectCatalogue({
    projects: [
      {
        id: PROJECT_ID,
        name: 'Test Salon',
        specialists: ['Anna', 'Maria'],
        services: { Haircut: 60, Consultation: 30, Colouring: 90 },
        workHours: { start: '09:00', end: '12:00' },
        slotMinutes: 30,
        replies: { slotTaken: SLOT_TAKEN_REPLY, invalidRequest: INVALID_REQUEST_REPLY },
      },
    ],
  });
}

export function day(specialist: string, date: string = TOMORROW): DayKey {
  return { projectId: PROJECT_ID, specialist, date };
}

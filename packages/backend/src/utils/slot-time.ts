/**
 * Slot grid arithmetic.
 *
 * Times of day are handled as minutes since midnight. A slot is identified by
 * its start minute; a booking covers `durationSlots` consecutive slots.
 */

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

export interface WorkHours {
  start: string;
  end: string;
}

export interface TimeRange {
  startTime: string;
  durationSlots: number;
}

/**
 * Parse "HH:MM" (or "H:MM") into minutes since midnight, null when malformed
 */
export function parseTime(value: string): number | null {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;

  return hours * 60 + minutes;
}

export function formatTime(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}`;
}

/**
 * Normalize "9:00" to "09:00". Throws on malformed input, so only call on validated values.
 */
export function normalizeTime(value: string): string {
  const minutes = parseTime(value);
  if (minutes === null) {
    throw new RangeError(`Invalid time: ${value}`);
  }
  return formatTime(minutes);
}

/**
 * Round a service duration up to whole slots (minimum one slot)
 */
export function durationToSlots(durationMinutes: number, slotMinutes: number): number {
  if (!Number.isFinite(durationMinutes) || durationMinutes <= 0) return 1;
  return Math.max(1, Math.ceil(durationMinutes / slotMinutes));
}

export function endTimeOf(range: TimeRange, slotMinutes: number): string {
  const start = parseTime(range.startTime) ?? 0;
  return formatTime(start + range.durationSlots * slotMinutes);
}

/**
 * Start minutes of every slot inside business hours. A slot belongs to the grid
 * only if it ends at or before closing time.
 */
export function buildSlotGrid(hours: WorkHours, slotMinutes: number): number[] {
  const open = parseTime(hours.start);
  const close = parseTime(hours.end);
  if (open === null || close === null || slotMinutes <= 0) return [];

  const grid: number[] = [];
  for (let start = open; start + slotMinutes <= close; start += slotMinutes) {
    grid.push(start);
  }
  return grid;
}

/**
 * Slot start minutes covered by a run starting at `startMinute`
 */
export function coveredSlots(startMinute: number, durationSlots: number, slotMinutes: number): number[] {
  const slots: number[] = [];
  for (let i = 0; i < durationSlots; i++) {
    slots.push(startMinute + i * slotMinutes);
  }
  return slots;
}

/**
 * Half-open interval overlap: [a, a+len) vs [b, b+len). Back-to-back runs do not overlap.
 */
export function rangesOverlap(a: TimeRange, b: TimeRange, slotMinutes: number): boolean {
  const aStart = parseTime(a.startTime);
  const bStart = parseTime(b.startTime);
  if (aStart === null || bStart === null) return false;

  const aEnd = aStart + a.durationSlots * slotMinutes;
  const bEnd = bStart + b.durationSlots * slotMinutes;
  return aStart < bEnd && bStart < aEnd;
}

/**
 * Expand bookings into the set of grid slots they touch
 */
export function occupiedSlotStarts(
  grid: number[],
  bookings: TimeRange[],
  slotMinutes: number
): Set<number> {
  const occupied = new Set<number>();

  for (const booking of bookings) {
    const start = parseTime(booking.startTime);
    if (start === null) continue;
    const end = start + booking.durationSlots * slotMinutes;

    for (const slot of grid) {
      if (slot < end && start < slot + slotMinutes) {
        occupied.add(slot);
      }
    }
  }

  return occupied;
}

/**
 * Start times where a run of `durationSlots` fits entirely inside the grid
 * without touching an occupied slot. Ordered ascending.
 */
export function availableStarts(
  grid: number[],
  occupied: Set<number>,
  durationSlots: number,
  slotMinutes: number
): number[] {
  const gridSet = new Set(grid);

  return grid.filter((start) =>
    coveredSlots(start, durationSlots, slotMinutes).every(
      (slot) => gridSet.has(slot) && !occupied.has(slot)
    )
  );
}

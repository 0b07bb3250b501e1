/**
 * Calendar date helpers. Dates travel as YYYY-MM-DD strings and are never
 * converted through a local-time Date, so the server timezone cannot shift them.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DOTTED_FULL = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;
const DOTTED_SHORT = /^(\d{1,2})\.(\d{1,2})\.?$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function isValidDay(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function formatIso(year: number, month: number, day: number): string {
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * True for a real calendar date written as YYYY-MM-DD
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  return isValidDay(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Today's date in an IANA timezone
 */
export function todayIn(timezone: string, now: Date = new Date()): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

export function addDays(isoDate: string, days: number): string {
  const match = ISO_DATE.exec(isoDate);
  if (!match) {
    throw new RangeError(`Invalid date: ${isoDate}`);
  }
  const shifted = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]) + days));
  return formatIso(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

/**
 * Consecutive dates starting at `from`
 */
export function dateRange(from: string, days: number): string[] {
  const dates: string[] = [];
  for (let offset = 0; offset < days; offset++) {
    dates.push(addDays(from, offset));
  }
  return dates;
}

/**
 * Parse a date as a client or the assistant writes it.
 *
 * Accepts YYYY-MM-DD, DD.MM.YYYY and DD.MM. A DD.MM date takes the year of
 * `today`, or the next year if that day has already passed.
 *
 * @returns YYYY-MM-DD, or null when the input is not a valid date
 */
export function parseFlexibleDate(input: string, today: string): string | null {
  const value = input.trim();

  const iso = ISO_DATE.exec(value);
  if (iso) {
    return isIsoDate(value) ? value : null;
  }

  const full = DOTTED_FULL.exec(value);
  if (full) {
    const [day, month, year] = [Number(full[1]), Number(full[2]), Number(full[3])];
    return isValidDay(year, month, day) ? formatIso(year, month, day) : null;
  }

  const short = DOTTED_SHORT.exec(value);
  if (short) {
    const todayMatch = ISO_DATE.exec(today);
    if (!todayMatch) return null;

    const [day, month] = [Number(short[1]), Number(short[2])];
    let year = Number(todayMatch[1]);
    if (!isValidDay(year, month, day) && !isValidDay(year + 1, month, day)) return null;

    // 29.02 in a non-leap year rolls forward to the next year that has it
    if (!isValidDay(year, month, day) || formatIso(year, month, day) < today) {
      year += 1;
    }
    return isValidDay(year, month, day) ? formatIso(year, month, day) : null;
  }

  return null;
}

const DAY_MS = 86400000;

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_OF_DAY = /^(\d{2}):(\d{2})$/;

/**
 * Parse a YYYY-MM-DD string into a UTC midnight Date.
 * Returns null for malformed strings and impossible dates such as 2023-02-29.
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return toIsoDate(parsed) === value ? parsed : null;
}

export function isValidIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

export function toIsoDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** Calendar date of `now` in the process's local timezone. */
export function localIsoDate(now: Date): string {
  const year = String(now.getFullYear()).padStart(4, '0');
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function mustParse(isoDate: string): Date {
  const parsed = parseIsoDate(isoDate);
  if (!parsed) {
    throw new RangeError(`Invalid ISO date: ${isoDate}`);
  }
  return parsed;
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(mustParse(isoDate).getTime() + days * DAY_MS));
}

export function startOfMonth(isoDate: string): string {
  return `${isoDate.slice(0, 7)}-01`;
}

/** Three-letter weekday, e.g. "Fri" */
export function weekdayLabel(isoDate: string): string {
  return WEEKDAYS[mustParse(isoDate).getUTCDay()];
}

/** Abbreviated month and year, e.g. "Mar 2024" */
export function monthLabel(isoDate: string): string {
  const date = mustParse(isoDate);
  return `${MONTHS[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
}

export function isValidTimeOfDay(value: string): boolean {
  return hourOf(value) !== null && Number(value.slice(3, 5)) < 60;
}

/**
 * Zero-padded hour of an HH:MM string, or null when the value is not one.
 */
export function hourOf(time: string): string | null {
  const match = TIME_OF_DAY.exec(time);
  if (!match) return null;
  return Number(match[1]) < 24 ? match[1] : null;
}

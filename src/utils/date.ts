// Fare timestamps are naive local times at the airport. They are handled as
// UTC instants so arithmetic never shifts with the server's own timezone.

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?)?$/;
const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const monthFormatter = new Intl.DateTimeFormat('en-GB', { month: 'long', timeZone: 'UTC' });

const pad = (value: number, length = 2) => String(value).padStart(length, '0');

/**
 * Parses a naive ISO-8601 timestamp (`YYYY-MM-DD`, `YYYY-MM-DDTHH:MM` or
 * `YYYY-MM-DDTHH:MM:SS`) into a Date whose UTC fields equal the wall-clock
 * fields. Returns undefined for malformed or out-of-range input.
 */
export function parseNaiveTimestamp(value: unknown): Date | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }

  const [year, month, day, hour = 0, minute = 0, second = 0] = match
    .slice(1)
    .filter((part): part is string => part !== undefined)
    .map(Number);

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls over invalid fields (Feb 30 becomes Mar 2), so compare back
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return undefined;
  }

  return date;
}

export function toIsoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function toIsoTimestamp(date: Date): string {
  return `${toIsoDate(date)}T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/** Calendar date (`YYYY-MM-DD`) of a naive timestamp. */
export function calendarDate(value: string): string | undefined {
  const date = parseNaiveTimestamp(value);
  return date ? toIsoDate(date) : undefined;
}

export function isCalendarDate(value: string): boolean {
  return CALENDAR_DATE_PATTERN.test(value) && parseNaiveTimestamp(value) !== undefined;
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * MS_PER_HOUR);
}

export function endOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), 23, 59, 59));
}

export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_HOUR;
}

/**
 * Every calendar day from `start` to `end` inclusive. Empty when `start` is
 * after `end`; undefined when either bound is not a valid `YYYY-MM-DD` date.
 */
export function eachDay(start: string, end: string): string[] | undefined {
  if (!isCalendarDate(start) || !isCalendarDate(end)) {
    return undefined;
  }

  const first = parseNaiveTimestamp(start);
  const last = parseNaiveTimestamp(end);
  if (!first || !last) {
    return undefined;
  }

  const days: string[] = [];
  for (let time = first.getTime(); time <= last.getTime(); time += MS_PER_DAY) {
    days.push(toIsoDate(new Date(time)));
  }
  return days;
}

/**
 * Formats a naive ISO-8601 timestamp as `DD Month YYYY, HH:MM`,
 * e.g. `2025-08-20T19:05:00` becomes `20 August 2025, 19:05`.
 */
export function formatDisplay(value: unknown): string | undefined {
  const date = parseNaiveTimestamp(value);
  if (!date) {
    return undefined;
  }

  return `${pad(date.getUTCDate())} ${monthFormatter.format(date)} ${date.getUTCFullYear()}, ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_TIMESTAMP_DATE = /^(\d{4}-\d{2}-\d{2})T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

/** Timestamp written for "no date" by older task files. */
export const ZERO_TIMESTAMP = "0001-01-01T00:00:00Z";

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Number of days in month (month is 1-indexed) */
function getDaysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/** "YYYY-MM-DD" for a given date */
export function toISODate(year: number, month: number, day: number): string {
  const y = String(year).padStart(4, "0");
  const m = String(month).padStart(2, "0");
  const d = String(day).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Parses a strict `YYYY-MM-DD` calendar date. Returns the normalized string,
 * or null when the text is malformed or names a day that does not exist.
 */
export function parseISODate(text: string): string | null {
  const match = ISO_DATE.exec(text);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > getDaysInMonth(year, month)) return null;

  return toISODate(year, month, day);
}

/**
 * Accepts either a calendar date or an RFC 3339 timestamp and returns its
 * calendar date. The zero timestamp maps to null.
 */
export function parseStoredDate(text: string): string | null {
  if (text === ZERO_TIMESTAMP) return null;
  const stamp = ISO_TIMESTAMP_DATE.exec(text);
  return parseISODate(stamp ? (stamp[1] ?? "") : text);
}

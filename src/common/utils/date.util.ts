import { format, isValid, parse } from "date-fns";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a "YYYY-MM-DD" string into a Date at local midnight.
 *
 * All calendar math in the export works on local calendar days, so the
 * value never goes through UTC. Returns null for malformed strings and for
 * dates that do not exist (e.g. "2023-02-30").
 *
 * @example
 * parseIsoDate("2024-02-29") // Date for 29 Feb 2024, 00:00 local
 * parseIsoDate("2023-02-29") // null
 */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_PATTERN.test(value)) return null;
  const date = parse(value, "yyyy-MM-dd", new Date(0));
  return isValid(date) ? date : null;
}

/**
 * Formats a date as "YYYY-MM-DD" (local calendar day).
 */
export function formatIsoDate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

/** Local-midnight date for a year/month/day triple (month is 1-based) */
export function calendarDate(year: number, month: number, day: number): Date {
  return new Date(year, month - 1, day);
}

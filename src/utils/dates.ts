/**
 * Calendar date helpers.
 *
 * Run dates are local calendar dates in YYYY-MM-DD form; dataset file
 * names use the compact YYYYMMDD form.
 *
 * @module utils/dates
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_HOUR = 60 * 60 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * Format a Date as a local calendar date (YYYY-MM-DD).
 */
export function formatLocalDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Strip separators from a run date: "2026-01-01" → "20260101".
 */
export function compactDate(runDate: string): string {
  return runDate.replace(/-/g, '');
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form.
 *
 * @example
 * isValidRunDate('2026-02-28'); // true
 * isValidRunDate('2026-02-30'); // false
 */
export function isValidRunDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Inclusive list of run dates between two YYYY-MM-DD dates.
 *
 * @throws Error if either date is invalid or start is after end
 */
export function generateDateRange(startDate: string, endDate: string): string[] {
  if (!isValidRunDate(startDate) || !isValidRunDate(endDate)) {
    throw new Error(`Invalid date range: ${startDate} .. ${endDate} (expected YYYY-MM-DD)`);
  }

  const start = Date.parse(`${startDate}T00:00:00Z`);
  const end = Date.parse(`${endDate}T00:00:00Z`);
  if (start > end) {
    throw new Error(`Start date ${startDate} is after end date ${endDate}`);
  }

  const dates: string[] = [];
  for (let ms = start; ms <= end; ms += MS_PER_DAY) {
    dates.push(new Date(ms).toISOString().slice(0, 10));
  }
  return dates;
}

/**
 * Hours between two instants; negative when `to` precedes `from`.
 */
export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_HOUR;
}

/**
 * ISO8601 timestamp `days` before `now`, for search windows.
 */
export function daysBefore(now: Date, days: number): string {
  return new Date(now.getTime() - days * MS_PER_DAY).toISOString();
}

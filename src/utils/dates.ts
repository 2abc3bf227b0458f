/**
 * Date Utilities
 *
 * YNAB dates are plain ISO strings (YYYY-MM-DD) with no time zone, so
 * everything here is string arithmetic; lexical order equals date order.
 */

/**
 * Check if a string is a valid ISO date (YYYY-MM-DD), including the day
 * range of its month.
 */
export function isValidIsoDate(input: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(input)) {
    return false;
  }

  const parts = input.split('-');
  const year = parseInt(parts[0] ?? '0', 10);
  const month = parseInt(parts[1] ?? '0', 10);
  const day = parseInt(parts[2] ?? '0', 10);

  if (month < 1 || month > 12) {
    return false;
  }

  // Day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day >= 1 && day <= daysInMonth;
}

/**
 * The YYYY-MM month key of an ISO date.
 */
export function monthKey(date: string): string {
  return date.slice(0, 7);
}

/**
 * The calendar year of an ISO date.
 */
export function yearOf(date: string): number {
  return parseInt(date.slice(0, 4), 10);
}

/**
 * Every YYYY-MM key from the month of `start` to the month of `end`, inclusive.
 * Empty when `end` precedes `start`.
 */
export function monthsBetween(start: string, end: string): string[] {
  let year = yearOf(start);
  let month = parseInt(start.slice(5, 7), 10);
  const endKey = monthKey(end);
  const keys: string[] = [];

  for (let key = monthKey(start); key <= endKey; ) {
    keys.push(key);
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
    key = `${year}-${String(month).padStart(2, '0')}`;
  }

  return keys;
}

/**
 * Whether `date` falls inside the optional inclusive bounds.
 */
export function isWithinRange(date: string, since?: string, until?: string): boolean {
  if (since !== undefined && date < since) return false;
  if (until !== undefined && date > until) return false;
  return true;
}

/**
 * Time Window Utilities
 *
 * Pure functions to build and query the analysis window.
 * All times are ISO 8601 strings. A window is half-open: [from, to).
 */

export interface TimeWindow {
  readonly from: string;
  readonly to: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class InvalidWindowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidWindowError';
  }
}

/**
 * Window ending one month ago and starting `monthsBack` months before that.
 * Both ends are truncated to UTC midnight so reruns on the same day agree.
 */
export function monthsBackWindow(monthsBack: number, now = new Date()): TimeWindow {
  if (!Number.isInteger(monthsBack) || monthsBack < 1) {
    throw new InvalidWindowError(`monthsBack must be a positive integer, got ${monthsBack}`);
  }
  const from = truncateToDay(addUtcMonths(now, -(monthsBack + 1)));
  const to = truncateToDay(addUtcMonths(now, -1));
  return Object.freeze({ from: from.toISOString(), to: to.toISOString() });
}

/**
 * Explicit window from two dates or timestamps. Throws unless from < to.
 */
export function fixedWindow(from: string, to: string): TimeWindow {
  const start = new Date(from);
  const end = new Date(to);
  if (isNaN(start.getTime()) || isNaN(end.getTime())) {
    throw new InvalidWindowError(`Invalid window bounds: ${from} .. ${to}`);
  }
  if (start.getTime() >= end.getTime()) {
    throw new InvalidWindowError(`Window start must be before end: ${from} .. ${to}`);
  }
  return Object.freeze({ from: start.toISOString(), to: end.toISOString() });
}

/**
 * True when the timestamp falls inside [from, to).
 * Missing or unparseable timestamps are never inside.
 */
export function isWithinWindow(window: TimeWindow, timestamp: string | null | undefined): boolean {
  if (!timestamp) return false;
  const t = new Date(timestamp).getTime();
  if (isNaN(t)) return false;
  return t >= new Date(window.from).getTime() && t < new Date(window.to).getTime();
}

/** True when the timestamp is strictly before the window start. */
export function isBeforeWindow(window: TimeWindow, timestamp: string | null | undefined): boolean {
  if (!timestamp) return false;
  const t = new Date(timestamp).getTime();
  return !isNaN(t) && t < new Date(window.from).getTime();
}

/** YYYY-MM-DD of an ISO timestamp, in UTC. */
export function toDay(timestamp: string): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Last calendar day the window covers, for day-granular server filters.
 * A window ending at midnight does not include that day.
 */
export function lastDayOf(window: TimeWindow): string {
  return toDay(new Date(new Date(window.to).getTime() - 1).toISOString());
}

export function windowLengthDays(window: TimeWindow): number {
  return (new Date(window.to).getTime() - new Date(window.from).getTime()) / DAY_MS;
}

function addUtcMonths(date: Date, months: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setUTCMonth(shifted.getUTCMonth() + months);
  return shifted;
}

function truncateToDay(date: Date): Date {
  return new Date(Math.floor(date.getTime() / DAY_MS) * DAY_MS);
}

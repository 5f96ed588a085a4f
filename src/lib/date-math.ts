/**
 * Date helpers for analytics windows and timelines.
 *
 * `parseDateMath` accepts relative expressions for an analytics "as of"
 * instant:
 *   @today       - midnight UTC of current day
 *   @now         - current instant
 *   @today-7d    - 7 days before midnight UTC
 *   @now-24h     - 24 hours ago
 *
 * Offset units: h (hours), d (days), w (weeks), m (months)
 * Also accepts absolute ISO dates as fallback (e.g., "2026-01-15").
 *
 * All calendar arithmetic is UTC.
 */

import { InvalidRequestError } from "./errors.js";

const DATE_MATH_RE = /^@(today|now)(?:([+-])(\d+)([hdwm]))?$/i;

const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDateMath(expr: string, now: Date = new Date()): Date {
  const match = expr.match(DATE_MATH_RE);

  if (match) {
    const [, anchor, sign, amount, unit] = match;

    let base = anchor.toLowerCase() === "today" ? startOfUtcDay(now) : new Date(now);

    if (sign && amount && unit) {
      const n = parseInt(amount, 10) * (sign === "+" ? 1 : -1);
      switch (unit.toLowerCase()) {
        case "h":
          base = new Date(base.getTime() + n * 60 * 60 * 1000);
          break;
        case "d":
          base = new Date(base.getTime() + n * DAY_MS);
          break;
        case "w":
          base = new Date(base.getTime() + n * 7 * DAY_MS);
          break;
        case "m":
          base = addUtcMonths(base, n);
          break;
      }
    }

    return base;
  }

  const parsed = new Date(expr);
  if (isNaN(parsed.getTime())) {
    throw new InvalidRequestError(
      `Invalid date expression: "${expr}". ` +
        `Use @today-7d, @now-24h, or an ISO date (YYYY-MM-DD).`,
    );
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Calendar arithmetic
// ---------------------------------------------------------------------------

export function startOfUtcDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
}

/**
 * Shift by whole calendar months, clamping the day so Mar 31 - 1 month
 * lands on the last day of February rather than rolling into March.
 */
export function addUtcMonths(date: Date, months: number): Date {
  const result = new Date(date);
  const day = result.getUTCDate();
  result.setUTCDate(1);
  result.setUTCMonth(result.getUTCMonth() + months);
  const lastDay = new Date(
    Date.UTC(result.getUTCFullYear(), result.getUTCMonth() + 1, 0),
  ).getUTCDate();
  result.setUTCDate(Math.min(day, lastDay));
  return result;
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** YYYY-MM-DD of the UTC calendar day. */
export function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Parse YYYY-MM-DD (or a full timestamp) to the UTC start of that day. */
export function parseDay(value: string): Date | undefined {
  const parsed = new Date(value.length === 10 ? `${value}T00:00:00Z` : value);
  return isNaN(parsed.getTime()) ? undefined : startOfUtcDay(parsed);
}

/** Days from start to end, counting both ends: same day is 1. */
export function inclusiveDays(start: Date, end: Date): number {
  return Math.round((startOfUtcDay(end).getTime() - startOfUtcDay(start).getTime()) / DAY_MS) + 1;
}

export function daysBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / DAY_MS;
}

/**
 * @kakeibo/ledger — Calendar helpers.
 *
 * Dates are handled as `YYYY-MM-DD` strings throughout the ledger.
 * Nothing here reads the clock except `localIsoDate()`, which callers
 * use at the edge to turn "now" into a date.
 */

import { isIsoDate } from "@kakeibo/types";
import type { PeriodPrefix } from "@kakeibo/types";
import { ValidationError } from "./types.js";

/**
 * Components of a parsed calendar date.
 */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * Parse a `YYYY-MM-DD` string. Returns undefined for anything that is not
 * a real calendar day.
 */
export function parseIsoDate(value: string): CalendarDate | undefined {
  if (!isIsoDate(value)) {
    return undefined;
  }
  return {
    year: Number(value.slice(0, 4)),
    month: Number(value.slice(5, 7)),
    day: Number(value.slice(8, 10)),
  };
}

/**
 * Sortable `YYYYMMDD` integer; monotonic in calendar order.
 */
export function dayOrdinal(date: CalendarDate): number {
  return date.year * 10000 + date.month * 100 + date.day;
}

/**
 * `YYYY-MM` of a date.
 *
 * @throws ValidationError (INVALID_DATE) for a string that is not a calendar date
 */
export function periodPrefixOf(date: CalendarDate | string): PeriodPrefix {
  const parsed = typeof date === "string" ? parseIsoDate(date) : date;
  if (parsed === undefined) {
    throw new ValidationError("INVALID_DATE", `Invalid date: "${String(date)}"`);
  }
  return `${String(parsed.year).padStart(4, "0")}-${pad2(parsed.month)}`;
}

/**
 * Format a Date as `YYYY-MM-DD` in the process's local time zone.
 */
export function localIsoDate(now: Date = new Date()): string {
  return `${String(now.getFullYear()).padStart(4, "0")}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

export function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger records.
 * The ledger's normalizer uses them to recognise persisted records that
 * need no repair; the HTTP DTOs use `isIsoDate` for request dates.
 */

import type { Account, FixedCostTemplate, IsoDate, Transaction } from "./records.js";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// =============================================================================
// Scalars
// =============================================================================

/**
 * True when the value is a `YYYY-MM-DD` string naming a real calendar day.
 * `2024-02-30` and `2024-13-01` are rejected.
 */
export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== "string") return false;
  const match = ISO_DATE_PATTERN.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;

  return day <= daysInMonth(year, month);
}

/**
 * Number of days in a month (1-based month).
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

/**
 * Proleptic Gregorian leap-year rule; year 0 is a leap year.
 */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function isWholeAmount(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

// =============================================================================
// Records
// =============================================================================

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.name === "string" &&
    isWholeAmount(v.balance)
  );
}

export function isTransaction(value: unknown): value is Transaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.date === "string" &&
    typeof v.account === "string" &&
    isWholeAmount(v.amount) &&
    typeof v.memo === "string"
  );
}

export function isFixedCostTemplate(value: unknown): value is FixedCostTemplate {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.name === "string" &&
    typeof v.account === "string" &&
    isWholeAmount(v.amount) &&
    typeof v.memo === "string" &&
    typeof v.day === "number" &&
    Number.isInteger(v.day) &&
    v.day >= 1 &&
    v.day <= 31
  );
}

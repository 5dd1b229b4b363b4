/**
 * @kakeibo/ledger — Transaction ordering policy.
 *
 * The one order in which transactions are stored and listed:
 * 1. Parsed date ascending
 * 2. Unparsable dates after every parsable one
 * 3. Ties broken by id (code-unit order), never by insertion order
 *
 * The comparator is a strict weak ordering, so sorting is deterministic
 * and sorting an already sorted list leaves it unchanged.
 */

import type { Transaction } from "@kakeibo/types";
import { dayOrdinal, parseIsoDate } from "./calendar.js";

/**
 * Sort key for a date. Unparsable dates map to +Infinity.
 */
function dateKey(date: string): number {
  const parsed = parseIsoDate(date);
  return parsed === undefined ? Number.POSITIVE_INFINITY : dayOrdinal(parsed);
}

/**
 * Compare two transactions. Returns -1, 0, or 1.
 */
export function compareTransactions(a: Transaction, b: Transaction): -1 | 0 | 1 {
  const ka = dateKey(a.date);
  const kb = dateKey(b.date);
  if (ka < kb) return -1;
  if (ka > kb) return 1;

  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Return a new array in canonical order. The input is not modified.
 */
export function sortTransactions(transactions: readonly Transaction[]): Transaction[] {
  return [...transactions].sort(compareTransactions);
}

/**
 * Check whether a list is already in canonical order.
 */
export function isSorted(transactions: readonly Transaction[]): boolean {
  for (let i = 1; i < transactions.length; i++) {
    const prev = transactions[i - 1];
    const curr = transactions[i];
    if (prev !== undefined && curr !== undefined && compareTransactions(prev, curr) > 0) {
      return false;
    }
  }
  return true;
}

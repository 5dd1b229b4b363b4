/**
 * @kakeibo/ledger — Aggregation reporter.
 *
 * Read-only figures for display. Nothing here mutates or persists.
 */

import type { Account, LedgerData, PeriodPrefix, Transaction } from "@kakeibo/types";
import type { PeriodSummary } from "./types.js";

/**
 * Sum of all account balances.
 */
export function totalBalance(accounts: readonly Account[]): number {
  let total = 0;
  for (const account of accounts) {
    total += account.balance;
  }
  return total;
}

/**
 * Sum of positive amounts whose date starts with `periodPrefix`.
 */
export function periodIncome(transactions: readonly Transaction[], periodPrefix: PeriodPrefix): number {
  let total = 0;
  for (const tx of transactions) {
    if (tx.amount > 0 && tx.date.startsWith(periodPrefix)) {
      total += tx.amount;
    }
  }
  return total;
}

/**
 * Spending in the period as a non-negative number
 * (the negated sum of negative amounts).
 */
export function periodExpense(transactions: readonly Transaction[], periodPrefix: PeriodPrefix): number {
  let total = 0;
  for (const tx of transactions) {
    if (tx.amount < 0 && tx.date.startsWith(periodPrefix)) {
      total -= tx.amount;
    }
  }
  return total;
}

/**
 * All display metrics for one period.
 */
export function summarize(data: LedgerData, periodPrefix: PeriodPrefix): PeriodSummary {
  const income = periodIncome(data.transactions, periodPrefix);
  const expense = periodExpense(data.transactions, periodPrefix);
  return {
    period: periodPrefix,
    totalBalance: totalBalance(data.accounts),
    income,
    expense,
    net: income - expense,
  };
}

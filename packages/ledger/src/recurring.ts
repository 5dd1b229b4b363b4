/**
 * @kakeibo/ledger — Recurring-charge applicator.
 *
 * Expands fixed-cost templates into this month's transactions, once each.
 *
 * Per template, in template order:
 * 1. Not yet due (today's day-of-month < template day) → skippedFuture
 * 2. Same date, account, amount and memo already booked → skippedDuplicate
 * 3. No account with that name → skippedNoAccount (nothing is generated)
 * 4. Otherwise book the transaction and apply it to the account → added
 *
 * The duplicate test compares values, not ids, so re-running for the same
 * day books nothing new. "Today" is always passed in; this module never
 * reads the clock.
 */

import type { Account, FixedCostTemplate, LedgerData, Transaction } from "@kakeibo/types";
import { nextBalance } from "./balance.js";
import { pad2, parseIsoDate, periodPrefixOf } from "./calendar.js";
import { sortTransactions } from "./ordering.js";
import type { IdGenerator, RecurringRun } from "./types.js";
import { ValidationError } from "./types.js";

/** Prefix of every generated memo. */
export const FIXED_COST_MEMO_PREFIX = "固定費:";

/**
 * Memo written on a generated transaction: `固定費:<name>` plus
 * ` / <memo>` when the template has a memo.
 */
export function composeFixedCostMemo(template: FixedCostTemplate): string {
  const name = template.name.trim();
  const extra = template.memo.trim();
  return extra === ""
    ? `${FIXED_COST_MEMO_PREFIX}${name}`
    : `${FIXED_COST_MEMO_PREFIX}${name} / ${extra}`;
}

/**
 * Next ledger state plus the run report.
 */
export interface RecurringOutcome {
  readonly accounts: readonly Account[];
  readonly transactions: readonly Transaction[];
  readonly run: RecurringRun;
}

function isDuplicate(
  transactions: readonly Transaction[],
  date: string,
  account: string,
  amount: number,
  memo: string,
): boolean {
  return transactions.some(
    (t) =>
      t.date === date &&
      t.account.trim() === account &&
      t.amount === amount &&
      t.memo.trim() === memo,
  );
}

/**
 * Apply all due templates for the month containing `today`.
 *
 * Pure: returns the next state; the inputs are not modified.
 *
 * @throws ValidationError (INVALID_DATE) if `today` is not a `YYYY-MM-DD` date
 * @throws ValidationError (INVALID_AMOUNT) if a charge would take a balance
 *   out of the safe-integer range; nothing from the run is kept
 */
export function applyRecurringCharges(
  state: LedgerData,
  today: string,
  newId: IdGenerator,
): RecurringOutcome {
  const parsed = parseIsoDate(today);
  if (parsed === undefined) {
    throw new ValidationError("INVALID_DATE", `Invalid date: "${today}"`);
  }

  const monthPrefix = periodPrefixOf(parsed);
  const accounts = [...state.accounts];
  const transactions = [...state.transactions];
  const generated: Transaction[] = [];

  let added = 0;
  let skippedFuture = 0;
  let skippedDuplicate = 0;
  let skippedNoAccount = 0;

  for (const template of state.templates) {
    if (parsed.day < template.day) {
      skippedFuture++;
      continue;
    }

    const date = `${monthPrefix}-${pad2(template.day)}`;
    const account = template.account.trim();
    const memo = composeFixedCostMemo(template);

    if (isDuplicate(transactions, date, account, template.amount, memo)) {
      skippedDuplicate++;
      continue;
    }

    const accountIndex = accounts.findIndex((a) => a.name.trim() === account);
    const target = accounts[accountIndex];
    if (target === undefined) {
      skippedNoAccount++;
      continue;
    }

    accounts[accountIndex] = { ...target, balance: nextBalance(target, template.amount) };

    const tx: Transaction = {
      id: newId("tx"),
      date,
      account,
      amount: template.amount,
      memo,
    };
    transactions.push(tx);
    generated.push(tx);
    added++;
  }

  return {
    accounts,
    transactions: sortTransactions(transactions),
    run: {
      added,
      skippedFuture,
      skippedDuplicate,
      skippedNoAccount,
      generated,
    },
  };
}

/**
 * @kakeibo/ledger — Household ledger consistency engine.
 *
 * Keeps account balances, transactions and fixed-cost templates consistent:
 * - A transaction's amount is applied once when it is added and reversed
 *   once when it is deleted
 * - Transactions are always held in one canonical order (date, then id)
 * - Recurring fixed costs are booked at most once per month each
 * - Legacy data is backfilled on load and written back immediately
 *
 * Design rules:
 * - All records are readonly; mutations replace, never edit
 * - Validation happens before mutation; storage failures leave the
 *   in-memory state at the last persisted state
 * - "Today" is always an explicit input to the engine
 */

// Core store
export { LedgerStore } from "./ledger-store.js";
export type { LedgerStoreOptions, OpenResult } from "./ledger-store.js";

// Identifiers
export { newId } from "./ids.js";

// Calendar
export { parseIsoDate, periodPrefixOf, localIsoDate } from "./calendar.js";
export type { CalendarDate } from "./calendar.js";

// Ordering
export { compareTransactions, sortTransactions, isSorted } from "./ordering.js";

// Normalization
export { normalizeLedgerData, UNNAMED_ACCOUNT } from "./normalizer.js";
export type { RawLedgerData, NormalizeOptions, NormalizeResult } from "./normalizer.js";

// Recurring charges
export {
  applyRecurringCharges,
  composeFixedCostMemo,
  FIXED_COST_MEMO_PREFIX,
} from "./recurring.js";
export type { RecurringOutcome } from "./recurring.js";

// Reporting
export { totalBalance, periodIncome, periodExpense, summarize } from "./reporter.js";

// Types
export type {
  IdGenerator,
  ValidationErrorCode,
  MalformedRecordWarning,
  NewTransaction,
  NewTemplate,
  TransactionFilter,
  RecurringResult,
  RecurringRun,
  PeriodSummary,
} from "./types.js";

export { ValidationError } from "./types.js";

/**
 * @kakeibo/types — Shared record types for the kakeibo ledger.
 *
 * Used across all packages:
 * - Account, Transaction and FixedCostTemplate records
 * - Collection keys for persistence
 * - Runtime guards for untrusted input
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

export type {
  IdKind,
  IsoDate,
  PeriodPrefix,
  Account,
  Transaction,
  FixedCostTemplate,
  CollectionKey,
  LedgerData,
} from "./records.js";

export {
  isIsoDate,
  daysInMonth,
  isLeapYear,
  isAccount,
  isTransaction,
  isFixedCostTemplate,
} from "./guards.js";

/**
 * @kakeibo/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All returned records are readonly
 * - Validation happens before any mutation; a rejected call changes nothing
 * - Balances are integers; no floating-point amounts are accepted
 */

import type { CollectionKey, IdKind, PeriodPrefix, Transaction } from "@kakeibo/types";

// ─── Identifiers ─────────────────────────────────────────────────────────

/**
 * Produces a fresh identifier for the given record kind.
 */
export type IdGenerator = (kind: IdKind) => string;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for rejected ledger input. */
export type ValidationErrorCode =
  | "EMPTY_NAME"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_AMOUNT"
  | "INVALID_DAY"
  | "INVALID_DATE";

/**
 * Thrown when caller input fails a precondition.
 * Always thrown before the ledger is touched.
 */
export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

// ─── Normalization ───────────────────────────────────────────────────────

/**
 * Non-fatal report about a loaded record that had to be repaired,
 * or that carries a date the ordering policy cannot parse.
 */
export interface MalformedRecordWarning {
  readonly collection: CollectionKey;
  /** Position of the record in the loaded document */
  readonly index: number;
  /** Affected field, or `"record"` when the entry was dropped entirely */
  readonly field: string;
  readonly reason: "missing" | "coerced" | "unparsable-date" | "not-an-object";
}

// ─── Operation Inputs ────────────────────────────────────────────────────

/**
 * Input for recording a transaction by hand.
 */
export interface NewTransaction {
  readonly date: string;
  readonly account: string;
  readonly amount: number;
  readonly memo?: string | undefined;
}

/**
 * Input for creating a fixed-cost template.
 */
export interface NewTemplate {
  readonly name: string;
  readonly account: string;
  readonly amount: number;
  readonly memo?: string | undefined;
  readonly day: number;
}

/**
 * Filter criteria for listing transactions.
 */
export interface TransactionFilter {
  /** Keep only dates starting with this prefix (e.g. `2024-05`) */
  readonly period?: PeriodPrefix | undefined;
  /** Keep only transactions booked against this account name */
  readonly account?: string | undefined;
}

// ─── Recurring Charges ───────────────────────────────────────────────────

/**
 * Outcome counts of one recurring-charge run.
 */
export interface RecurringResult {
  readonly added: number;
  readonly skippedFuture: number;
  readonly skippedDuplicate: number;
  readonly skippedNoAccount: number;
}

/**
 * Counts plus the transactions that were generated.
 */
export interface RecurringRun extends RecurringResult {
  readonly generated: readonly Transaction[];
}

// ─── Reporting ───────────────────────────────────────────────────────────

/**
 * Display metrics for one monthly period.
 */
export interface PeriodSummary {
  readonly period: PeriodPrefix;
  readonly totalBalance: number;
  readonly income: number;
  readonly expense: number;
  /** income - expense */
  readonly net: number;
}

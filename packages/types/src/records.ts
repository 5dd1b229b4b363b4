/**
 * Ledger Records
 *
 * The three persisted record shapes of the household ledger.
 *
 * Rules:
 * - Amounts are integers in the smallest currency unit (no fractions)
 * - Transactions and templates reference accounts by NAME, not id
 * - Records are readonly; the ledger store replaces them, never edits them
 */

/**
 * Prefix tag carried by every generated identifier.
 * `acc` = account, `tx` = transaction, `fc` = fixed-cost template.
 */
export type IdKind = "acc" | "tx" | "fc";

/**
 * Calendar date as `YYYY-MM-DD`.
 * Legacy data may hold anything in this position; see `isIsoDate`.
 */
export type IsoDate = string;

/**
 * Year-month prefix (`YYYY-MM`) used to select a monthly period.
 */
export type PeriodPrefix = string;

/**
 * A bank account, wallet or cash pocket with a running balance.
 */
export interface Account {
  /** Unique account identifier (`acc_…`) */
  readonly id: string;

  /** Display name. Transactions and templates point here by this value. */
  readonly name: string;

  /** Current balance, signed integer */
  readonly balance: number;
}

/**
 * A single income (+) or expense (-) line.
 */
export interface Transaction {
  /** Unique transaction identifier (`tx_…`) */
  readonly id: string;

  /** Booking date, `YYYY-MM-DD` when well-formed */
  readonly date: IsoDate;

  /** Name of the account this was booked against at creation time */
  readonly account: string;

  /** Signed amount: positive = income, negative = expense */
  readonly amount: number;

  /** Free text, empty when not given */
  readonly memo: string;
}

/**
 * A monthly recurring charge or credit ("fixed cost").
 * Holds no balance state; it is a pattern for generating transactions.
 */
export interface FixedCostTemplate {
  /** Unique template identifier (`fc_…`) */
  readonly id: string;

  /** Label, used in the generated transaction memo */
  readonly name: string;

  /** Name of the account to book against */
  readonly account: string;

  /** Signed amount of each generated transaction */
  readonly amount: number;

  /** Optional extra memo, appended to the generated memo */
  readonly memo: string;

  /** Day of month (1–31) from which the charge becomes due */
  readonly day: number;
}

/**
 * Persisted collection names.
 */
export type CollectionKey = "accounts" | "transactions" | "fixed_costs";

/**
 * The three collections together.
 */
export interface LedgerData {
  readonly accounts: readonly Account[];
  readonly transactions: readonly Transaction[];
  readonly templates: readonly FixedCostTemplate[];
}

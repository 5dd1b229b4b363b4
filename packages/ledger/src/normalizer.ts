/**
 * @kakeibo/ledger — Migration/backfill normalizer.
 *
 * Turns whatever was loaded from storage into well-typed records:
 * - Missing ids are generated; duplicated ids are replaced
 * - Missing fields get their defaults (balance 0, day 1, memo "", …)
 * - Numeric strings and fractional numbers are coerced to integers
 * - Non-object entries are dropped
 * - Records that already pass the @kakeibo/types guards are copied as-is
 *
 * `changed` reports whether anything was repaired, so the caller can
 * persist immediately and ids become stable before anything refers to them.
 * Unparsable transaction dates are reported but left untouched; the
 * ordering policy sorts them last.
 */

import type {
  Account,
  CollectionKey,
  FixedCostTemplate,
  IdKind,
  LedgerData,
  Transaction,
} from "@kakeibo/types";
import { isAccount, isFixedCostTemplate, isIsoDate, isTransaction } from "@kakeibo/types";
import type { IdGenerator, MalformedRecordWarning } from "./types.js";

/** Name given to an account that was stored without one. */
export const UNNAMED_ACCOUNT = "(unnamed)";

/**
 * Collections as loaded, before any shape checks.
 */
export interface RawLedgerData {
  readonly accounts: readonly unknown[];
  readonly transactions: readonly unknown[];
  readonly templates: readonly unknown[];
}

export interface NormalizeOptions {
  readonly newId: IdGenerator;
  /** `YYYY-MM-DD` used for transactions stored without a date */
  readonly today: string;
}

export interface NormalizeResult {
  readonly data: LedgerData;
  /** True iff any field was defaulted or coerced, or an entry dropped */
  readonly changed: boolean;
  readonly warnings: readonly MalformedRecordWarning[];
}

const INTEGER_STRING = /^\s*-?\d+\s*$/;

/**
 * Reads fields of one loaded record, recording every repair.
 */
class FieldReader {
  constructor(
    private readonly _record: Readonly<Record<string, unknown>>,
    private readonly _collection: CollectionKey,
    private readonly _index: number,
    private readonly _warnings: MalformedRecordWarning[],
  ) {}

  string(field: string, fallback: string): string {
    const value = this._record[field];
    if (value === undefined || value === null) {
      this._warn(field, "missing");
      return fallback;
    }
    if (typeof value === "string") {
      return value;
    }
    this._warn(field, "coerced");
    return typeof value === "number" || typeof value === "boolean" ? String(value) : fallback;
  }

  integer(field: string, fallback: number): number {
    const value = this._record[field];
    if (value === undefined || value === null) {
      this._warn(field, "missing");
      return fallback;
    }
    if (typeof value === "number" && Number.isSafeInteger(value)) {
      return value;
    }
    this._warn(field, "coerced");
    if (typeof value === "number" && Number.isFinite(value)) {
      const truncated = Math.trunc(value);
      return Number.isSafeInteger(truncated) ? truncated : fallback;
    }
    if (typeof value === "string" && INTEGER_STRING.test(value)) {
      const parsed = Number(value.trim());
      return Number.isSafeInteger(parsed) ? parsed : fallback;
    }
    return fallback;
  }

  id(kind: IdKind, seen: Set<string>, newId: IdGenerator): string {
    const value = this._record["id"];
    if (typeof value === "string" && value.length > 0 && !seen.has(value)) {
      seen.add(value);
      return value;
    }
    this._warn("id", value === undefined || value === null || value === "" ? "missing" : "coerced");
    const fresh = newId(kind);
    seen.add(fresh);
    return fresh;
  }

  note(field: string, reason: WarningReason): void {
    this._warn(field, reason);
  }

  private _warn(field: string, reason: WarningReason): void {
    this._warnings.push({
      collection: this._collection,
      index: this._index,
      field,
      reason,
    });
  }
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * How one collection's records are checked and rebuilt.
 */
interface CollectionShape<T extends { readonly id: string }> {
  /** Record already in its stored shape */
  readonly isWellFormed: (value: unknown) => value is T;
  /** Copy of a well-formed record without unknown fields */
  readonly copy: (record: T) => T;
  /** Build a record field by field, recording repairs */
  readonly build: (reader: FieldReader) => T;
  /** Report problems that are kept rather than repaired */
  readonly inspect?: (record: T, warn: (field: string, reason: WarningReason) => void) => void;
}

type WarningReason = MalformedRecordWarning["reason"];

/**
 * Walk one collection, dropping non-objects. Well-formed records with an
 * unseen id are copied as-is; the rest go through the field reader.
 */
function normalizeCollection<T extends { readonly id: string }>(
  items: readonly unknown[],
  collection: CollectionKey,
  warnings: MalformedRecordWarning[],
  seen: Set<string>,
  shape: CollectionShape<T>,
): T[] {
  const out: T[] = [];
  items.forEach((item, index) => {
    if (!isRecord(item)) {
      warnings.push({ collection, index, field: "record", reason: "not-an-object" });
      return;
    }
    let record: T;
    if (shape.isWellFormed(item) && !seen.has(item.id)) {
      seen.add(item.id);
      record = shape.copy(item);
    } else {
      record = shape.build(new FieldReader(item, collection, index, warnings));
    }
    shape.inspect?.(record, (field, reason) => {
      warnings.push({ collection, index, field, reason });
    });
    out.push(record);
  });
  return out;
}

/**
 * Normalize loaded collections into typed ledger data.
 */
export function normalizeLedgerData(
  raw: RawLedgerData,
  options: NormalizeOptions,
): NormalizeResult {
  const { newId, today } = options;
  const warnings: MalformedRecordWarning[] = [];
  const seen = new Set<string>();

  const accounts = normalizeCollection<Account>(raw.accounts, "accounts", warnings, seen, {
    isWellFormed: isAccount,
    copy: ({ id, name, balance }) => ({ id, name, balance }),
    build: (r) => ({
      id: r.id("acc", seen, newId),
      name: r.string("name", UNNAMED_ACCOUNT),
      balance: r.integer("balance", 0),
    }),
  });

  const transactions = normalizeCollection<Transaction>(
    raw.transactions,
    "transactions",
    warnings,
    seen,
    {
      isWellFormed: isTransaction,
      copy: ({ id, date, account, amount, memo }) => ({ id, date, account, amount, memo }),
      build: (r) => ({
        id: r.id("tx", seen, newId),
        date: r.string("date", today),
        account: r.string("account", ""),
        amount: r.integer("amount", 0),
        memo: r.string("memo", ""),
      }),
      inspect: (tx, warn) => {
        if (!isIsoDate(tx.date)) {
          warn("date", "unparsable-date");
        }
      },
    },
  );

  const templates = normalizeCollection<FixedCostTemplate>(
    raw.templates,
    "fixed_costs",
    warnings,
    seen,
    {
      isWellFormed: isFixedCostTemplate,
      copy: ({ id, name, account, amount, memo, day }) => ({ id, name, account, amount, memo, day }),
      build: (r) => {
        const id = r.id("fc", seen, newId);
        const name = r.string("name", "");
        const account = r.string("account", "");
        const amount = r.integer("amount", 0);
        const memo = r.string("memo", "");
        let day = r.integer("day", 1);
        if (day < 1 || day > 31) {
          r.note("day", "coerced");
          day = Math.min(31, Math.max(1, day));
        }
        return { id, name, account, amount, memo, day };
      },
    },
  );

  return {
    data: { accounts, transactions, templates },
    // Unparsable dates are kept as stored, so they alone require no rewrite.
    changed: warnings.some((w) => w.reason !== "unparsable-date"),
    warnings,
  };
}

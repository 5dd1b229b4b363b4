/**
 * @kakeibo/ledger — Ledger store.
 *
 * The in-memory owner of accounts, transactions and fixed-cost templates,
 * and the only place they are mutated.
 *
 * API surface:
 * - open() — Load, normalize and (if needed) rewrite persisted data
 * - addAccount() / deleteAccount()
 * - addTemplate() / deleteTemplate()
 * - addTransaction() / deleteTransaction()
 * - applyRecurringCharges() — Book this month's due fixed costs
 * - list and get queries, summarize(), snapshot()
 *
 * Every mutation builds the next state from copies, saves it through the
 * gateway, and only then swaps it in. If a save fails the store keeps the
 * last persisted state, and collections already written in that commit
 * are rewritten with their previous contents.
 *
 * Invariant after every completed call: each account's balance equals its
 * opening balance plus the amounts of the transactions that were applied
 * to it and not yet reversed.
 */

import type {
  Account,
  CollectionKey,
  FixedCostTemplate,
  LedgerData,
  PeriodPrefix,
  Transaction,
} from "@kakeibo/types";
import type { PersistenceGateway } from "@kakeibo/store";
import { PersistenceError } from "@kakeibo/store";
import { localIsoDate } from "./calendar.js";
import { nextBalance } from "./balance.js";
import { newId as defaultNewId } from "./ids.js";
import { normalizeLedgerData } from "./normalizer.js";
import { sortTransactions } from "./ordering.js";
import { applyRecurringCharges } from "./recurring.js";
import { summarize } from "./reporter.js";
import type {
  IdGenerator,
  MalformedRecordWarning,
  NewTemplate,
  NewTransaction,
  PeriodSummary,
  RecurringRun,
  TransactionFilter,
} from "./types.js";
import { ValidationError } from "./types.js";

// ─── Options ─────────────────────────────────────────────────────────────

export interface LedgerStoreOptions {
  /** Identifier source. Default: 96-bit random ids */
  readonly newId?: IdGenerator | undefined;
  /** Today's `YYYY-MM-DD`, used to backfill undated transactions on open */
  readonly today?: (() => string) | undefined;
}

export interface OpenResult {
  readonly store: LedgerStore;
  readonly warnings: readonly MalformedRecordWarning[];
  /** True when loaded data was repaired and written back */
  readonly migrated: boolean;
}

type CommitStep = readonly [CollectionKey, readonly unknown[]];

// ─── Validation ──────────────────────────────────────────────────────────

function requireName(value: string, what: string): string {
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new ValidationError("EMPTY_NAME", `${what} name must not be empty`);
  }
  return trimmed;
}

function requireAmount(value: number, what: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `${what} must be a whole number, got ${String(value)}`,
    );
  }
  return value;
}

function requireDay(value: number): number {
  if (!Number.isInteger(value) || value < 1 || value > 31) {
    throw new ValidationError(
      "INVALID_DAY",
      `Day of month must be an integer from 1 to 31, got ${String(value)}`,
    );
  }
  return value;
}

// ─── Store ───────────────────────────────────────────────────────────────

export class LedgerStore {
  private _accounts: readonly Account[];
  private _transactions: readonly Transaction[];
  private _templates: readonly FixedCostTemplate[];

  private readonly _gateway: PersistenceGateway;
  private readonly _newId: IdGenerator;

  /**
   * Wrap already-normalized data. Nothing is persisted until the first
   * mutation; use `LedgerStore.open()` to load from the gateway.
   */
  constructor(gateway: PersistenceGateway, data: LedgerData, options?: LedgerStoreOptions) {
    this._gateway = gateway;
    this._newId = options?.newId ?? defaultNewId;
    this._accounts = [...data.accounts];
    this._transactions = sortTransactions(data.transactions);
    this._templates = [...data.templates];
  }

  /**
   * Load all three collections, backfill missing fields and ids, and write
   * the repaired collections back before returning.
   *
   * @throws PersistenceError if storage cannot be read or the rewrite fails
   */
  static open(gateway: PersistenceGateway, options?: LedgerStoreOptions): OpenResult {
    const newId = options?.newId ?? defaultNewId;
    const today = options?.today ?? (() => localIsoDate());

    const { data, changed, warnings } = normalizeLedgerData(
      {
        accounts: gateway.load("accounts", []),
        transactions: gateway.load("transactions", []),
        templates: gateway.load("fixed_costs", []),
      },
      { newId, today: today() },
    );

    const store = new LedgerStore(gateway, data, { newId });

    if (changed) {
      gateway.save("accounts", store._accounts);
      gateway.save("transactions", store._transactions);
      gateway.save("fixed_costs", store._templates);
    }

    return { store, warnings, migrated: changed };
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  /**
   * Open a new account. Names are not checked for uniqueness; lookups by
   * name use the first match.
   */
  addAccount(name: string, openingBalance = 0): Account {
    const account: Account = {
      id: this._newId("acc"),
      name: requireName(name, "Account"),
      balance: requireAmount(openingBalance, "Opening balance"),
    };

    const accounts = [...this._accounts, account];
    this._commit([["accounts", accounts]]);
    this._accounts = accounts;
    return account;
  }

  /**
   * Remove an account. Transactions that reference it stay as they are.
   * Returns the removed account, or undefined when there was none.
   */
  deleteAccount(id: string): Account | undefined {
    const removed = this._accounts.find((a) => a.id === id);
    if (removed === undefined) {
      return undefined;
    }

    const accounts = this._accounts.filter((a) => a.id !== id);
    this._commit([["accounts", accounts]]);
    this._accounts = accounts;
    return removed;
  }

  // ─── Templates ───────────────────────────────────────────────────────

  /**
   * Create a fixed-cost template. The referenced account must exist now.
   */
  addTemplate(input: NewTemplate): FixedCostTemplate {
    const name = requireName(input.name, "Fixed cost");
    const account = input.account.trim();
    if (!this._accounts.some((a) => a.name.trim() === account)) {
      throw new ValidationError("UNKNOWN_ACCOUNT", `Unknown account: "${account}"`);
    }

    const template: FixedCostTemplate = {
      id: this._newId("fc"),
      name,
      account,
      amount: requireAmount(input.amount, "Amount"),
      memo: (input.memo ?? "").trim(),
      day: requireDay(input.day),
    };

    const templates = [...this._templates, template];
    this._commit([["fixed_costs", templates]]);
    this._templates = templates;
    return template;
  }

  /**
   * Remove a template. Transactions it generated are kept.
   */
  deleteTemplate(id: string): FixedCostTemplate | undefined {
    const removed = this._templates.find((t) => t.id === id);
    if (removed === undefined) {
      return undefined;
    }

    const templates = this._templates.filter((t) => t.id !== id);
    this._commit([["fixed_costs", templates]]);
    this._templates = templates;
    return removed;
  }

  // ─── Transactions ────────────────────────────────────────────────────

  /**
   * Record a transaction and apply it to the first account whose name
   * equals `input.account`. With no such account the transaction is still
   * recorded and no balance changes.
   */
  addTransaction(input: NewTransaction): Transaction {
    const tx: Transaction = {
      id: this._newId("tx"),
      date: input.date,
      account: input.account,
      amount: requireAmount(input.amount, "Amount"),
      memo: (input.memo ?? "").trim(),
    };

    const accounts = this._adjustBalance(tx.account, tx.amount);
    const transactions = sortTransactions([...this._transactions, tx]);

    this._commit([
      ["accounts", accounts],
      ["transactions", transactions],
    ]);
    this._accounts = accounts;
    this._transactions = transactions;
    return tx;
  }

  /**
   * Remove a transaction, reversing its amount on the first account whose
   * name equals the transaction's account.
   */
  deleteTransaction(id: string): Transaction | undefined {
    const removed = this._transactions.find((t) => t.id === id);
    if (removed === undefined) {
      return undefined;
    }

    const accounts = this._adjustBalance(removed.account, -removed.amount);
    const transactions = this._transactions.filter((t) => t.id !== id);

    this._commit([
      ["accounts", accounts],
      ["transactions", transactions],
    ]);
    this._accounts = accounts;
    this._transactions = transactions;
    return removed;
  }

  // ─── Recurring Charges ───────────────────────────────────────────────

  /**
   * Book every due fixed cost for the month of `today` that is not booked
   * yet. Safe to call repeatedly.
   *
   * @throws ValidationError (INVALID_DATE) if `today` is not a `YYYY-MM-DD` date
   */
  applyRecurringCharges(today: string): RecurringRun {
    const outcome = applyRecurringCharges(this.snapshot(), today, this._newId);

    this._commit([
      ["transactions", outcome.transactions],
      ["accounts", outcome.accounts],
    ]);
    this._accounts = outcome.accounts;
    this._transactions = outcome.transactions;
    return outcome.run;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  listAccounts(): readonly Account[] {
    return this._accounts;
  }

  getAccount(id: string): Account | undefined {
    return this._accounts.find((a) => a.id === id);
  }

  /**
   * First account with exactly this name.
   */
  findAccountByName(name: string): Account | undefined {
    return this._accounts.find((a) => a.name === name);
  }

  /**
   * Transactions in canonical order, optionally filtered.
   */
  listTransactions(filter?: TransactionFilter): readonly Transaction[] {
    if (filter === undefined) {
      return this._transactions;
    }

    return this._transactions.filter((tx) => {
      if (filter.period !== undefined && !tx.date.startsWith(filter.period)) {
        return false;
      }
      if (filter.account !== undefined && tx.account !== filter.account) {
        return false;
      }
      return true;
    });
  }

  getTransaction(id: string): Transaction | undefined {
    return this._transactions.find((t) => t.id === id);
  }

  listTemplates(): readonly FixedCostTemplate[] {
    return this._templates;
  }

  getTemplate(id: string): FixedCostTemplate | undefined {
    return this._templates.find((t) => t.id === id);
  }

  /**
   * Total balance and the period's income and expense.
   */
  summarize(periodPrefix: PeriodPrefix): PeriodSummary {
    return summarize(this.snapshot(), periodPrefix);
  }

  /**
   * The current collections. Records are immutable, so no deep copy is made.
   */
  snapshot(): LedgerData {
    return {
      accounts: this._accounts,
      transactions: this._transactions,
      templates: this._templates,
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Accounts with `delta` applied to the first exact name match.
   * Returns the current array unchanged when nothing matches.
   *
   * @throws ValidationError (INVALID_AMOUNT) if the balance would leave the safe-integer range
   */
  private _adjustBalance(name: string, delta: number): readonly Account[] {
    const index = this._accounts.findIndex((a) => a.name === name);
    const target = this._accounts[index];
    if (target === undefined) {
      return this._accounts;
    }

    const accounts = [...this._accounts];
    accounts[index] = { ...target, balance: nextBalance(target, delta) };
    return accounts;
  }

  private _persisted(key: CollectionKey): readonly unknown[] {
    switch (key) {
      case "accounts":
        return this._accounts;
      case "transactions":
        return this._transactions;
      case "fixed_costs":
        return this._templates;
    }
  }

  /**
   * Save each step in order. On failure, rewrite the collections already
   * saved in this commit with their in-memory (last persisted) contents,
   * then rethrow.
   */
  private _commit(steps: readonly CommitStep[]): void {
    const written: CollectionKey[] = [];

    try {
      for (const [key, records] of steps) {
        this._gateway.save(key, records);
        written.push(key);
      }
    } catch (err) {
      const rollbackFailures: CollectionKey[] = [];
      for (const key of written) {
        try {
          this._gateway.save(key, this._persisted(key));
        } catch {
          rollbackFailures.push(key);
        }
      }

      if (rollbackFailures.length > 0 && err instanceof PersistenceError) {
        throw new PersistenceError(
          err.code,
          `${err.message} (restoring ${rollbackFailures.join(", ")} also failed)`,
          err.collection,
          err,
        );
      }
      throw err;
    }
  }
}

/**
 * LedgerService — Composition root for the ledger engine.
 *
 * Route handlers delegate to this service; they never touch the store or
 * the gateway directly. The service supplies "today" from its clock,
 * turns deletes into `{ id, deleted }` results, and logs what the engine
 * reports (repairs on open, recurring runs, storage failures).
 */

import type { Logger } from "pino";
import type {
  Account,
  FixedCostTemplate,
  PeriodPrefix,
  Transaction,
} from "@kakeibo/types";
import { LedgerStore, localIsoDate, periodPrefixOf } from "@kakeibo/ledger";
import type {
  IdGenerator,
  MalformedRecordWarning,
  OpenResult,
  PeriodSummary,
  RecurringRun,
  TransactionFilter,
} from "@kakeibo/ledger";
import { PersistenceError } from "@kakeibo/store";
import type { PersistenceGateway } from "@kakeibo/store";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Source of the current local date.
 */
export interface Clock {
  /** Today as `YYYY-MM-DD` */
  today(): string;
}

export const systemClock: Clock = {
  today: () => localIsoDate(),
};

export interface LedgerServiceConfig {
  readonly gateway: PersistenceGateway;
  readonly logger: Logger;
  readonly clock?: Clock | undefined;
  readonly newId?: IdGenerator | undefined;
}

export interface DeleteResult {
  readonly id: string;
  readonly deleted: boolean;
}

export interface CreateTransactionInput {
  /** Defaults to the clock's today */
  readonly date?: string | undefined;
  readonly account: string;
  readonly amount: number;
  readonly memo?: string | undefined;
}

export interface CreateTemplateInput {
  readonly name: string;
  readonly account: string;
  readonly amount: number;
  readonly memo?: string | undefined;
  readonly day: number;
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  private readonly _store: LedgerStore;
  private readonly _logger: Logger;
  private readonly _clock: Clock;

  private constructor(store: LedgerStore, logger: Logger, clock: Clock) {
    this._store = store;
    this._logger = logger;
    this._clock = clock;
  }

  /**
   * Load the ledger through the gateway, repairing legacy data on the way.
   *
   * @throws PersistenceError if storage cannot be read or the repair cannot be saved
   */
  static open(config: LedgerServiceConfig): LedgerService {
    const clock = config.clock ?? systemClock;
    const logger = config.logger;

    let opened: OpenResult;
    try {
      opened = LedgerStore.open(config.gateway, {
        newId: config.newId,
        today: () => clock.today(),
      });
    } catch (err) {
      logStorageFailure(logger, err, "open");
      throw err;
    }

    if (opened.warnings.length > 0) {
      logger.warn(
        { count: opened.warnings.length, warnings: summarizeWarnings(opened.warnings) },
        "Repaired malformed ledger records",
      );
    }
    if (opened.migrated) {
      logger.info("Rewrote ledger data with backfilled fields");
    }

    return new LedgerService(opened.store, logger, clock);
  }

  today(): string {
    return this._clock.today();
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  listAccounts(): readonly Account[] {
    return this._store.listAccounts();
  }

  addAccount(name: string, balance?: number): Account {
    return this._mutate("addAccount", () => this._store.addAccount(name, balance));
  }

  deleteAccount(id: string): DeleteResult {
    const removed = this._mutate("deleteAccount", () => this._store.deleteAccount(id));
    return { id, deleted: removed !== undefined };
  }

  // ─── Transactions ──────────────────────────────────────────────────

  listTransactions(filter?: TransactionFilter): readonly Transaction[] {
    return this._store.listTransactions(filter);
  }

  addTransaction(input: CreateTransactionInput): Transaction {
    return this._mutate("addTransaction", () =>
      this._store.addTransaction({
        date: input.date ?? this._clock.today(),
        account: input.account,
        amount: input.amount,
        memo: input.memo,
      }),
    );
  }

  deleteTransaction(id: string): DeleteResult {
    const removed = this._mutate("deleteTransaction", () => this._store.deleteTransaction(id));
    return { id, deleted: removed !== undefined };
  }

  // ─── Fixed Costs ───────────────────────────────────────────────────

  listTemplates(): readonly FixedCostTemplate[] {
    return this._store.listTemplates();
  }

  addTemplate(input: CreateTemplateInput): FixedCostTemplate {
    return this._mutate("addTemplate", () => this._store.addTemplate(input));
  }

  deleteTemplate(id: string): DeleteResult {
    const removed = this._mutate("deleteTemplate", () => this._store.deleteTemplate(id));
    return { id, deleted: removed !== undefined };
  }

  /**
   * Book the month's due fixed costs as of `date` (default: today).
   */
  applyRecurringCharges(date?: string): RecurringRun {
    const today = date ?? this._clock.today();
    const run = this._mutate("applyRecurringCharges", () =>
      this._store.applyRecurringCharges(today),
    );

    this._logger.info(
      {
        date: today,
        added: run.added,
        skippedFuture: run.skippedFuture,
        skippedDuplicate: run.skippedDuplicate,
        skippedNoAccount: run.skippedNoAccount,
      },
      "Applied fixed costs",
    );
    return run;
  }

  // ─── Reporting ─────────────────────────────────────────────────────

  /**
   * Totals for a `YYYY-MM` period (default: the current month).
   */
  summarize(period?: PeriodPrefix): PeriodSummary {
    return this._store.summarize(period ?? periodPrefixOf(this._clock.today()));
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _mutate<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      logStorageFailure(this._logger, err, operation);
      throw err;
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function logStorageFailure(logger: Logger, err: unknown, operation: string): void {
  if (err instanceof PersistenceError) {
    logger.error(
      { err, code: err.code, collection: err.collection, operation },
      "Ledger storage failure",
    );
  }
}

/**
 * Count warnings per collection and reason, e.g. `{ "transactions.missing": 3 }`.
 */
function summarizeWarnings(
  warnings: readonly MalformedRecordWarning[],
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const w of warnings) {
    const key = `${w.collection}.${w.reason}`;
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

/**
 * Shared fixtures for @kakeibo/ledger tests.
 */

import type { Account, FixedCostTemplate, Transaction } from "@kakeibo/types";
import type { IdGenerator } from "../src/types.js";

/**
 * Deterministic ids: `acc_0001`, `tx_0002`, … (one counter for all kinds).
 */
export function sequentialIds(): IdGenerator {
  let n = 0;
  return (kind) => {
    n++;
    return `${kind}_${String(n).padStart(4, "0")}`;
  };
}

export function account(id: string, name: string, balance: number): Account {
  return { id, name, balance };
}

export function tx(
  id: string,
  date: string,
  accountName: string,
  amount: number,
  memo = "",
): Transaction {
  return { id, date, account: accountName, amount, memo };
}

export function template(
  id: string,
  fields: Partial<Omit<FixedCostTemplate, "id">>,
): FixedCostTemplate {
  return {
    id,
    name: fields.name ?? "Rent",
    account: fields.account ?? "Bank",
    amount: fields.amount ?? -5000,
    memo: fields.memo ?? "",
    day: fields.day ?? 1,
  };
}

/**
 * @kakeibo/ledger — Balance arithmetic.
 */

import type { Account } from "@kakeibo/types";
import { ValidationError } from "./types.js";

/**
 * `account.balance + delta`, refused when the sum is not a safe integer.
 * Such a balance would be stored with lost precision and later reset to 0
 * by the normalizer.
 */
export function nextBalance(account: Account, delta: number): number {
  const balance = account.balance + delta;
  if (!Number.isSafeInteger(balance)) {
    throw new ValidationError(
      "INVALID_AMOUNT",
      `Balance of "${account.name}" would exceed the supported range`,
    );
  }
  return balance;
}

/**
 * @kakeibo/ledger — Identifier generation.
 *
 * `<kind>_<24 hex chars>`, 96 bits from the system CSPRNG.
 */

import { randomBytes } from "node:crypto";
import type { IdKind } from "@kakeibo/types";

const ID_BYTES = 12;

export function newId(kind: IdKind): string {
  return `${kind}_${randomBytes(ID_BYTES).toString("hex")}`;
}

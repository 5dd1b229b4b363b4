/**
 * Global error handler.
 *
 * Catches every error thrown by route handlers and produces a consistent
 * error envelope. Ledger validation codes and storage failures map to
 * fixed statuses; anything else is a 500 with a generic message and is
 * logged.
 */

import type { Context } from "hono";
import type { Logger } from "pino";
import { ValidationError } from "@kakeibo/ledger";
import type { ValidationErrorCode } from "@kakeibo/ledger";
import { PersistenceError } from "@kakeibo/store";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 422 | 500 | 503;

const STATUS_MAP: Record<ValidationErrorCode, ErrorStatus> = {
  EMPTY_NAME: 400,
  INVALID_AMOUNT: 400,
  INVALID_DAY: 400,
  INVALID_DATE: 400,
  UNKNOWN_ACCOUNT: 422,
};

const STORAGE_STATUS: ErrorStatus = 503;

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered as Hono's onError.
 */
export function createErrorHandler(
  logger?: Logger,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof ValidationError) {
      return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
    }

    if (err instanceof PersistenceError) {
      // Storage failures are logged where they happen (LedgerService).
      return c.json(
        createErrorEnvelope(err.code, "Ledger storage is unavailable", {
          collection: err.collection,
        }),
        STORAGE_STATUS,
      );
    }

    logger?.error(
      { err, method: c.req.method, path: c.req.path },
      "Unhandled error",
    );
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

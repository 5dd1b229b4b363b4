/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LedgerService } from "../services/ledger-service.js";

/**
 * Hono environment type for the ledger API.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service (set for every /api/* request) */
    ledger: LedgerService;
  };
}

/**
 * Environment contributed by `validateBody()`: the parsed request body.
 */
export interface ValidatedBodyEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

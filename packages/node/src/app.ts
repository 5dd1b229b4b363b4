/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { LedgerService } from "./services/ledger-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createFixedCostRoutes } from "./routes/fixed-costs.js";
import { createSummaryRoutes } from "./routes/summary.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly ledger: LedgerService;
  /** Receives one entry per request. No request logging when omitted. */
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Logger for unhandled errors */
  readonly logger?: Logger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly ledger: LedgerService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { ledger } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(ledger));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("ledger", ledger);
    await next();
  });

  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/fixed-costs", createFixedCostRoutes());
  app.route("/api/v1/summary", createSummaryRoutes());

  return { app, ledger };
}

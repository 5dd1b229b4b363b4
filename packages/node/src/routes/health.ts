/**
 * Health check route.
 *
 * GET /health — Liveness probe with record counts
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

export function createHealthRoutes(ledger: LedgerService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      accounts: ledger.listAccounts().length,
      transactions: ledger.listTransactions().length,
      fixedCosts: ledger.listTemplates().length,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}

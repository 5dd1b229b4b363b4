/**
 * Transaction routes.
 *
 * GET    /api/v1/transactions      — List in canonical order (?period=YYYY-MM, ?account=)
 * POST   /api/v1/transactions      — Record a transaction (date defaults to today)
 * DELETE /api/v1/transactions/:id  — Remove a transaction, reversing its amount
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateTransactionSchema, ListTransactionsQuerySchema } from "../types/dto.js";
import { parseQuery, validateBody } from "../middleware/validate.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListTransactionsQuerySchema);
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }
    return c.json({ data: c.get("ledger").listTransactions(query.value) });
  });

  routes.post("/", validateBody(CreateTransactionSchema), (c) => {
    const tx = c.get("ledger").addTransaction(c.get("validatedBody"));
    return c.json({ data: tx }, 201);
  });

  routes.delete("/:id", (c) => {
    return c.json({ data: c.get("ledger").deleteTransaction(c.req.param("id")) });
  });

  return routes;
}

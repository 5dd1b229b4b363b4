/**
 * Summary route.
 *
 * GET /api/v1/summary — Total balance plus a period's income and expense
 *                       (?period=YYYY-MM, default: the current month)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SummaryQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createSummaryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, SummaryQuerySchema);
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }
    return c.json({ data: c.get("ledger").summarize(query.value.period) });
  });

  return routes;
}

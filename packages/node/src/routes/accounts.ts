/**
 * Account routes.
 *
 * GET    /api/v1/accounts      — List accounts
 * POST   /api/v1/accounts      — Open an account
 * DELETE /api/v1/accounts/:id  — Remove an account (its transactions stay)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateAccountSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("ledger").listAccounts() });
  });

  routes.post("/", validateBody(CreateAccountSchema), (c) => {
    const body = c.get("validatedBody");
    const account = c.get("ledger").addAccount(body.name, body.balance);
    return c.json({ data: account }, 201);
  });

  routes.delete("/:id", (c) => {
    return c.json({ data: c.get("ledger").deleteAccount(c.req.param("id")) });
  });

  return routes;
}

/**
 * Fixed-cost template routes.
 *
 * GET    /api/v1/fixed-costs        — List templates
 * POST   /api/v1/fixed-costs        — Create a template
 * POST   /api/v1/fixed-costs/apply  — Book this month's due fixed costs
 * DELETE /api/v1/fixed-costs/:id    — Remove a template (booked transactions stay)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApplyFixedCostsSchema, CreateFixedCostSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createFixedCostRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("ledger").listTemplates() });
  });

  routes.post("/", validateBody(CreateFixedCostSchema), (c) => {
    const template = c.get("ledger").addTemplate(c.get("validatedBody"));
    return c.json({ data: template }, 201);
  });

  routes.post("/apply", validateBody(ApplyFixedCostsSchema, { allowEmpty: true }), (c) => {
    const run = c.get("ledger").applyRecurringCharges(c.get("validatedBody").date);
    return c.json({ data: run });
  });

  routes.delete("/:id", (c) => {
    return c.json({ data: c.get("ledger").deleteTemplate(c.req.param("id")) });
  });

  return routes;
}

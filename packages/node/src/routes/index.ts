/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createTransactionRoutes } from "./transactions.js";
export { createFixedCostRoutes } from "./fixed-costs.js";
export { createSummaryRoutes } from "./summary.js";

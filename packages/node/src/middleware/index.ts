/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, levelForStatus } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody, parseQuery } from "./validate.js";
export type { ValidateBodyOptions, QueryResult } from "./validate.js";

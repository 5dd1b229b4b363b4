/**
 * @kakeibo/node — HTTP service for the kakeibo ledger.
 *
 * Package public API. The server itself is started by `main.ts`.
 */

export { LedgerService, systemClock } from "./services/ledger-service.js";
export type {
  Clock,
  LedgerServiceConfig,
  DeleteResult,
  CreateTransactionInput,
  CreateTemplateInput,
} from "./services/ledger-service.js";
export { loadConfig, createGateway, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";

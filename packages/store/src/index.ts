/**
 * @kakeibo/store — Persistence for the kakeibo ledger.
 *
 * Provides:
 * - PersistenceGateway interface (load/save of whole collections)
 * - JsonFileGateway for on-disk JSON documents
 * - InMemoryGateway for tests and ephemeral runs
 * - PersistenceError for real I/O failures
 */

// Types
export type { PersistenceGateway, PersistenceErrorCode } from "./types.js";

export { PersistenceError, serializeCollection, parseCollection } from "./types.js";

// Implementations
export { JsonFileGateway, DEFAULT_FILE_NAMES } from "./json-file-gateway.js";
export type { JsonFileGatewayOptions } from "./json-file-gateway.js";

export { InMemoryGateway } from "./in-memory-gateway.js";

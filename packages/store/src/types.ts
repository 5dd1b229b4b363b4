/**
 * @kakeibo/store — Core types.
 *
 * The contract between the ledger engine and durable storage.
 *
 * Design principles:
 * - Three independent collections, each saved as a whole document
 * - Absent or corrupt documents load as the caller's fallback, never throw
 * - Real I/O failures surface as PersistenceError and are never swallowed
 * - Synchronous: a save has completed (or failed) when the call returns
 */

import type { CollectionKey } from "@kakeibo/types";

// =============================================================================
// Gateway Interface
// =============================================================================

/**
 * Load/save access to the persisted ledger collections.
 *
 * Records are handled as `unknown` here: the gateway does not interpret
 * them. Shape checks and backfilling belong to the ledger's normalizer.
 */
export interface PersistenceGateway {
  /**
   * Load a collection.
   *
   * @param key - Which collection to load
   * @param fallback - Returned when the document is absent, unparsable or not an array
   * @returns The stored records, or `fallback`
   * @throws PersistenceError (READ_FAILED) when the storage itself cannot be read
   */
  load(key: CollectionKey, fallback: readonly unknown[]): readonly unknown[];

  /**
   * Replace a collection with the given records.
   *
   * @throws PersistenceError (WRITE_FAILED) when the write does not complete
   */
  save(key: CollectionKey, records: readonly unknown[]): void;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for gateway operations.
 */
export type PersistenceErrorCode = "READ_FAILED" | "WRITE_FAILED";

/**
 * Error thrown when storage cannot be read or written.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly code: PersistenceErrorCode,
    message: string,
    public readonly collection: CollectionKey,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "PersistenceError";
  }
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Serialize a collection the way it is written to disk:
 * two-space indentation, non-ASCII characters kept as-is.
 */
export function serializeCollection(records: readonly unknown[]): string {
  return JSON.stringify(records, null, 2) + "\n";
}

/**
 * Parse a stored document. Anything that is not a JSON array yields `undefined`.
 */
export function parseCollection(content: string): readonly unknown[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return undefined;
  }
  return Array.isArray(parsed) ? parsed : undefined;
}

/**
 * @kakeibo/store — In-memory gateway.
 *
 * Keeps each collection as serialized JSON text, so callers never share
 * object references with what was "persisted". Suitable for tests and
 * for running the service without a data directory.
 */

import type { CollectionKey } from "@kakeibo/types";
import type { PersistenceGateway } from "./types.js";
import { parseCollection, serializeCollection } from "./types.js";

/**
 * In-memory persistence gateway.
 */
export class InMemoryGateway implements PersistenceGateway {
  private readonly _documents = new Map<CollectionKey, string>();
  private _saveCount = 0;

  /**
   * @param seed - Raw document text per collection, loaded as if read from disk
   */
  constructor(seed?: Partial<Record<CollectionKey, string>>) {
    if (seed !== undefined) {
      for (const [key, content] of Object.entries(seed)) {
        if (content !== undefined && isCollectionKey(key)) {
          this._documents.set(key, content);
        }
      }
    }
  }

  load(key: CollectionKey, fallback: readonly unknown[]): readonly unknown[] {
    const content = this._documents.get(key);
    if (content === undefined) {
      return fallback;
    }
    return parseCollection(content) ?? fallback;
  }

  save(key: CollectionKey, records: readonly unknown[]): void {
    this._documents.set(key, serializeCollection(records));
    this._saveCount++;
  }

  /**
   * The stored text of a collection, as it would sit on disk.
   */
  peek(key: CollectionKey): string | undefined {
    return this._documents.get(key);
  }

  /**
   * Number of successful saves across all collections.
   */
  get saveCount(): number {
    return this._saveCount;
  }
}

const COLLECTION_KEYS = new Set<string>(["accounts", "transactions", "fixed_costs"]);

function isCollectionKey(value: string): value is CollectionKey {
  return COLLECTION_KEYS.has(value);
}

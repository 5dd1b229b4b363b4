/**
 * @kakeibo/store — JSON file gateway.
 *
 * Stores each collection as one pretty-printed JSON array on disk:
 * `accounts.json`, `transactions.json`, `fixed_costs.json`.
 *
 * Crash safety:
 * - Each save writes a temp file, fsyncs it, then renames it over the target
 * - A reader never observes a half-written document
 * - A corrupt document (hand edit, foreign tool) loads as the fallback
 */

import {
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  writeSync,
} from "node:fs";
import { join } from "node:path";
import type { CollectionKey } from "@kakeibo/types";
import type { PersistenceGateway } from "./types.js";
import { PersistenceError, parseCollection, serializeCollection } from "./types.js";

/**
 * Default file name per collection.
 */
export const DEFAULT_FILE_NAMES: Readonly<Record<CollectionKey, string>> = {
  accounts: "accounts.json",
  transactions: "transactions.json",
  fixed_costs: "fixed_costs.json",
} as const;

/**
 * Options for creating a JsonFileGateway.
 */
export interface JsonFileGatewayOptions {
  /** Directory holding the three documents (created if missing) */
  readonly directory: string;

  /** Override individual file names */
  readonly fileNames?: Partial<Record<CollectionKey, string>> | undefined;
}

/**
 * File-backed persistence gateway.
 */
export class JsonFileGateway implements PersistenceGateway {
  private readonly _directory: string;
  private readonly _fileNames: Readonly<Record<CollectionKey, string>>;

  constructor(options: JsonFileGatewayOptions) {
    this._directory = options.directory;
    this._fileNames = { ...DEFAULT_FILE_NAMES, ...options.fileNames };

    mkdirSync(this._directory, { recursive: true });
  }

  load(key: CollectionKey, fallback: readonly unknown[]): readonly unknown[] {
    const path = this.pathFor(key);

    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return fallback;
      }
      throw new PersistenceError(
        "READ_FAILED",
        `Cannot read ${key} from "${path}"`,
        key,
        err,
      );
    }

    return parseCollection(content) ?? fallback;
  }

  save(key: CollectionKey, records: readonly unknown[]): void {
    const path = this.pathFor(key);
    const tempPath = `${path}.tmp`;

    try {
      this._writeAndSync(tempPath, serializeCollection(records));
      renameSync(tempPath, path);
    } catch (err) {
      throw new PersistenceError(
        "WRITE_FAILED",
        `Cannot write ${key} to "${path}"`,
        key,
        err,
      );
    }
  }

  /**
   * Absolute or relative path of a collection's document.
   */
  pathFor(key: CollectionKey): string {
    return join(this._directory, this._fileNames[key]);
  }

  get directory(): string {
    return this._directory;
  }

  private _writeAndSync(path: string, data: string): void {
    const fd = openSync(path, "w");
    try {
      writeSync(fd, data, null, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Tests for JsonFileGateway.
 *
 * Verifies:
 * - Persistence: collections survive gateway recreation
 * - Fallback: absent, corrupt and non-array documents load as the fallback
 * - Failures: unreadable and unwritable paths raise PersistenceError
 * - Format: pretty-printed JSON with non-ASCII text kept as-is
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonFileGateway } from "../src/json-file-gateway.js";
import { PersistenceError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

let testDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `kakeibo-store-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

const ACCOUNTS = [
  { id: "acc_1", name: "現金", balance: 12000 },
  { id: "acc_2", name: "Bank", balance: -300 },
];

// =============================================================================
// Directory
// =============================================================================

describe("directory creation", () => {
  it("creates the data directory on construction", () => {
    const nested = join(testDir, "a", "b");
    new JsonFileGateway({ directory: nested });
    expect(existsSync(nested)).toBe(true);
  });

  it("names documents after their collection", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    expect(gateway.pathFor("accounts")).toBe(join(testDir, "accounts.json"));
    expect(gateway.pathFor("transactions")).toBe(join(testDir, "transactions.json"));
    expect(gateway.pathFor("fixed_costs")).toBe(join(testDir, "fixed_costs.json"));
  });

  it("honours file name overrides", () => {
    const gateway = new JsonFileGateway({
      directory: testDir,
      fileNames: { fixed_costs: "templates.json" },
    });
    expect(gateway.pathFor("fixed_costs")).toBe(join(testDir, "templates.json"));
    expect(gateway.pathFor("accounts")).toBe(join(testDir, "accounts.json"));
  });
});

// =============================================================================
// Round trip
// =============================================================================

describe("save and load", () => {
  it("loads what was saved by a previous gateway", () => {
    new JsonFileGateway({ directory: testDir }).save("accounts", ACCOUNTS);

    const reopened = new JsonFileGateway({ directory: testDir });
    expect(reopened.load("accounts", [])).toEqual(ACCOUNTS);
  });

  it("writes indented JSON and keeps non-ASCII characters", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    gateway.save("accounts", [{ id: "acc_1", name: "現金", balance: 0 }]);

    const text = readFileSync(gateway.pathFor("accounts"), "utf-8");
    expect(text).toBe(
      '[\n  {\n    "id": "acc_1",\n    "name": "現金",\n    "balance": 0\n  }\n]\n',
    );
  });

  it("replaces the whole document on save", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    gateway.save("accounts", ACCOUNTS);
    gateway.save("accounts", []);

    expect(gateway.load("accounts", ["fallback"])).toEqual([]);
  });

  it("leaves no temp file behind", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    gateway.save("transactions", []);

    expect(existsSync(`${gateway.pathFor("transactions")}.tmp`)).toBe(false);
  });
});

// =============================================================================
// Fallback
// =============================================================================

describe("fallback on absent or corrupt data", () => {
  it("returns the fallback when the file does not exist", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    const fallback = [{ placeholder: true }];
    expect(gateway.load("transactions", fallback)).toBe(fallback);
  });

  it("returns the fallback for unparsable JSON", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    writeFileSync(gateway.pathFor("accounts"), "[{\"id\": \"acc_1\",", "utf-8");

    expect(gateway.load("accounts", [])).toEqual([]);
  });

  it("returns the fallback when the document is not an array", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    writeFileSync(gateway.pathFor("accounts"), '{"accounts": []}', "utf-8");

    expect(gateway.load("accounts", [])).toEqual([]);
  });
});

// =============================================================================
// Failures
// =============================================================================

describe("I/O failures", () => {
  it("raises READ_FAILED when the path cannot be read as a file", () => {
    const gateway = new JsonFileGateway({ directory: testDir });
    mkdirSync(gateway.pathFor("accounts"));

    try {
      gateway.load("accounts", []);
      expect.unreachable("load should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(PersistenceError);
      expect((err as PersistenceError).code).toBe("READ_FAILED");
      expect((err as PersistenceError).collection).toBe("accounts");
    }
  });

  it("raises WRITE_FAILED when the target directory is missing", () => {
    const gateway = new JsonFileGateway({
      directory: testDir,
      fileNames: { transactions: join("missing", "transactions.json") },
    });

    try {
      gateway.save("transactions", []);
      expect.unreachable("save should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(PersistenceError);
      expect((err as PersistenceError).code).toBe("WRITE_FAILED");
      expect((err as PersistenceError).collection).toBe("transactions");
      expect((err as PersistenceError).cause).toBeInstanceOf(Error);
    }
  });
});

/**
 * Tests for transaction routes.
 *
 * Verifies balance application/reversal through the API, date defaulting,
 * canonical ordering and list filters.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, jsonRequest, TODAY } from "../setup.js";
import type { TestApp } from "../setup.js";

interface TxData {
  id: string;
  date: string;
  account: string;
  amount: number;
  memo: string;
}

let t: TestApp;

async function post(path: string, body: unknown): Promise<Response> {
  return t.app.request(jsonRequest(path, "POST", body));
}

async function balanceOf(name: string): Promise<number | undefined> {
  const res = await t.app.request("/api/v1/accounts");
  const body = (await res.json()) as { data: { name: string; balance: number }[] };
  return body.data.find((a) => a.name === name)?.balance;
}

async function listIds(query = ""): Promise<string[]> {
  const res = await t.app.request(`/api/v1/transactions${query}`);
  const body = (await res.json()) as { data: TxData[] };
  return body.data.map((tx) => tx.id);
}

beforeEach(async () => {
  t = createTestApp();
  await post("/api/v1/accounts", { name: "Bank", balance: 10000 });
});

describe("POST /api/v1/transactions", () => {
  it("records the transaction and applies it to the account", async () => {
    const res = await post("/api/v1/transactions", {
      date: "2024-05-03",
      account: "Bank",
      amount: -2500,
      memo: " groceries ",
    });

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: TxData };
    expect(body.data).toEqual({
      id: "tx_0002",
      date: "2024-05-03",
      account: "Bank",
      amount: -2500,
      memo: "groceries",
    });
    expect(await balanceOf("Bank")).toBe(7500);
  });

  it("defaults the date to today", async () => {
    const res = await post("/api/v1/transactions", { account: "Bank", amount: 100 });

    const body = (await res.json()) as { data: TxData };
    expect(body.data.date).toBe(TODAY);
  });

  it("records against an unknown account without changing balances", async () => {
    const res = await post("/api/v1/transactions", {
      date: "2024-05-03",
      account: "Ghost",
      amount: -500,
    });

    expect(res.status).toBe(201);
    expect(await balanceOf("Bank")).toBe(10000);
    expect(await listIds()).toEqual(["tx_0002"]);
  });

  it("rejects a date that is not YYYY-MM-DD", async () => {
    const res = await post("/api/v1/transactions", {
      date: "2024-02-30",
      account: "Bank",
      amount: 1,
    });

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(await listIds()).toEqual([]);
  });

  it("rejects a fractional amount with INVALID_AMOUNT", async () => {
    const res = await post("/api/v1/transactions", {
      date: "2024-05-03",
      account: "Bank",
      amount: 0.5,
    });

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("INVALID_AMOUNT");
    expect(await balanceOf("Bank")).toBe(10000);
  });
});

describe("GET /api/v1/transactions", () => {
  beforeEach(async () => {
    await post("/api/v1/transactions", { date: "2024-05-20", account: "Bank", amount: 1 });
    await post("/api/v1/transactions", { date: "2024-04-30", account: "Bank", amount: 2 });
    await post("/api/v1/transactions", { date: "2024-05-20", account: "Cash", amount: 3 });
    await post("/api/v1/transactions", { date: "2024-05-01", account: "Cash", amount: 4 });
  });

  it("lists in date-then-id order", async () => {
    expect(await listIds()).toEqual(["tx_0003", "tx_0005", "tx_0002", "tx_0004"]);
  });

  it("filters by period", async () => {
    expect(await listIds("?period=2024-05")).toEqual(["tx_0005", "tx_0002", "tx_0004"]);
  });

  it("filters by account", async () => {
    expect(await listIds("?account=Cash")).toEqual(["tx_0005", "tx_0004"]);
  });

  it("combines filters", async () => {
    expect(await listIds("?period=2024-04&account=Bank")).toEqual(["tx_0003"]);
  });

  it("rejects a malformed period", async () => {
    const res = await t.app.request("/api/v1/transactions?period=2024-5");

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Invalid query parameters");
  });
});

describe("DELETE /api/v1/transactions/:id", () => {
  it("removes the transaction and reverses its amount", async () => {
    await post("/api/v1/transactions", { date: "2024-05-03", account: "Bank", amount: -2500 });
    await post("/api/v1/transactions", { date: "2024-05-04", account: "Bank", amount: 700 });

    const res = await t.app.request("/api/v1/transactions/tx_0002", { method: "DELETE" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { id: "tx_0002", deleted: true } });
    expect(await balanceOf("Bank")).toBe(10700);
    expect(await listIds()).toEqual(["tx_0003"]);
  });

  it("is a no-op for an unknown id", async () => {
    const saves = t.gateway.saveCount;

    const res = await t.app.request("/api/v1/transactions/tx_missing", { method: "DELETE" });

    expect(await res.json()).toEqual({ data: { id: "tx_missing", deleted: false } });
    expect(t.gateway.saveCount).toBe(saves);
  });
});

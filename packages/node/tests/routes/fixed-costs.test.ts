/**
 * Tests for fixed-cost template routes and the apply endpoint.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, fixedClock, jsonRequest } from "../setup.js";
import type { TestApp } from "../setup.js";

interface RunBody {
  data: {
    added: number;
    skippedFuture: number;
    skippedDuplicate: number;
    skippedNoAccount: number;
    generated: { id: string; date: string; account: string; amount: number; memo: string }[];
  };
}

let t: TestApp;

async function post(path: string, body?: unknown): Promise<Response> {
  return t.app.request(jsonRequest(path, "POST", body));
}

async function errorCode(res: Response): Promise<string> {
  const body = (await res.json()) as { error: { code: string } };
  return body.error.code;
}

beforeEach(async () => {
  // Clock: 2024-05-15
  t = createTestApp({ clock: fixedClock("2024-05-15") });
  await post("/api/v1/accounts", { name: "Bank", balance: 100000 });
});

describe("POST /api/v1/fixed-costs", () => {
  it("creates a template", async () => {
    const res = await post("/api/v1/fixed-costs", {
      name: "Rent",
      account: "Bank",
      amount: -80000,
      memo: "flat",
      day: 25,
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { id: "fc_0002", name: "Rent", account: "Bank", amount: -80000, memo: "flat", day: 25 },
    });
  });

  it("rejects an unknown account with 422", async () => {
    const res = await post("/api/v1/fixed-costs", {
      name: "Rent",
      account: "Savings",
      amount: -80000,
      day: 25,
    });

    expect(res.status).toBe(422);
    expect(await errorCode(res)).toBe("UNKNOWN_ACCOUNT");
  });

  it("rejects a day outside 1–31 with INVALID_DAY", async () => {
    const res = await post("/api/v1/fixed-costs", {
      name: "Rent",
      account: "Bank",
      amount: -80000,
      day: 32,
    });

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("INVALID_DAY");
  });

  it("rejects a missing day with VALIDATION_ERROR", async () => {
    const res = await post("/api/v1/fixed-costs", { name: "Rent", account: "Bank", amount: -1 });

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("VALIDATION_ERROR");
  });
});

describe("GET and DELETE /api/v1/fixed-costs", () => {
  it("lists and removes templates", async () => {
    await post("/api/v1/fixed-costs", { name: "Rent", account: "Bank", amount: -1, day: 1 });

    const listed = (await (await t.app.request("/api/v1/fixed-costs")).json()) as {
      data: { id: string }[];
    };
    expect(listed.data.map((x) => x.id)).toEqual(["fc_0002"]);

    const res = await t.app.request("/api/v1/fixed-costs/fc_0002", { method: "DELETE" });
    expect(await res.json()).toEqual({ data: { id: "fc_0002", deleted: true } });

    const after = (await (await t.app.request("/api/v1/fixed-costs")).json()) as {
      data: unknown[];
    };
    expect(after.data).toEqual([]);
  });
});

describe("POST /api/v1/fixed-costs/apply", () => {
  beforeEach(async () => {
    await post("/api/v1/fixed-costs", { name: "Phone", account: "Bank", amount: -3000, day: 5 });
    await post("/api/v1/fixed-costs", { name: "Rent", account: "Bank", amount: -80000, day: 25 });
  });

  it("books due templates as of today when no body is sent", async () => {
    const res = await post("/api/v1/fixed-costs/apply");

    expect(res.status).toBe(200);
    const body = (await res.json()) as RunBody;
    expect(body.data.added).toBe(1);
    expect(body.data.skippedFuture).toBe(1);
    expect(body.data.generated).toEqual([
      { id: "tx_0004", date: "2024-05-05", account: "Bank", amount: -3000, memo: "固定費:Phone" },
    ]);

    const accounts = (await (await t.app.request("/api/v1/accounts")).json()) as {
      data: { balance: number }[];
    };
    expect(accounts.data[0]?.balance).toBe(97000);
  });

  it("uses the given date and is idempotent", async () => {
    const first = (await (await post("/api/v1/fixed-costs/apply", { date: "2024-05-31" })).json()) as RunBody;
    const second = (await (await post("/api/v1/fixed-costs/apply", { date: "2024-05-31" })).json()) as RunBody;

    expect(first.data.added).toBe(2);
    expect(second.data.added).toBe(0);
    expect(second.data.skippedDuplicate).toBe(2);
    expect(second.data.generated).toEqual([]);
  });

  it("rejects an invalid date with INVALID_DATE", async () => {
    const res = await post("/api/v1/fixed-costs/apply", { date: "31/05/2024" });

    expect(res.status).toBe(400);
    expect(await errorCode(res)).toBe("INVALID_DATE");
  });
});

/**
 * Runtime type guard tests for @kakeibo/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed persisted records.
 */
import { describe, it, expect } from "vitest";
import {
  isIsoDate,
  daysInMonth,
  isLeapYear,
  isAccount,
  isTransaction,
  isFixedCostTemplate,
} from "../src/guards.js";

// =============================================================================
// Scalars
// =============================================================================

describe("isIsoDate", () => {
  it("accepts a plain calendar date", () => {
    expect(isIsoDate("2024-05-01")).toBe(true);
  });

  it("accepts leap day in a leap year", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
  });

  it("rejects leap day in a common year", () => {
    expect(isIsoDate("2023-02-29")).toBe(false);
  });

  it("accepts leap day in years before 100", () => {
    expect(isIsoDate("0000-02-29")).toBe(true);
    expect(isIsoDate("0004-02-29")).toBe(true);
    expect(isIsoDate("0001-02-29")).toBe(false);
  });

  it("rejects impossible days and months", () => {
    expect(isIsoDate("2024-04-31")).toBe(false);
    expect(isIsoDate("2024-13-01")).toBe(false);
    expect(isIsoDate("2024-00-10")).toBe(false);
    expect(isIsoDate("2024-05-00")).toBe(false);
  });

  it("rejects other shapes", () => {
    expect(isIsoDate("2024/05/01")).toBe(false);
    expect(isIsoDate("2024-5-1")).toBe(false);
    expect(isIsoDate("2024-05-01T00:00:00Z")).toBe(false);
    expect(isIsoDate("")).toBe(false);
    expect(isIsoDate(20240501)).toBe(false);
    expect(isIsoDate(null)).toBe(false);
  });
});

describe("daysInMonth", () => {
  it("knows month lengths", () => {
    expect(daysInMonth(2024, 1)).toBe(31);
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2024, 4)).toBe(30);
    expect(daysInMonth(2024, 12)).toBe(31);
  });

  it("applies the leap-year rule to two-digit and zero years", () => {
    expect(daysInMonth(0, 2)).toBe(29);
    expect(daysInMonth(4, 2)).toBe(29);
    expect(daysInMonth(99, 2)).toBe(28);
    expect(daysInMonth(1900, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
  });
});

describe("isLeapYear", () => {
  it("follows the Gregorian century rule", () => {
    expect(isLeapYear(0)).toBe(true);
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
    expect(isLeapYear(2100)).toBe(false);
    expect(isLeapYear(2400)).toBe(true);
  });
});

// =============================================================================
// Records
// =============================================================================

describe("isAccount", () => {
  it("accepts a valid account", () => {
    expect(isAccount({ id: "acc_1", name: "Wallet", balance: -200 })).toBe(true);
  });

  it("rejects a missing id", () => {
    expect(isAccount({ name: "Wallet", balance: 0 })).toBe(false);
    expect(isAccount({ id: "", name: "Wallet", balance: 0 })).toBe(false);
  });

  it("rejects a fractional or string balance", () => {
    expect(isAccount({ id: "acc_1", name: "Wallet", balance: 1.5 })).toBe(false);
    expect(isAccount({ id: "acc_1", name: "Wallet", balance: "100" })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isAccount(null)).toBe(false);
    expect(isAccount("acc_1")).toBe(false);
  });
});

describe("isTransaction", () => {
  const valid = {
    id: "tx_1",
    date: "2024-05-01",
    account: "Wallet",
    amount: -500,
    memo: "",
  };

  it("accepts a valid transaction", () => {
    expect(isTransaction(valid)).toBe(true);
  });

  it("accepts a malformed date string (ordering handles it)", () => {
    expect(isTransaction({ ...valid, date: "someday" })).toBe(true);
  });

  it("rejects a missing memo", () => {
    const { memo: _memo, ...rest } = valid;
    expect(isTransaction(rest)).toBe(false);
  });
});

describe("isFixedCostTemplate", () => {
  const valid = {
    id: "fc_1",
    name: "Rent",
    account: "Bank",
    amount: -80000,
    memo: "",
    day: 25,
  };

  it("accepts a valid template", () => {
    expect(isFixedCostTemplate(valid)).toBe(true);
  });

  it("rejects days outside 1–31", () => {
    expect(isFixedCostTemplate({ ...valid, day: 0 })).toBe(false);
    expect(isFixedCostTemplate({ ...valid, day: 32 })).toBe(false);
    expect(isFixedCostTemplate({ ...valid, day: 2.5 })).toBe(false);
  });
});

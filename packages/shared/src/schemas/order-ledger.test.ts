import { describe, expect, it } from "vitest";

import { LedgerDocumentSchema, isTerminalStatus, ledgerTimestamp, normalizeOrderStatus, type OrderRecord } from "./order-ledger";

const buy: OrderRecord = {
  orderId: "b-1",
  symbol: "LTCUSDT",
  side: "buy",
  amount: "10.00000000",
  price: "0.49000000",
  status: "FILLED",
  createdAt: "2026-10-18T12:00:00Z",
  linkedOrderId: "s-1"
};

const sell: OrderRecord = {
  orderId: "s-1",
  symbol: "LTCUSDT",
  side: "sell",
  amount: "10.00000000",
  price: "0.49980000",
  status: "NEW",
  createdAt: "2026-10-18T12:05:00Z",
  linkedOrderId: "b-1"
};

describe("order-ledger schema", () => {
  it("accepts a buy linked to an existing sell", () => {
    expect(LedgerDocumentSchema.safeParse({ orders: [buy, sell] }).success).toBe(true);
  });

  it("rejects a buy linked to a missing sell", () => {
    const result = LedgerDocumentSchema.safeParse({ orders: [buy] });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe("Buy b-1 links to missing sell s-1");
  });

  it("rejects values finer than the tick size", () => {
    const result = LedgerDocumentSchema.safeParse({ orders: [{ ...sell, price: "0.499800001" }] });
    expect(result.success).toBe(false);
  });

  it("rejects unknown statuses", () => {
    expect(LedgerDocumentSchema.safeParse({ orders: [{ ...sell, status: "OPEN" }] }).success).toBe(false);
  });
});

describe("normalizeOrderStatus", () => {
  it("maps exchange spellings onto ledger states", () => {
    expect(normalizeOrderStatus("filled")).toBe("FILLED");
    expect(normalizeOrderStatus("Cancelled")).toBe("CANCELED");
    expect(normalizeOrderStatus("partially filled")).toBe("NEW");
    expect(normalizeOrderStatus("open")).toBe("NEW");
    expect(normalizeOrderStatus("rejected")).toBe("REJECTED");
    expect(normalizeOrderStatus("weird")).toBe("UNKNOWN");
  });

  it("treats only filled, canceled and rejected as terminal", () => {
    expect(isTerminalStatus("FILLED")).toBe(true);
    expect(isTerminalStatus("CANCELED")).toBe(true);
    expect(isTerminalStatus("REJECTED")).toBe(true);
    expect(isTerminalStatus("NEW")).toBe(false);
    expect(isTerminalStatus("UNKNOWN")).toBe(false);
  });
});

describe("ledgerTimestamp", () => {
  it("drops milliseconds", () => {
    expect(ledgerTimestamp(new Date("2026-10-18T12:34:56.789Z"))).toBe("2026-10-18T12:34:56Z");
  });
});

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { OrderRecord } from "@spotledger/shared";
import fc from "fast-check";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LedgerCorruptError } from "../errors/trading-errors";
import { OrderLedgerService } from "./order-ledger.service";

let dir: string;
let filePath: string;
let ledger: OrderLedgerService;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-"));
  filePath = path.join(dir, "nested", "orders.json");
  ledger = new OrderLedgerService({ orderFile: filePath });
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function order(overrides: Partial<OrderRecord> = {}): OrderRecord {
  return {
    orderId: "b-1",
    symbol: "LTCUSDT",
    side: "buy",
    amount: "10.00000000",
    price: "0.49000000",
    status: "NEW",
    createdAt: "2026-10-18T12:00:00Z",
    ...overrides
  };
}

const tickAmount = fc.bigInt({ min: 0n, max: 10n ** 14n }).map((ticks) => {
  const digits = ticks.toString().padStart(9, "0");
  return `${digits.slice(0, -8)}.${digits.slice(-8)}`;
});

const recordArb = fc.record({
  symbol: fc.constantFrom("LTCUSDT", "BTCUSDT"),
  side: fc.constantFrom("buy" as const, "sell" as const),
  amount: tickAmount,
  price: tickAmount,
  status: fc.constantFrom("NEW" as const, "FILLED" as const, "CANCELED" as const, "REJECTED" as const, "UNKNOWN" as const),
  note: fc.option(fc.string(), { nil: undefined })
});

describe("OrderLedgerService", () => {
  it("reads a missing file as an empty ledger", () => {
    expect(ledger.load()).toEqual([]);
  });

  it("reads a blank file as an empty ledger", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "  \n");

    expect(ledger.load()).toEqual([]);
  });

  it("round-trips any well-formed sequence of records", () => {
    fc.assert(
      fc.property(fc.array(recordArb, { maxLength: 8 }), (generated) => {
        const records: OrderRecord[] = generated.map((r, index) => ({
          orderId: `o-${index}`,
          createdAt: "2026-10-18T12:00:00Z",
          ...r
        }));

        ledger.save(records);
        expect(ledger.load()).toEqual(records);
      })
    );
  });

  it("writes an orders document with 2-space indentation and no temp file", () => {
    ledger.save([order()]);

    const text = fs.readFileSync(filePath, "utf-8");
    expect(text.startsWith('{\n  "orders": [\n    {\n      "orderId": "b-1",')).toBe(true);
    expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
  });

  it("refuses to read unparsable JSON", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "{ not json");

    expect(() => ledger.load()).toThrow(LedgerCorruptError);
  });

  it("refuses to read records that break the schema", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ orders: [{ ...order(), price: "0.49" }] }));

    expect(() => ledger.load()).toThrow(`Ledger ${filePath} failed validation: orders.0.price: Expected a decimal with exactly 8 fractional digits`);
  });

  it("refuses to read a buy linked to a missing sell", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ orders: [order({ status: "FILLED", linkedOrderId: "s-9" })] }));

    expect(() => ledger.load()).toThrow("Buy b-1 links to missing sell s-9");
  });

  it("refuses to save records that break the schema", () => {
    expect(() => ledger.save([order({ amount: "10" })])).toThrow(LedgerCorruptError);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("appends in order and ignores an empty batch", () => {
    ledger.append([order()]);
    ledger.append([]);
    ledger.append([order({ orderId: "b-2" }), order({ orderId: "b-3" })]);

    expect(ledger.load().map((r) => r.orderId)).toEqual(["b-1", "b-2", "b-3"]);
  });

  it("updates the status of a tracked order only", () => {
    ledger.save([order(), order({ orderId: "b-2" })]);

    expect(ledger.updateStatus("b-2", "CANCELED")).toBe(true);
    expect(ledger.updateStatus("missing", "CANCELED")).toBe(false);
    expect(ledger.load().map((r) => r.status)).toEqual(["NEW", "CANCELED"]);
  });

  it("leaves records in a final status untouched", () => {
    ledger.save([order({ status: "FILLED" })]);
    const before = fs.readFileSync(filePath, "utf-8");

    expect(ledger.updateStatus("b-1", "CANCELED")).toBe(true);
    expect(fs.readFileSync(filePath, "utf-8")).toBe(before);
  });
});

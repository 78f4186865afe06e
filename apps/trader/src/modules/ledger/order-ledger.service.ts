import fs from "node:fs";
import path from "node:path";

import { Inject, Injectable } from "@nestjs/common";
import type { OrderRecord, OrderStatus } from "@spotledger/shared";
import { LedgerDocumentSchema, isTerminalStatus } from "@spotledger/shared";

import { LedgerCorruptError } from "../errors/trading-errors";
import type { RunOptions } from "../run-options";
import { RUN_OPTIONS } from "../tokens";

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

function describeIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/** JSON file of order records. Whole-file rewrites; one process per file. */
@Injectable()
export class OrderLedgerService {
  constructor(@Inject(RUN_OPTIONS) private readonly options: Pick<RunOptions, "orderFile">) {}

  get filePath(): string {
    return this.options.orderFile;
  }

  load(): OrderRecord[] {
    if (!fs.existsSync(this.filePath)) return [];

    const raw = fs.readFileSync(this.filePath, "utf-8");
    if (!raw.trim()) return [];

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new LedgerCorruptError(this.filePath, "is not valid JSON", { cause: err });
    }

    const parsed = LedgerDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new LedgerCorruptError(this.filePath, `failed validation: ${describeIssues(parsed.error.issues)}`);
    }
    return parsed.data.orders;
  }

  save(records: readonly OrderRecord[]): void {
    const parsed = LedgerDocumentSchema.safeParse({ orders: records });
    if (!parsed.success) {
      throw new LedgerCorruptError(this.filePath, `refusing to write invalid records: ${describeIssues(parsed.error.issues)}`);
    }

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    atomicWriteFile(this.filePath, `${JSON.stringify(parsed.data, null, 2)}\n`);
  }

  append(records: readonly OrderRecord[]): void {
    if (records.length === 0) return;
    this.save([...this.load(), ...records]);
  }

  /**
   * Sets the status of every open record with this id. Final records keep
   * their status. Returns whether the ledger tracks the id at all.
   */
  updateStatus(orderId: string, status: OrderStatus): boolean {
    const records = this.load();
    let matched = false;
    let changed = false;
    const next = records.map((record) => {
      if (record.orderId !== orderId) return record;
      matched = true;
      if (isTerminalStatus(record.status) || record.status === status) return record;
      changed = true;
      return { ...record, status };
    });
    if (changed) this.save(next);
    return matched;
  }
}

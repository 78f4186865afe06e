import path from "node:path";
import { parseArgs } from "node:util";

import type { EngineConfig } from "@spotledger/shared";
import { compareDecimal, isDecimal } from "@spotledger/shared";

import { ConfigurationError } from "../modules/errors/trading-errors";
import { normalizeSymbol } from "../modules/integrations/symbol-format";
import type { RunOptions } from "../modules/run-options";

export type CliMode = "ladder" | "reconcile" | "interactive";

export type CliArgs = {
  mode: CliMode;
  symbol?: string;
  amount?: string;
  orderFile?: string;
  dryRun: boolean;
  help: boolean;
};

export const USAGE = `Usage: trader [options]

Options:
  --symbol <pair>       Trading pair (default from config, LTCUSDT)
  --amount <decimal>    Order amount; required with --auto
  --order-file <path>   Ledger file (default <DATA_DIR>/orders.json)
  --dry-run             Simulate orders in memory, no credentials needed
  --auto                Place the buy ladder, reconcile and exit
  --reconcile           Reconcile the ledger and exit
  -h, --help            Show this help
`;

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        symbol: { type: "string" },
        amount: { type: "string" },
        "order-file": { type: "string" },
        "dry-run": { type: "boolean" },
        auto: { type: "boolean" },
        reconcile: { type: "boolean" },
        help: { type: "boolean", short: "h" }
      }
    }).values;
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const values = parseFlags(argv);

  if (values.auto && values.reconcile) {
    throw new ConfigurationError("--auto and --reconcile cannot be combined");
  }

  return {
    mode: values.auto ? "ladder" : values.reconcile ? "reconcile" : "interactive",
    symbol: values.symbol,
    amount: values.amount,
    orderFile: values["order-file"],
    dryRun: values["dry-run"] ?? false,
    help: values.help ?? false
  };
}

/** Positive decimal text, or null. */
export function parseAmount(raw: string): string | null {
  const text = raw.trim();
  if (!isDecimal(text) || compareDecimal(text, 0) <= 0) return null;
  return text;
}

export function resolveRunOptions(args: CliArgs, config: EngineConfig, dataDir: string): RunOptions {
  const symbol = normalizeSymbol(args.symbol ?? config.trading.defaultSymbol);
  if (!symbol) {
    throw new ConfigurationError(`--symbol ${JSON.stringify(args.symbol)} does not name a trading pair`);
  }

  let amount: string | undefined;
  if (args.amount !== undefined) {
    const parsed = parseAmount(args.amount);
    if (parsed === null) {
      throw new ConfigurationError(`--amount must be a positive decimal, got ${JSON.stringify(args.amount)}`);
    }
    amount = parsed;
  }
  if (args.mode === "ladder" && amount === undefined) {
    throw new ConfigurationError("--auto needs --amount");
  }

  return {
    symbol,
    amount,
    orderFile: path.resolve(args.orderFile ?? path.join(dataDir, "orders.json")),
    simulate: args.dryRun
  };
}

import "reflect-metadata";

import readline from "node:readline/promises";

import { NestFactory } from "@nestjs/core";

import { USAGE, parseCliArgs, resolveRunOptions } from "./cli/args";
import { runInteractiveMenu } from "./cli/interactive-menu";
import { AppModule } from "./modules/app.module";
import { ConfigService } from "./modules/config/config.service";
import { createLogger } from "./modules/logging/pino-logger";
import { TradingWorkflowService } from "./modules/workflow/trading-workflow.service";

async function bootstrap(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return;
  }

  const interactive = args.mode === "interactive";
  const logger = createLogger(interactive ? { stdoutLevel: "warn" } : {});
  const configService = new ConfigService();
  const config = configService.load();
  const runOptions = resolveRunOptions(args, config, configService.dataDir);

  const app = await NestFactory.createApplicationContext(AppModule.register({ runOptions, logger }), {
    logger: false,
    abortOnError: false
  });

  app.useLogger({
    log: (message) => logger.info({ msg: message }),
    error: (message, trace) => logger.error({ msg: message, trace }),
    warn: (message) => logger.warn({ msg: message }),
    debug: (message) => logger.debug({ msg: message }),
    verbose: (message) => logger.trace({ msg: message })
  });

  try {
    const workflow = app.get(TradingWorkflowService);
    logger.info({ msg: "Trader started", mode: args.mode, symbol: runOptions.symbol, ledger: runOptions.orderFile, dryRun: runOptions.simulate });

    switch (args.mode) {
      case "ladder": {
        const result = await workflow.runLadder();
        logger.info({ msg: "Ladder complete", placed: result.placed.map((o) => o.orderId), ...result.reconciliation });
        break;
      }
      case "reconcile": {
        const report = await workflow.reconcile();
        logger.info({ msg: "Reconciliation complete", ...report });
        break;
      }
      case "interactive": {
        const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
        // End of input quits the menu.
        let isClosed = false;
        const closed = new Promise<string>((resolve) =>
          rl.once("close", () => {
            isClosed = true;
            resolve("q");
          })
        );
        try {
          await runInteractiveMenu({
            workflow,
            discounts: config.trading.interactiveDiscounts,
            io: {
              prompt: (question) => (isClosed ? closed : Promise.race([closed, rl.question(question)])),
              print: (line) => process.stdout.write(`${line}\n`)
            },
            logger
          });
        } finally {
          rl.close();
        }
        break;
      }
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});

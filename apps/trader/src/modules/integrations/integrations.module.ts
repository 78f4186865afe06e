import { Module } from "@nestjs/common";
import { resolveOrderSizeFields, resolveSymbolFormats, type EngineConfig } from "@spotledger/shared";
import type { Logger } from "pino";

import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { ConfigurationError } from "../errors/trading-errors";
import type { RunOptions } from "../run-options";
import { EXCHANGE_GATEWAY, LOGGER, RUN_OPTIONS } from "../tokens";
import { ExchangeClient } from "./exchange-client";
import type { ExchangeGateway } from "./exchange-gateway";
import { RestExchangeGateway } from "./rest-exchange-gateway";
import { SimulatedExchangeGateway } from "./simulated-exchange-gateway";

export function createExchangeGateway(config: EngineConfig, options: Pick<RunOptions, "simulate">, logger: Logger): ExchangeGateway {
  if (options.simulate) {
    logger.info({ msg: "Dry run: orders are simulated in memory" });
    return new SimulatedExchangeGateway(config.simulation, logger);
  }

  const { exchange } = config;
  if (!exchange.apiKey) {
    throw new ConfigurationError("EXCHANGE_API_KEY must be set (EXCHANGE_API_SECRET is optional) or run with --dry-run");
  }

  const client = new ExchangeClient({
    baseUrl: exchange.baseUrl,
    apiKey: exchange.apiKey,
    apiSecret: exchange.apiSecret,
    timeoutMs: exchange.timeoutMs
  });
  return new RestExchangeGateway(
    client,
    {
      symbolFormats: resolveSymbolFormats(exchange.symbolFormat),
      sizeFields: resolveOrderSizeFields(exchange.orderSizeField)
    },
    logger
  );
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: EXCHANGE_GATEWAY,
      inject: [ConfigService, RUN_OPTIONS, LOGGER],
      useFactory: (configService: ConfigService, options: RunOptions, logger: Logger): ExchangeGateway =>
        createExchangeGateway(configService.load(), options, logger)
    }
  ],
  exports: [EXCHANGE_GATEWAY]
})
export class IntegrationsModule {}

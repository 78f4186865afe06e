import { type DynamicModule, Module } from "@nestjs/common";
import type { Logger } from "pino";

import type { RunOptions } from "../run-options";
import { LOGGER, RUN_OPTIONS } from "../tokens";

@Module({})
export class RuntimeModule {
  static register(runtime: { runOptions: RunOptions; logger: Logger }): DynamicModule {
    return {
      module: RuntimeModule,
      global: true,
      providers: [
        { provide: RUN_OPTIONS, useValue: runtime.runOptions },
        { provide: LOGGER, useValue: runtime.logger }
      ],
      exports: [RUN_OPTIONS, LOGGER]
    };
  }
}

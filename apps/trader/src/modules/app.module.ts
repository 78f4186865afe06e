import { type DynamicModule, Module } from "@nestjs/common";
import type { Logger } from "pino";

import { ConfigModule } from "./config/config.module";
import { IntegrationsModule } from "./integrations/integrations.module";
import { LedgerModule } from "./ledger/ledger.module";
import { RuntimeModule } from "./logging/runtime.module";
import { ReconcileModule } from "./reconcile/reconcile.module";
import type { RunOptions } from "./run-options";
import { WorkflowModule } from "./workflow/workflow.module";

@Module({})
export class AppModule {
  static register(runtime: { runOptions: RunOptions; logger: Logger }): DynamicModule {
    return {
      module: AppModule,
      imports: [
        RuntimeModule.register(runtime),
        ConfigModule,
        IntegrationsModule,
        LedgerModule,
        ReconcileModule,
        WorkflowModule
      ]
    };
  }
}

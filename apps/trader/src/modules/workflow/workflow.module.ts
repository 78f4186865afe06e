import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { LedgerModule } from "../ledger/ledger.module";
import { ReconcileModule } from "../reconcile/reconcile.module";
import { TradingWorkflowService } from "./trading-workflow.service";

@Module({
  imports: [ConfigModule, IntegrationsModule, LedgerModule, ReconcileModule],
  providers: [TradingWorkflowService],
  exports: [TradingWorkflowService]
})
export class WorkflowModule {}

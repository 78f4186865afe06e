import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { LedgerModule } from "../ledger/ledger.module";
import { ReconciliationService } from "./reconciliation.service";

@Module({
  imports: [ConfigModule, IntegrationsModule, LedgerModule],
  providers: [ReconciliationService],
  exports: [ReconciliationService]
})
export class ReconcileModule {}

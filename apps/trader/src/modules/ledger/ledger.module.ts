import { Module } from "@nestjs/common";

import { OrderLedgerService } from "./order-ledger.service";

@Module({
  providers: [OrderLedgerService],
  exports: [OrderLedgerService]
})
export class LedgerModule {}

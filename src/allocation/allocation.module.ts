import { Module } from '@nestjs/common';
import { AllocationLedgerService } from './allocation-ledger.service';

@Module({
  providers: [AllocationLedgerService],
  exports: [AllocationLedgerService],
})
export class AllocationModule {}

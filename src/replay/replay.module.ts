import { Module } from '@nestjs/common';
import { ReplayController } from './replay.controller';
import { ReplayService } from './replay.service';
import { EventSchedulerService } from './event-scheduler.service';
import { TaxSettlementService } from './tax-settlement.service';
import { AllocationService } from './allocation.service';
import { ReportingModule } from '../reporting/reporting.module';

@Module({
  imports: [ReportingModule],
  controllers: [ReplayController],
  providers: [
    EventSchedulerService,   // validation + date ordering
    TaxSettlementService,    // per-date exit settlement
    AllocationService,       // per-date entry funding
    ReplayService,
  ],
  exports: [ReplayService],
})
export class ReplayModule {}

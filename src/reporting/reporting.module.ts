import { Module } from '@nestjs/common';
import { MonthlySummaryService } from './monthly-summary.service';
import { TradeHistoryWriter } from './trade-history.writer';

@Module({
  providers: [MonthlySummaryService, TradeHistoryWriter],
  exports: [MonthlySummaryService, TradeHistoryWriter],
})
export class ReportingModule {}

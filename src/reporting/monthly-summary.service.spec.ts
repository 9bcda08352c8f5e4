import { Test, TestingModule } from '@nestjs/testing';
import { MonthlySummaryService } from './monthly-summary.service';
import { ReplayService } from '../replay/replay.service';
import { EventSchedulerService } from '../replay/event-scheduler.service';
import { TaxSettlementService } from '../replay/tax-settlement.service';
import { AllocationService } from '../replay/allocation.service';
import { TradeInput } from '../replay/entities/trade-record.entity';
import { StockLimitPolicy } from '../config/replay-config';

describe('MonthlySummaryService', () => {
  let service: MonthlySummaryService;
  let replayService: ReplayService;

  const replay = (trades: TradeInput[]) =>
    replayService.replay(trades, { initialCapital: 100000, maxStocks: 2, stockLimitPolicy: StockLimitPolicy.WARN });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MonthlySummaryService, ReplayService, EventSchedulerService, TaxSettlementService, AllocationService],
    }).compile();

    service = module.get<MonthlySummaryService>(MonthlySummaryService);
    replayService = module.get<ReplayService>(ReplayService);
  });

  it('should roll exit dates up into months', () => {
    const summaries = service.summarize(
      replay([
        { ref: '1', stockName: 'AAA', entryPrice: '100', entryDate: '2020-01-01', exitPrice: '120', exitDate: '2020-03-02' },
        { ref: '2', stockName: 'BBB', entryPrice: '30', entryDate: '2020-01-01', exitPrice: '25', exitDate: '2021-01-01' },
        { ref: '3', stockName: 'CCC', entryPrice: '100', entryDate: '2020-03-02' },
      ]),
    );

    expect(
      summaries.map((s) => [
        s.month,
        s.tradesClosed,
        s.totalPnl.toFixed(2),
        s.totalTax.toFixed(2),
        s.netPostTaxPnl.toFixed(2),
        s.corpusAtMonthEnd.toFixed(2),
      ]),
    ).toEqual([
      ['2020-03', 1, '10000.00', '2000.00', '8000.00', '58020.00'],
      ['2021-01', 1, '-8330.00', '0.00', '-8330.00', '70670.00'],
    ]);
  });

  it('should combine several exit dates of one month', () => {
    const summaries = service.summarize(
      replay([
        { ref: '1', stockName: 'AAA', entryPrice: '100', entryDate: '2020-01-01', exitPrice: '110', exitDate: '2020-02-03' },
        { ref: '2', stockName: 'BBB', entryPrice: '100', entryDate: '2020-01-01', exitPrice: '120', exitDate: '2020-02-20' },
      ]),
    );

    expect(summaries).toHaveLength(1);
    expect(summaries[0].tradesClosed).toBe(2);
    expect(summaries[0].totalPnl.toFixed(2)).toBe('15000.00');
    expect(summaries[0].totalTax.toFixed(2)).toBe('3000.00');
    expect(summaries[0].netPostTaxPnl.toFixed(2)).toBe('12000.00');
    expect(summaries[0].corpusAtMonthEnd.toFixed(2)).toBe('112000.00');
  });

  it('should be empty when nothing was closed', () => {
    expect(service.summarize(replay([{ ref: '1', stockName: 'AAA', entryPrice: '100', entryDate: '2020-01-01' }]))).toEqual([]);
  });
});

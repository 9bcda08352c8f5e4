import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ReplayService, ReplayResult } from './replay.service';
import { ReplayRequestDto } from './dto/replay-request.dto';
import { ReplayResponseDto } from './dto/replay-response.dto';
import { TradeInput } from './entities/trade-record.entity';
import { ReplayConfigService } from '../config/replay-config.service';
import { MonthlySummaryService } from '../reporting/monthly-summary.service';
import { toNumber, ZERO } from '../common/utils/decimal.util';
import { toDateKey } from '../common/utils/date.util';

@Controller('replay')
export class ReplayController {
  constructor(
    private readonly replayService: ReplayService,
    private readonly configService: ReplayConfigService,
    private readonly monthlySummary: MonthlySummaryService,
  ) {}

  /**
   * Replays a trade ledger and returns settled trades, the corpus trajectory
   * and monthly totals. Malformed trades come back under `rejected`.
   *
   * POST /replay
   * @returns 200 with the full replay, 422 if the run aborted
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  replay(@Body() request: ReplayRequestDto): ReplayResponseDto {
    const config = this.configService.get();
    const inputs: TradeInput[] = request.trades.map((trade, index) => ({
      ref: trade.ref ?? String(index + 1),
      stockName: trade.stockName,
      entryPrice: trade.entryPrice,
      exitPrice: trade.exitPrice,
      entryDate: trade.entryDate,
      exitDate: trade.exitDate,
    }));

    const result = this.replayService.replay(inputs, {
      initialCapital: request.initialCapital ?? config.initialCapital,
      maxStocks: request.maxStocks ?? config.maxStocks,
      stockLimitPolicy: request.stockLimitPolicy ?? config.stockLimitPolicy,
    });

    return this.toResponse(result);
  }

  private toResponse(result: ReplayResult): ReplayResponseDto {
    return {
      runId: result.runId,
      initialCapital: toNumber(result.initialCapital),
      maxStocks: result.maxStocks,
      stockLimitPolicy: result.stockLimitPolicy,
      closedTrades: result.closedTrades.map((trade) => ({
        ref: trade.trade.ref,
        stockName: trade.trade.stockName,
        entryDate: toDateKey(trade.trade.entryDate),
        entryPrice: trade.trade.entryPrice.toNumber(),
        entryAmount: toNumber(trade.entryAmount),
        quantity: trade.quantity,
        exitDate: toDateKey(trade.exitDate),
        exitPrice: trade.exitPrice.toNumber(),
        exitAmount: toNumber(trade.exitAmount),
        pnl: toNumber(trade.pnl),
        term: trade.term,
        tax: toNumber(trade.tax),
        corpusAvailable: toNumber(trade.corpusAvailable),
      })),
      openPositions: result.openPositions.map((position) => ({
        ref: position.trade.ref,
        stockName: position.trade.stockName,
        entryDate: toDateKey(position.trade.entryDate),
        entryPrice: position.trade.entryPrice.toNumber(),
        entryAmount: toNumber(position.entryAmount),
        quantity: position.quantity,
      })),
      rejected: result.rejected,
      days: result.days.map((day) => ({
        date: day.date,
        exitsSettled: day.exitsSettled,
        loss: toNumber(day.aggregate?.loss ?? ZERO),
        shortTermProfit: toNumber(day.aggregate?.shortTermProfit ?? ZERO),
        longTermProfit: toNumber(day.aggregate?.longTermProfit ?? ZERO),
        netPostTaxPnl: toNumber(day.netPostTaxPnl),
        totalTax: toNumber(day.totalTax),
        capitalReturned: toNumber(day.capitalReturned),
        corpusAfterSettlement: toNumber(day.corpusAfterSettlement),
        allocation: day.allocation ? toNumber(day.allocation) : undefined,
        entriesOpened: day.entriesOpened,
        corpusAtClose: toNumber(day.corpusAtClose),
        openPositions: day.openPositions,
      })),
      monthlySummary: this.monthlySummary.summarize(result).map((month) => ({
        month: month.month,
        tradesClosed: month.tradesClosed,
        totalPnl: toNumber(month.totalPnl),
        totalTax: toNumber(month.totalTax),
        netPostTaxPnl: toNumber(month.netPostTaxPnl),
        corpusAtMonthEnd: toNumber(month.corpusAtMonthEnd),
      })),
      violations: result.violations,
      skippedEntries: result.skippedEntries,
      totalNetPostTaxPnl: toNumber(result.totalNetPostTaxPnl),
      finalCorpus: toNumber(result.finalCorpus),
    };
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { stringify } from 'csv-stringify/sync';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { ReplayResult } from '../replay/replay.service';
import { MonthlySummary } from './monthly-summary.service';
import { toMoneyString } from '../common/utils/decimal.util';
import { formatTradeDate } from '../common/utils/date.util';

export const TRADE_HISTORY_HEADERS = [
  'Stock Name',
  'Entry date',
  'Entry price',
  'Entry Amount',
  'Quantity',
  'Exit date',
  'Exit price',
  'Exit amount',
  'PNL',
  'ST/LT',
  'Tax',
  'Corpus available',
];

export const MONTHLY_SUMMARY_HEADERS = [
  'Month',
  'Trades closed',
  'PNL',
  'Tax',
  'Net post-tax PNL',
  'Corpus available',
];

export interface WrittenReports {
  tradeHistory: string;
  monthlySummary: string;
}

/** tax-<name>.csv / monthly-<name>.csv for input file <name>.csv */
export function reportFileNames(inputPath: string): { tradeHistory: string; monthlySummary: string } {
  const base = basename(inputPath, extname(inputPath));
  return { tradeHistory: `tax-${base}.csv`, monthlySummary: `monthly-${base}.csv` };
}

// Formats replay output as CSV. Closed trades only; open positions are logged by the replay.
@Injectable()
export class TradeHistoryWriter {
  private readonly logger = new Logger(TradeHistoryWriter.name);

  tradeHistoryCsv(result: ReplayResult): string {
    const rows = result.closedTrades.map((trade) => [
      trade.trade.stockName,
      formatTradeDate(trade.trade.entryDate),
      trade.trade.entryPrice.toString(),
      toMoneyString(trade.entryAmount),
      String(trade.quantity),
      formatTradeDate(trade.exitDate),
      trade.exitPrice.toString(),
      toMoneyString(trade.exitAmount),
      toMoneyString(trade.pnl),
      trade.term,
      toMoneyString(trade.tax),
      toMoneyString(trade.corpusAvailable),
    ]);
    return stringify([TRADE_HISTORY_HEADERS, ...rows]);
  }

  monthlySummaryCsv(summaries: readonly MonthlySummary[]): string {
    const rows = summaries.map((summary) => [
      summary.month,
      String(summary.tradesClosed),
      toMoneyString(summary.totalPnl),
      toMoneyString(summary.totalTax),
      toMoneyString(summary.netPostTaxPnl),
      toMoneyString(summary.corpusAtMonthEnd),
    ]);
    return stringify([MONTHLY_SUMMARY_HEADERS, ...rows]);
  }

  async write(
    result: ReplayResult,
    summaries: readonly MonthlySummary[],
    inputPath: string,
    outputDir: string,
  ): Promise<WrittenReports> {
    await mkdir(outputDir, { recursive: true });
    const names = reportFileNames(inputPath);
    const written = {
      tradeHistory: join(outputDir, names.tradeHistory),
      monthlySummary: join(outputDir, names.monthlySummary),
    };

    await writeFile(written.tradeHistory, this.tradeHistoryCsv(result), 'utf-8');
    await writeFile(written.monthlySummary, this.monthlySummaryCsv(summaries), 'utf-8');

    this.logger.log(`Wrote ${result.closedTrades.length} trades to ${written.tradeHistory}`);
    this.logger.log(`Wrote ${summaries.length} months to ${written.monthlySummary}`);
    return written;
  }
}

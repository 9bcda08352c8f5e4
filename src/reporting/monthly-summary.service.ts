import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { ReplayResult } from '../replay/replay.service';
import { toMoney, ZERO } from '../common/utils/decimal.util';
import { toMonthKey } from '../common/utils/date.util';

export interface MonthlySummary {
  month: string;                   // yyyy-MM of the exit dates
  tradesClosed: number;
  totalPnl: Decimal;
  totalTax: Decimal;
  netPostTaxPnl: Decimal;
  corpusAtMonthEnd: Decimal;       // after the month's last settlement
}

// Rolls settled exit dates up into calendar months.
@Injectable()
export class MonthlySummaryService {
  summarize(result: ReplayResult): MonthlySummary[] {
    const months = new Map<string, MonthlySummary>();

    for (const day of result.days) {
      if (day.exitsSettled === 0) continue;

      const month = day.date.slice(0, 7);
      const summary = months.get(month) ?? {
        month,
        tradesClosed: 0,
        totalPnl: ZERO,
        totalTax: ZERO,
        netPostTaxPnl: ZERO,
        corpusAtMonthEnd: ZERO,
      };

      summary.tradesClosed += day.exitsSettled;
      summary.totalTax = toMoney(summary.totalTax.plus(day.totalTax));
      summary.netPostTaxPnl = toMoney(summary.netPostTaxPnl.plus(day.netPostTaxPnl));
      summary.corpusAtMonthEnd = day.corpusAfterSettlement;
      months.set(month, summary);
    }

    for (const trade of result.closedTrades) {
      const summary = months.get(toMonthKey(trade.exitDate));
      if (summary) {
        summary.totalPnl = toMoney(summary.totalPnl.plus(trade.pnl));
      }
    }

    return Array.from(months.values());
  }
}

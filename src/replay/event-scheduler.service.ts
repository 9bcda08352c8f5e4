import { Injectable, Logger } from '@nestjs/common';
import { RejectedTrade, TradeInput, TradeRecord } from './entities/trade-record.entity';
import { parseDecimal } from '../common/utils/decimal.util';
import { parseTradeDate, toDateKey } from '../common/utils/date.util';

// All activity of one calendar day. Exits are settled before entries are funded.
export interface DateWorkUnit {
  date: string;                 // yyyy-MM-dd
  exits: TradeRecord[];
  entries: TradeRecord[];
}

export interface ValidationOutcome {
  records: TradeRecord[];
  rejected: RejectedTrade[];
}

const byStockThenRef = (a: TradeRecord, b: TradeRecord): number =>
  compareText(a.stockName, b.stockName) || compareText(a.ref, b.ref);

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Turns raw trades into a date-ordered stream of work units.
 * Same-day ties get a stable secondary order (stock name, then ref) so
 * replays are reproducible; the settlement math does not depend on it.
 */
@Injectable()
export class EventSchedulerService {
  private readonly logger = new Logger(EventSchedulerService.name);

  /**
   * Splits inputs into valid records and rejections.
   * A bad record never stops the others from being replayed.
   */
  validate(inputs: readonly TradeInput[]): ValidationOutcome {
    const records: TradeRecord[] = [];
    const rejected: RejectedTrade[] = [];

    for (const input of inputs) {
      const result = this.toRecord(input);
      if (typeof result === 'string') {
        this.logger.warn(`Rejected trade ${input.ref} (${input.stockName ?? 'unnamed'}): ${result}`);
        rejected.push({ ref: input.ref, stockName: input.stockName, reason: result });
      } else {
        records.push(result);
      }
    }

    return { records, rejected };
  }

  schedule(records: readonly TradeRecord[]): DateWorkUnit[] {
    const units = new Map<string, DateWorkUnit>();
    const unitFor = (date: string): DateWorkUnit => {
      let unit = units.get(date);
      if (!unit) {
        unit = { date, exits: [], entries: [] };
        units.set(date, unit);
      }
      return unit;
    };

    for (const record of records) {
      unitFor(toDateKey(record.entryDate)).entries.push(record);
      if (record.exit) {
        unitFor(toDateKey(record.exit.date)).exits.push(record);
      }
    }

    return Array.from(units.values())
      .sort((a, b) => compareText(a.date, b.date))
      .map((unit) => ({
        date: unit.date,
        exits: [...unit.exits].sort(byStockThenRef),
        entries: [...unit.entries].sort(byStockThenRef),
      }));
  }

  // Returns the record, or the reason it was rejected.
  private toRecord(input: TradeInput): TradeRecord | string {
    const stockName = input.stockName?.trim();
    if (!stockName) {
      return 'missing stock name';
    }

    if (!input.entryDate?.trim()) {
      return 'missing entry date';
    }
    const entryDate = parseTradeDate(input.entryDate);
    if (!entryDate) {
      return `unparseable entry date "${input.entryDate}"`;
    }

    const entryPrice = parseDecimal(input.entryPrice);
    if (!entryPrice) {
      return 'missing or non-numeric entry price';
    }
    if (!entryPrice.greaterThan(0)) {
      return `entry price must be positive, got ${entryPrice.toString()}`;
    }

    const hasExitDate = Boolean(input.exitDate?.trim());
    const exitPrice = parseDecimal(input.exitPrice);
    const hasExitPrice = String(input.exitPrice ?? '').trim() !== '';

    if (!hasExitDate && !hasExitPrice) {
      return { ref: input.ref, stockName, entryPrice, entryDate };
    }
    if (!hasExitDate) {
      return 'exit price given without exit date';
    }
    if (!hasExitPrice) {
      return 'exit date given without exit price';
    }

    const exitDate = parseTradeDate(input.exitDate ?? '');
    if (!exitDate) {
      return `unparseable exit date "${input.exitDate}"`;
    }
    if (!exitPrice) {
      return 'non-numeric exit price';
    }
    if (!exitPrice.greaterThan(0)) {
      return `exit price must be positive, got ${exitPrice.toString()}`;
    }
    if (toDateKey(exitDate) <= toDateKey(entryDate)) {
      return `exit date ${toDateKey(exitDate)} is not after entry date ${toDateKey(entryDate)}`;
    }

    return {
      ref: input.ref,
      stockName,
      entryPrice,
      entryDate,
      exit: { price: exitPrice, date: exitDate },
    };
  }
}

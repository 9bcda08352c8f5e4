import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { CorpusLedger } from './entities/corpus-ledger.entity';
import { OpenPosition, TradeRecord } from './entities/trade-record.entity';
import { openPosition } from './trade-lifecycle';
import { divide, toDecimal, toMoneyString } from '../common/utils/decimal.util';

export interface DailyAllocation {
  date: string;
  allocation: Decimal;            // identical for every entry of the date
  ledger: CorpusLedger;           // after all entry debits
  opened: OpenPosition[];
  unfunded: TradeRecord[];        // left out because the corpus ran dry
}

export interface AllocateOptions {
  // Leave out entries whose amount exceeds what is left instead of failing.
  skipUnfunded?: boolean;
}

// Funds a date's entries from the corpus as it stands after that date's settlement.
@Injectable()
export class AllocationService {
  private readonly logger = new Logger(AllocationService.name);

  /**
   * available / N, truncated to 2dp so N allocations can never exceed the corpus.
   */
  perStockAllocation(ledger: CorpusLedger, maxStocks: number): Decimal {
    return divide(ledger.available(), toDecimal(maxStocks)).toDecimalPlaces(2, Decimal.ROUND_DOWN);
  }

  allocate(
    date: string,
    ledger: CorpusLedger,
    entries: readonly TradeRecord[],
    maxStocks: number,
    options: AllocateOptions = {},
  ): DailyAllocation {
    const allocation = this.perStockAllocation(ledger, maxStocks);
    const opened: OpenPosition[] = [];
    const unfunded: TradeRecord[] = [];
    let current = ledger;

    for (const trade of entries) {
      const position = openPosition(trade, allocation);
      if (options.skipUnfunded && position.entryAmount.greaterThan(current.available())) {
        this.logger.warn(
          `${date}: cannot fund ${trade.stockName} (ref ${trade.ref}), needs ${toMoneyString(position.entryAmount)} ` +
            `with ${current.toString()} left, entry skipped`,
        );
        unfunded.push(trade);
        continue;
      }
      current = current.debit(position.entryAmount, date);
      opened.push(position);

      this.logger.debug(
        `${date}: entered ${trade.stockName} x${position.quantity} @ ${trade.entryPrice.toString()}, ` +
          `invested ${toMoneyString(position.entryAmount)} of ${toMoneyString(allocation)}`,
      );
    }

    return { date, allocation, ledger: current, opened, unfunded };
  }
}

import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { CorpusLedger } from './entities/corpus-ledger.entity';
import { DailyExitAggregate } from './entities/daily-exit-aggregate.entity';
import { ClosedTrade, SettledTrade, TermClassification } from './entities/trade-record.entity';
import { LedgerInvariantError } from '../common/errors/replay.errors';
import { divide, sum, toMoney, toMoneyString, ZERO } from '../common/utils/decimal.util';

export const SHORT_TERM_TAX_RATE = new Decimal('0.2');
export const LONG_TERM_TAX_RATE = new Decimal('0.1');

const SHORT_TERM_KEEP = new Decimal(1).minus(SHORT_TERM_TAX_RATE);
const LONG_TERM_KEEP = new Decimal(1).minus(LONG_TERM_TAX_RATE);

// Outcome of settling every exit of one date.
export interface DailySettlement {
  date: string;
  aggregate: DailyExitAggregate;
  netShortTerm: Decimal;          // shortTermProfit − loss
  netPostTaxPnl: Decimal;
  totalTax: Decimal;              // Σ pnl − netPostTaxPnl
  capitalReturned: Decimal;       // Σ entry amounts of the exited trades
  ledger: CorpusLedger;           // after the single credit
  trades: SettledTrade[];
}

/**
 * Settles a date's exits as one batch: bucket, apply the tiered formula,
 * credit principal + post-tax result once, then attribute tax per trade.
 */
@Injectable()
export class TaxSettlementService {
  private readonly logger = new Logger(TaxSettlementService.name);

  settle(date: string, ledger: CorpusLedger, exits: readonly ClosedTrade[]): DailySettlement {
    const aggregate = this.aggregate(exits);
    const netShortTerm = aggregate.shortTermProfit.minus(aggregate.loss);
    const netPostTaxPnl = this.netPostTaxPnl(aggregate);
    const capitalReturned = sum(exits, (t) => t.entryAmount);

    const settledLedger = ledger.credit(capitalReturned.plus(netPostTaxPnl));

    const totalPnl = sum(exits, (t) => t.pnl);
    const totalTax = totalPnl.minus(netPostTaxPnl);
    const taxes = this.attributeTax(date, exits, netShortTerm, totalTax);

    const trades = exits.map((trade) => ({
      ...trade,
      tax: taxes.get(trade) ?? ZERO,
      corpusAvailable: settledLedger.available(),
    }));

    const attributed = sum(trades, (t) => t.tax);
    if (!totalPnl.minus(attributed).equals(netPostTaxPnl)) {
      throw new LedgerInvariantError(
        `Per-trade tax ${toMoneyString(attributed)} does not reconcile PNL ${toMoneyString(totalPnl)} with net post-tax PNL ${toMoneyString(netPostTaxPnl)}`,
        date,
      );
    }

    this.logger.debug(
      `${date}: loss=${toMoneyString(aggregate.loss)} st=${toMoneyString(aggregate.shortTermProfit)} ` +
        `lt=${toMoneyString(aggregate.longTermProfit)} net=${toMoneyString(netPostTaxPnl)} ` +
        `returned=${toMoneyString(capitalReturned)} corpus=${settledLedger.toString()}`,
    );

    return {
      date,
      aggregate,
      netShortTerm,
      netPostTaxPnl,
      totalTax,
      capitalReturned,
      ledger: settledLedger,
      trades,
    };
  }

  /** Buckets exits by sign and term. A zero PNL lands in its term's profit bucket. */
  aggregate(exits: readonly ClosedTrade[]): DailyExitAggregate {
    let loss = ZERO;
    let shortTermProfit = ZERO;
    let longTermProfit = ZERO;

    for (const trade of exits) {
      if (trade.pnl.isNegative()) {
        loss = loss.plus(trade.pnl.abs());
      } else if (trade.term === TermClassification.LONG_TERM) {
        longTermProfit = longTermProfit.plus(trade.pnl);
      } else {
        shortTermProfit = shortTermProfit.plus(trade.pnl);
      }
    }

    return {
      loss: toMoney(loss),
      shortTermProfit: toMoney(shortTermProfit),
      longTermProfit: toMoney(longTermProfit),
    };
  }

  /**
   * Tiered formula over one date's aggregate:
   *  - net ST gain: 20% on net ST, 10% on LT
   *  - net ST nil: 10% on LT
   *  - net ST loss covered by LT: remaining loss nets against LT, 10% on the rest
   *  - losses beyond all profits: the net loss passes through untaxed (negative result)
   */
  netPostTaxPnl({ loss, shortTermProfit, longTermProfit }: DailyExitAggregate): Decimal {
    const netShortTerm = shortTermProfit.minus(loss);
    let result: Decimal;

    if (netShortTerm.greaterThan(0)) {
      result = netShortTerm.times(SHORT_TERM_KEEP).plus(longTermProfit.times(LONG_TERM_KEEP));
    } else if (netShortTerm.isZero()) {
      result = longTermProfit.times(LONG_TERM_KEEP);
    } else if (loss.greaterThan(shortTermProfit.plus(longTermProfit))) {
      result = loss.minus(longTermProfit).minus(shortTermProfit).negated();
    } else {
      result = longTermProfit.minus(loss.minus(shortTermProfit)).times(LONG_TERM_KEEP);
    }

    return toMoney(result);
  }

  // ST tax goes to ST winners, whatever is left of the day's tax to LT winners,
  // each prorated by PNL. Losers carry none.
  private attributeTax(
    date: string,
    exits: readonly ClosedTrade[],
    netShortTerm: Decimal,
    totalTax: Decimal,
  ): Map<ClosedTrade, Decimal> {
    const winners = exits.filter((t) => t.pnl.greaterThan(0));
    const shortTermWinners = winners.filter((t) => t.term === TermClassification.SHORT_TERM);
    const longTermWinners = winners.filter((t) => t.term === TermClassification.LONG_TERM);

    let shortTermTax = netShortTerm.greaterThan(0) ? toMoney(netShortTerm.times(SHORT_TERM_TAX_RATE)) : ZERO;
    let longTermTax = totalTax.minus(shortTermTax);

    // Rounding residue with nobody in its bucket moves to the other bucket.
    if (longTermWinners.length === 0) {
      shortTermTax = shortTermTax.plus(longTermTax);
      longTermTax = ZERO;
    } else if (shortTermWinners.length === 0) {
      longTermTax = longTermTax.plus(shortTermTax);
      shortTermTax = ZERO;
    }

    const buckets: Array<[readonly ClosedTrade[], Decimal]> = [
      [shortTermWinners, shortTermTax],
      [longTermWinners, longTermTax],
    ];

    const taxes = new Map<ClosedTrade, Decimal>();
    for (const [bucket, bucketTax] of buckets) {
      if (bucketTax.isZero()) continue;
      if (bucket.length === 0) {
        throw new LedgerInvariantError(`Tax ${toMoneyString(bucketTax)} has no profitable trade to attribute to`, date);
      }
      prorate(bucketTax, bucket).forEach((share, trade) => taxes.set(trade, share));
    }
    return taxes;
  }
}

// Splits `total` across trades by PNL weight, 2dp each; the rounding residue goes to the largest PNL.
function prorate(total: Decimal, trades: readonly ClosedTrade[]): Map<ClosedTrade, Decimal> {
  const weight = sum(trades, (t) => t.pnl);
  const shares = new Map<ClosedTrade, Decimal>();
  let largest = trades[0];

  for (const trade of trades) {
    shares.set(trade, toMoney(divide(total.times(trade.pnl), weight)));
    if (trade.pnl.greaterThan(largest.pnl)) {
      largest = trade;
    }
  }

  const residue = total.minus(sum(trades, (t) => shares.get(t) ?? ZERO));
  if (!residue.isZero()) {
    shares.set(largest, (shares.get(largest) ?? ZERO).plus(residue));
  }
  return shares;
}

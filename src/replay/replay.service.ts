import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { CorpusLedger } from './entities/corpus-ledger.entity';
import { DailyExitAggregate } from './entities/daily-exit-aggregate.entity';
import { ClosedTrade, OpenPosition, RejectedTrade, SettledTrade, TradeInput, TradeRecord } from './entities/trade-record.entity';
import { DateWorkUnit, EventSchedulerService } from './event-scheduler.service';
import { TaxSettlementService } from './tax-settlement.service';
import { AllocationService } from './allocation.service';
import { closePosition } from './trade-lifecycle';
import { StockLimitPolicy } from '../config/replay-config';
import { LedgerInvariantError, StockLimitExceededError } from '../common/errors/replay.errors';
import { sum, toDecimal, toMoney, toMoneyString, ZERO } from '../common/utils/decimal.util';

export interface ReplayOptions {
  initialCapital: Decimal | number | string;
  maxStocks: number;
  stockLimitPolicy: StockLimitPolicy;
}

// One line of the corpus trajectory.
export interface ReplayDay {
  date: string;
  exitsSettled: number;
  aggregate?: DailyExitAggregate;
  netPostTaxPnl: Decimal;             // zero on dates without exits
  totalTax: Decimal;
  capitalReturned: Decimal;
  corpusAfterSettlement: Decimal;     // what this date's entries were allocated from
  allocation?: Decimal;
  entriesOpened: number;
  corpusAtClose: Decimal;
  openPositions: number;
}

export interface StockLimitViolation {
  date: string;
  openPositions: number;              // already open plus the date's entries
  maxStocks: number;
}

export enum SkipReason {
  NO_FREE_SLOT = 'no free slot',
  INSUFFICIENT_CORPUS = 'insufficient corpus',
}

export interface SkippedEntry {
  date: string;
  ref: string;
  stockName: string;
  reason: SkipReason;
}

export interface ReplayResult {
  runId: string;
  initialCapital: Decimal;
  maxStocks: number;
  stockLimitPolicy: StockLimitPolicy;
  closedTrades: SettledTrade[];       // exit date, then stock name
  openPositions: OpenPosition[];      // still held when the data ran out
  rejected: RejectedTrade[];
  days: ReplayDay[];
  violations: StockLimitViolation[];
  skippedEntries: SkippedEntry[];
  totalNetPostTaxPnl: Decimal;
  finalCorpus: Decimal;
}

// Everything carried from one date to the next.
export interface ReplayState {
  ledger: CorpusLedger;
  open: ReadonlyMap<TradeRecord, OpenPosition>;
  skipped: ReadonlySet<TradeRecord>;
}

export interface DateOutcome {
  state: ReplayState;
  day: ReplayDay;
  settled: SettledTrade[];
  violation?: StockLimitViolation;
  skipped: SkippedEntry[];
}

/**
 * Walks the scheduled dates in order, threading the ledger and open positions
 * through `processDate`. Holds no state between runs.
 */
@Injectable()
export class ReplayService {
  private readonly logger = new Logger(ReplayService.name);

  constructor(
    private readonly scheduler: EventSchedulerService,
    private readonly settlement: TaxSettlementService,
    private readonly allocator: AllocationService,
  ) {}

  replay(inputs: readonly TradeInput[], options: ReplayOptions): ReplayResult {
    const runId = uuidv4();
    const { records, rejected } = this.scheduler.validate(inputs);
    const units = this.scheduler.schedule(records);

    this.logger.log(
      `Run ${runId}: ${records.length} trades over ${units.length} dates ` +
        `(${rejected.length} rejected), X=${toMoneyString(toDecimal(options.initialCapital))}, N=${options.maxStocks}`,
    );

    let state: ReplayState = {
      ledger: CorpusLedger.open(options.initialCapital),
      open: new Map(),
      skipped: new Set(),
    };
    const initialCapital = state.ledger.available();

    const closedTrades: SettledTrade[] = [];
    const days: ReplayDay[] = [];
    const violations: StockLimitViolation[] = [];
    const skippedEntries: SkippedEntry[] = [];

    for (const unit of units) {
      const outcome = this.processDate(state, unit, options);
      state = outcome.state;
      days.push(outcome.day);
      closedTrades.push(...outcome.settled);
      skippedEntries.push(...outcome.skipped);
      if (outcome.violation) {
        violations.push(outcome.violation);
      }
    }

    const openPositions = Array.from(state.open.values());
    const totalNetPostTaxPnl = sum(days, (d) => d.netPostTaxPnl);
    const finalCorpus = state.ledger.available();

    this.checkConservation(initialCapital, totalNetPostTaxPnl, finalCorpus, openPositions);

    for (const position of openPositions) {
      this.logger.log(`Open at end of data: ${position.trade.stockName} (ref ${position.trade.ref}), not settled`);
    }
    this.logger.log(
      `Run ${runId}: ${closedTrades.length} closed, ${openPositions.length} open, final corpus ${toMoneyString(finalCorpus)}`,
    );

    return {
      runId,
      initialCapital,
      maxStocks: options.maxStocks,
      stockLimitPolicy: options.stockLimitPolicy,
      closedTrades,
      openPositions,
      rejected,
      days,
      violations,
      skippedEntries,
      totalNetPostTaxPnl,
      finalCorpus,
    };
  }

  /**
   * One calendar date: settle every exit, then fund every entry from the
   * settled corpus. Does not mutate `state`.
   */
  processDate(state: ReplayState, unit: DateWorkUnit, options: ReplayOptions): DateOutcome {
    const { date } = unit;
    const open = new Map(state.open);
    let ledger = state.ledger;

    const closing: ClosedTrade[] = [];
    for (const trade of unit.exits) {
      const position = open.get(trade);
      if (position) {
        open.delete(trade);
        closing.push(closePosition(position));
      } else if (state.skipped.has(trade)) {
        this.logger.debug(`${date}: ignoring exit of ${trade.stockName} (ref ${trade.ref}), entry was skipped`);
      } else {
        throw new LedgerInvariantError(`Exit of ${trade.stockName} (ref ${trade.ref}) has no open position`, date);
      }
    }

    const settlement = closing.length > 0 ? this.settlement.settle(date, ledger, closing) : undefined;
    if (settlement) {
      ledger = settlement.ledger;
    }
    const corpusAfterSettlement = ledger.available();

    // Checked before funding so the violation is reported even when the corpus runs dry.
    let violation: StockLimitViolation | undefined;
    const requested = open.size + unit.entries.length;
    if (requested > options.maxStocks) {
      if (options.stockLimitPolicy === StockLimitPolicy.ABORT) {
        throw new StockLimitExceededError(requested, options.maxStocks, date);
      }
      violation = { date, openPositions: requested, maxStocks: options.maxStocks };
      this.logger.warn(`${date}: ${requested} positions requested, exceeding the limit of ${options.maxStocks}`);
    }

    const { toOpen, skipped } = this.applyStockLimit(unit, open.size, options);
    const funded =
      toOpen.length > 0
        ? this.allocator.allocate(date, ledger, toOpen, options.maxStocks, {
            skipUnfunded: options.stockLimitPolicy === StockLimitPolicy.WARN,
          })
        : undefined;
    if (funded) {
      ledger = funded.ledger;
      for (const position of funded.opened) {
        open.set(position.trade, position);
      }
      skipped.push(...funded.unfunded.map((trade) => ({ trade, reason: SkipReason.INSUFFICIENT_CORPUS })));
    }

    const skippedRecords = new Set(state.skipped);
    skipped.forEach(({ trade }) => skippedRecords.add(trade));

    return {
      state: { ledger, open, skipped: skippedRecords },
      day: {
        date,
        exitsSettled: closing.length,
        aggregate: settlement?.aggregate,
        netPostTaxPnl: settlement?.netPostTaxPnl ?? ZERO,
        totalTax: settlement?.totalTax ?? ZERO,
        capitalReturned: settlement?.capitalReturned ?? ZERO,
        corpusAfterSettlement,
        allocation: funded?.allocation,
        entriesOpened: funded?.opened.length ?? 0,
        corpusAtClose: ledger.available(),
        openPositions: open.size,
      },
      settled: settlement?.trades ?? [],
      violation,
      skipped: skipped.map(({ trade, reason }) => ({ date, ref: trade.ref, stockName: trade.stockName, reason })),
    };
  }

  // Under CAP, entries beyond the free slots are skipped in scheduler order.
  private applyStockLimit(
    unit: DateWorkUnit,
    openCount: number,
    options: ReplayOptions,
  ): { toOpen: TradeRecord[]; skipped: Array<{ trade: TradeRecord; reason: SkipReason }> } {
    if (options.stockLimitPolicy !== StockLimitPolicy.CAP) {
      return { toOpen: unit.entries, skipped: [] };
    }

    const freeSlots = Math.max(0, options.maxStocks - openCount);
    const excess = unit.entries.slice(freeSlots);
    excess.forEach((trade) =>
      this.logger.warn(`${unit.date}: no free slot for ${trade.stockName} (ref ${trade.ref}), entry skipped`),
    );
    return {
      toOpen: unit.entries.slice(0, freeSlots),
      skipped: excess.map((trade) => ({ trade, reason: SkipReason.NO_FREE_SLOT })),
    };
  }

  // final corpus + principal still invested == X + Σ net post-tax PNL
  private checkConservation(
    initialCapital: Decimal,
    totalNetPostTaxPnl: Decimal,
    finalCorpus: Decimal,
    openPositions: readonly OpenPosition[],
  ): void {
    const held = sum(openPositions, (p) => p.entryAmount);
    const expected = toMoney(initialCapital.plus(totalNetPostTaxPnl));
    const actual = toMoney(finalCorpus.plus(held));

    if (!actual.equals(expected)) {
      throw new LedgerInvariantError(
        `Capital not conserved: corpus ${toMoneyString(finalCorpus)} + invested ${toMoneyString(held)} ` +
          `!= initial ${toMoneyString(initialCapital)} + net post-tax PNL ${toMoneyString(totalNetPostTaxPnl)}`,
      );
    }
  }
}

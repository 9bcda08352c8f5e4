import Decimal from 'decimal.js';
import { ClosedTrade, OpenPosition, TermClassification, TradeRecord } from './entities/trade-record.entity';
import { floorQuantity, toMoney } from '../common/utils/decimal.util';
import { isLongTermHolding } from '../common/utils/date.util';

/**
 * Freezes the entry side of a trade against the allocation available on its entry date.
 * The unspent floor remainder is not part of the entry amount.
 */
export function openPosition(trade: TradeRecord, allocation: Decimal): OpenPosition {
  const quantity = allocation.greaterThan(0) ? floorQuantity(allocation, trade.entryPrice) : 0;

  return {
    trade,
    allocation,
    quantity,
    entryAmount: toMoney(trade.entryPrice.times(quantity)),
  };
}

/**
 * Freezes the exit side. Quantity is carried over from entry, never recomputed.
 */
export function closePosition(position: OpenPosition): ClosedTrade {
  const { exit } = position.trade;
  if (!exit) {
    throw new Error(`Trade ${position.trade.ref} (${position.trade.stockName}) has no exit to close`);
  }

  const exitAmount = toMoney(exit.price.times(position.quantity));
  const pnl = toMoney(exitAmount.minus(position.entryAmount));

  return {
    ...position,
    exitPrice: exit.price,
    exitDate: exit.date,
    exitAmount,
    pnl,
    term: isLongTermHolding(position.trade.entryDate, exit.date)
      ? TermClassification.LONG_TERM
      : TermClassification.SHORT_TERM,
  };
}

import Decimal from 'decimal.js';

export enum TermClassification {
  SHORT_TERM = 'ST',
  LONG_TERM = 'LT',
}

// Raw trade as handed over by a reader (CSV file or HTTP body).
// Nothing is trusted yet; the scheduler validates before anything is replayed.
export interface TradeInput {
  ref: string;                       // serial no. or position, for diagnostics
  stockName?: string;
  entryPrice?: number | string;
  exitPrice?: number | string;
  entryDate?: string;
  exitDate?: string;
}

// Validated trade, ready to be scheduled.
export interface TradeRecord {
  ref: string;
  stockName: string;
  entryPrice: Decimal;
  entryDate: Date;
  exit?: {
    price: Decimal;
    date: Date;
  };
}

// Entry side frozen when the entry event fires.
export interface OpenPosition {
  trade: TradeRecord;
  allocation: Decimal;               // per-stock allocation on the entry date
  quantity: number;                  // floor(allocation / entryPrice)
  entryAmount: Decimal;              // quantity × entryPrice, 2dp
}

// Exit side frozen when the exit event fires; immutable afterwards.
export interface ClosedTrade extends OpenPosition {
  exitPrice: Decimal;
  exitDate: Date;
  exitAmount: Decimal;               // quantity × exitPrice, 2dp
  pnl: Decimal;                      // exitAmount − entryAmount, 2dp
  term: TermClassification;
}

// Closed trade after its exit date settled.
export interface SettledTrade extends ClosedTrade {
  tax: Decimal;
  corpusAvailable: Decimal;          // corpus right after the exit date settled
}

export interface RejectedTrade {
  ref: string;
  stockName?: string;
  reason: string;
}

export type ReplayErrorCode =
  | 'OVER_ALLOCATION'
  | 'STOCK_LIMIT_EXCEEDED'
  | 'LEDGER_INVARIANT'
  | 'INVALID_CONFIG';

/**
 * Fatal for the current run. Anything thrown as a ReplayError aborts the
 * replay; per-record problems are collected as rejections instead.
 */
export abstract class ReplayError extends Error {
  abstract readonly code: ReplayErrorCode;

  constructor(message: string, readonly date?: string) {
    super(date ? `[${date}] ${message}` : message);
    this.name = new.target.name;
  }
}

// Entry debit larger than the corpus. Unreachable unless allocation math is broken.
export class OverAllocationError extends ReplayError {
  readonly code = 'OVER_ALLOCATION';

  constructor(amount: string, available: string, date?: string) {
    super(`Cannot debit ${amount}: only ${available} available in corpus`, date);
  }
}

export class StockLimitExceededError extends ReplayError {
  readonly code = 'STOCK_LIMIT_EXCEEDED';

  constructor(openCount: number, maxStocks: number, date: string) {
    super(`${openCount} open positions exceed the limit of ${maxStocks}`, date);
  }
}

export class LedgerInvariantError extends ReplayError {
  readonly code = 'LEDGER_INVARIANT';
}

export class InvalidConfigError extends ReplayError {
  readonly code = 'INVALID_CONFIG';
}

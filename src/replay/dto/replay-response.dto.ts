// Closed trade as reported to callers
export class SettledTradeDto {
  ref!: string;
  stockName!: string;
  entryDate!: string;              // yyyy-MM-dd
  entryPrice!: number;
  entryAmount!: number;
  quantity!: number;
  exitDate!: string;
  exitPrice!: number;
  exitAmount!: number;
  pnl!: number;
  term!: string;                   // ST | LT
  tax!: number;
  corpusAvailable!: number;        // right after the exit date settled
}

export class OpenPositionDto {
  ref!: string;
  stockName!: string;
  entryDate!: string;
  entryPrice!: number;
  entryAmount!: number;
  quantity!: number;
}

// Corpus trajectory, one entry per date with activity
export class ReplayDayDto {
  date!: string;
  exitsSettled!: number;
  loss!: number;
  shortTermProfit!: number;
  longTermProfit!: number;
  netPostTaxPnl!: number;
  totalTax!: number;
  capitalReturned!: number;
  corpusAfterSettlement!: number;
  allocation?: number;
  entriesOpened!: number;
  corpusAtClose!: number;
  openPositions!: number;
}

export class MonthlySummaryDto {
  month!: string;                  // yyyy-MM
  tradesClosed!: number;
  totalPnl!: number;
  totalTax!: number;
  netPostTaxPnl!: number;
  corpusAtMonthEnd!: number;
}

export class ReplayResponseDto {
  runId!: string;
  initialCapital!: number;
  maxStocks!: number;
  stockLimitPolicy!: string;
  closedTrades!: SettledTradeDto[];
  openPositions!: OpenPositionDto[];
  rejected!: { ref: string; stockName?: string; reason: string }[];
  days!: ReplayDayDto[];
  monthlySummary!: MonthlySummaryDto[];
  violations!: { date: string; openPositions: number; maxStocks: number }[];
  skippedEntries!: { date: string; ref: string; stockName: string; reason: string }[];
  totalNetPostTaxPnl!: number;
  finalCorpus!: number;
}

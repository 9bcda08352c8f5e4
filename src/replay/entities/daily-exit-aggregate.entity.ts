import Decimal from 'decimal.js';

// Bucketed totals for one exit date. Losses are stored as positive magnitudes.
export interface DailyExitAggregate {
  loss: Decimal;
  shortTermProfit: Decimal;
  longTermProfit: Decimal;
}

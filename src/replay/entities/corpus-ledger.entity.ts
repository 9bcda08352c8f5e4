import Decimal from 'decimal.js';
import { OverAllocationError, LedgerInvariantError } from '../../common/errors/replay.errors';
import { toDecimal, toMoney, toMoneyString } from '../../common/utils/decimal.util';

// Capital not committed to an open position.
// Immutable: debit/credit return the next ledger so each replay step stays a pure function.
export class CorpusLedger {
  private constructor(private readonly balance: Decimal) {}

  static open(initialCapital: Decimal | number | string): CorpusLedger {
    const capital = toMoney(toDecimal(initialCapital));
    if (capital.isNegative()) {
      throw new LedgerInvariantError(`Initial capital must not be negative, got ${toMoneyString(capital)}`);
    }
    return new CorpusLedger(capital);
  }

  available(): Decimal {
    return this.balance;
  }

  /**
   * Commits capital to a new position.
   * @throws OverAllocationError if amount exceeds what is available
   */
  debit(amount: Decimal, date?: string): CorpusLedger {
    if (amount.isNegative()) {
      throw new LedgerInvariantError(`Debit amount must not be negative, got ${toMoneyString(amount)}`, date);
    }
    if (amount.greaterThan(this.balance)) {
      throw new OverAllocationError(toMoneyString(amount), toMoneyString(this.balance), date);
    }
    return new CorpusLedger(toMoney(this.balance.minus(amount)));
  }

  /** Returns principal plus post-tax result. A net loss arrives as a smaller (or negative) amount. */
  credit(amount: Decimal): CorpusLedger {
    return new CorpusLedger(toMoney(this.balance.plus(amount)));
  }

  toString(): string {
    return toMoneyString(this.balance);
  }
}

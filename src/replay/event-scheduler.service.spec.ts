import { Test, TestingModule } from '@nestjs/testing';
import { EventSchedulerService } from './event-scheduler.service';
import { TradeInput } from './entities/trade-record.entity';

describe('EventSchedulerService', () => {
  let service: EventSchedulerService;
  let refCounter = 1;

  const createInput = (overrides: Partial<TradeInput>): TradeInput => ({
    ref: String(refCounter++),
    stockName: 'ALPHA',
    entryPrice: '100',
    entryDate: '2020-01-01',
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [EventSchedulerService],
    }).compile();

    service = module.get<EventSchedulerService>(EventSchedulerService);
    refCounter = 1;
  });

  describe('validate', () => {
    it('should accept open and closed trades', () => {
      const { records, rejected } = service.validate([
        createInput({}),
        createInput({ exitPrice: '1,250.50', exitDate: '01-Mar-20' }),
      ]);

      expect(rejected).toEqual([]);
      expect(records).toHaveLength(2);
      expect(records[0].exit).toBeUndefined();
      expect(records[1].exit?.price.toString()).toBe('1250.5');
    });

    it.each<[Partial<TradeInput>, string]>([
      [{ stockName: '  ' }, 'missing stock name'],
      [{ entryDate: '' }, 'missing entry date'],
      [{ entryDate: 'someday' }, 'unparseable entry date "someday"'],
      [{ entryPrice: 'n/a' }, 'missing or non-numeric entry price'],
      [{ entryPrice: '0' }, 'entry price must be positive, got 0'],
      [{ exitPrice: '110' }, 'exit price given without exit date'],
      [{ exitDate: '2020-02-01' }, 'exit date given without exit price'],
      [{ exitPrice: '110', exitDate: '2020-02-30' }, 'unparseable exit date "2020-02-30"'],
      [{ exitPrice: '-5', exitDate: '2020-02-01' }, 'exit price must be positive, got -5'],
      [{ exitPrice: '110', exitDate: '2020-01-01' }, 'exit date 2020-01-01 is not after entry date 2020-01-01'],
      [{ exitPrice: '110', exitDate: '2019-12-31' }, 'exit date 2019-12-31 is not after entry date 2020-01-01'],
    ])('should reject %j', (overrides, reason) => {
      const { records, rejected } = service.validate([createInput(overrides)]);

      expect(records).toHaveLength(0);
      expect(rejected).toEqual([{ ref: '1', stockName: overrides.stockName ?? 'ALPHA', reason }]);
    });

    it('should keep processing the other records after a rejection', () => {
      const { records, rejected } = service.validate([
        createInput({ stockName: 'GOOD' }),
        createInput({ stockName: 'BAD', entryDate: undefined }),
        createInput({ stockName: 'ALSO_GOOD' }),
      ]);

      expect(records.map((r) => r.stockName)).toEqual(['GOOD', 'ALSO_GOOD']);
      expect(rejected).toEqual([{ ref: '2', stockName: 'BAD', reason: 'missing entry date' }]);
    });
  });

  describe('schedule', () => {
    it('should order dates ascending regardless of input order', () => {
      const { records } = service.validate([
        createInput({ stockName: 'LATE', entryDate: '2020-05-01' }),
        createInput({ stockName: 'EARLY', entryDate: '2020-01-01' }),
      ]);

      expect(service.schedule(records).map((u) => u.date)).toEqual(['2020-01-01', '2020-05-01']);
    });

    it('should put an exit and an entry on the same date in one unit', () => {
      const { records } = service.validate([
        createInput({ stockName: 'FIRST', entryDate: '2020-01-01', exitPrice: '120', exitDate: '2020-02-01' }),
        createInput({ stockName: 'SECOND', entryDate: '2020-02-01' }),
      ]);

      const units = service.schedule(records);

      expect(units).toHaveLength(2);
      expect(units[1].date).toBe('2020-02-01');
      expect(units[1].exits.map((t) => t.stockName)).toEqual(['FIRST']);
      expect(units[1].entries.map((t) => t.stockName)).toEqual(['SECOND']);
    });

    it('should order same-day events by stock name then ref', () => {
      const { records } = service.validate([
        createInput({ stockName: 'ZETA' }),
        createInput({ stockName: 'ALPHA' }),
        createInput({ stockName: 'ALPHA' }),
      ]);

      const [unit] = service.schedule(records);

      expect(unit.entries.map((t) => `${t.stockName}#${t.ref}`)).toEqual(['ALPHA#2', 'ALPHA#3', 'ZETA#1']);
    });

    it('should not schedule exits for open trades', () => {
      const { records } = service.validate([createInput({})]);
      const units = service.schedule(records);

      expect(units).toHaveLength(1);
      expect(units[0].exits).toEqual([]);
    });
  });
});

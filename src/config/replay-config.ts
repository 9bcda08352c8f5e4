import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsNumber, IsString, Max, Min } from 'class-validator';

// What to do when a date's entries push open positions past the limit.
export enum StockLimitPolicy {
  WARN = 'warn',     // proceed, report the violation, skip what the corpus cannot fund
  CAP = 'cap',       // open only what fits, report the rest as skipped
  ABORT = 'abort',   // fail the run
}

export class ReplayConfig {
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  initialCapital: number = 2_000_000;   // X

  @Type(() => Number)
  @IsInt()
  @Min(1)
  maxStocks: number = 20;               // N

  @IsEnum(StockLimitPolicy)
  stockLimitPolicy: StockLimitPolicy = StockLimitPolicy.WARN;

  @IsString()
  @IsNotEmpty()
  inputDir: string = 'input';

  @IsString()
  @IsNotEmpty()
  outputDir: string = 'output';

  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(65535)
  port: number = 3000;
}

export type ReplayConfigOverrides = Partial<Record<keyof ReplayConfig, string | number>>;

#!/usr/bin/env node
import 'reflect-metadata';
import { DynamicModule, Logger, LogLevel, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError } from 'commander';
import { readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname, join } from 'node:path';
import { ConfigSource, ReplayConfigService } from './config/replay-config.service';
import { ReplayConfigModule } from './config/replay-config.module';
import { ReplayConfigOverrides, StockLimitPolicy } from './config/replay-config';
import { ReplayModule } from './replay/replay.module';
import { ReplayService } from './replay/replay.service';
import { ReportingModule } from './reporting/reporting.module';
import { MonthlySummaryService } from './reporting/monthly-summary.service';
import { TradeHistoryWriter } from './reporting/trade-history.writer';
import { IngestionModule } from './ingestion/ingestion.module';
import { TradeCsvReader } from './ingestion/trade-csv.reader';
import { toMoneyString } from './common/utils/decimal.util';

export interface CliOptions {
  input?: string;
  config?: string;
  initialCapital?: number;
  maxStocks?: number;
  stockLimitPolicy?: StockLimitPolicy;
  outputDir?: string;
  verbose?: boolean;
}

@Module({})
class CliModule {
  static register(source: ConfigSource): DynamicModule {
    return {
      module: CliModule,
      imports: [ReplayConfigModule.forRoot(source), ReplayModule, ReportingModule, IngestionModule],
    };
  }
}

/** First *.csv in the directory, else first *.txt (some exports use .txt for CSV). */
export async function findInputFile(inputDir: string): Promise<string | undefined> {
  if (!existsSync(inputDir)) {
    return undefined;
  }
  const files = (await readdir(inputDir)).sort();
  const pick = files.find((f) => extname(f).toLowerCase() === '.csv') ?? files.find((f) => extname(f).toLowerCase() === '.txt');
  return pick ? join(inputDir, pick) : undefined;
}

function parseAmount(value: string): number {
  const amount = Number(value);
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvalidArgumentError('must be a non-negative number');
  }
  return amount;
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return count;
}

function parsePolicy(value: string): StockLimitPolicy {
  const policy = Object.values(StockLimitPolicy).find((p) => p === value);
  if (!policy) {
    throw new InvalidArgumentError(`must be one of ${Object.values(StockLimitPolicy).join(', ')}`);
  }
  return policy;
}

export function buildProgram(run: (options: CliOptions) => Promise<void>): Command {
  return new Command()
    .name('replay')
    .description('Replay a trade ledger against the corpus and settle capital-gains tax per exit date')
    .option('-i, --input <file>', 'input CSV (default: first CSV in the input directory)')
    .option('-c, --config <file>', 'JSON configuration file (default: $REPLAY_CONFIG or config.json)')
    .option('-x, --initial-capital <amount>', 'initial capital X (overrides config)', parseAmount)
    .option('-n, --max-stocks <count>', 'maximum concurrent stocks N (overrides config)', parseCount)
    .option('-p, --stock-limit-policy <policy>', 'warn | cap | abort when N is exceeded', parsePolicy)
    .option('-o, --output-dir <dir>', 'directory for the CSV reports (overrides config)')
    .option('-v, --verbose', 'debug logging', false)
    .action(run);
}

async function run(options: CliOptions): Promise<void> {
  const logLevels: LogLevel[] = options.verbose
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const app = await NestFactory.createApplicationContext(CliModule.register({ configFile: options.config }), {
    logger: logLevels,
  });

  try {
    const overrides: ReplayConfigOverrides = {
      initialCapital: options.initialCapital,
      maxStocks: options.maxStocks,
      stockLimitPolicy: options.stockLimitPolicy,
      outputDir: options.outputDir,
    };
    const config = app.get(ReplayConfigService).applyOverrides(overrides);

    const input = options.input ?? (await findInputFile(config.inputDir));
    if (!input) {
      throw new Error(`No input file given and no CSV files found in ${config.inputDir}`);
    }
    if (!existsSync(input)) {
      throw new Error(`Input file not found: ${input}`);
    }

    const { trades, rejected: unreadable } = await app.get(TradeCsvReader).read(input);
    const result = app.get(ReplayService).replay(trades, {
      initialCapital: config.initialCapital,
      maxStocks: config.maxStocks,
      stockLimitPolicy: config.stockLimitPolicy,
    });
    const summaries = app.get(MonthlySummaryService).summarize(result);
    const written = await app.get(TradeHistoryWriter).write(result, summaries, input, config.outputDir);

    for (const row of unreadable) {
      Logger.warn(`Skipped ${row.ref}${row.stockName ? ` (${row.stockName})` : ''}: ${row.reason}`, 'Replay');
    }

    console.log('\nProcessing complete!');
    console.log(`Processed ${result.closedTrades.length} trades`);
    console.log(`Open positions: ${result.openPositions.length}`);
    console.log(`Rejected rows: ${unreadable.length + result.rejected.length}`);
    console.log(`Stock-limit violations: ${result.violations.length}`);
    console.log(`Final corpus: ${toMoneyString(result.finalCorpus)}`);
    console.log(`Output file: ${written.tradeHistory}`);
    console.log(`Monthly summary: ${written.monthlySummary}`);
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  buildProgram(run)
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      Logger.error(error instanceof Error ? error.message : String(error), 'Replay');
      process.exitCode = 1;
    });
}

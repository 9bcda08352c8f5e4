import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { readFile } from 'node:fs/promises';
import { RejectedTrade, TradeInput } from '../replay/entities/trade-record.entity';

// Positional layout of a ledger export
export const LEDGER_COLUMNS = {
  serialNo: 0,
  stockName: 1,
  entryPrice: 2,
  exitPrice: 3,
  entryDate: 6,
  exitDate: 7,
} as const;

const MIN_COLUMNS = LEDGER_COLUMNS.exitDate + 1;
const SNIFF_LINES = 5;

export interface CsvReadResult {
  trades: TradeInput[];
  rejected: RejectedTrade[];
}

/** Tab wins if present, then comma, then semicolon. */
export function detectDelimiter(content: string): string {
  const sample = content.split(/\r?\n/).slice(0, SNIFF_LINES).join('\n');
  if (sample.includes('\t')) return '\t';
  if (sample.includes(',')) return ',';
  return ';';
}

/**
 * Reads a ledger export into raw trade inputs. Only the row shape is checked
 * here; field contents are validated by the scheduler. Reading stops at the
 * first blank row.
 */
@Injectable()
export class TradeCsvReader {
  private readonly logger = new Logger(TradeCsvReader.name);

  async read(filePath: string): Promise<CsvReadResult> {
    const content = await readFile(filePath, 'utf-8');
    const result = this.parse(content);
    this.logger.log(`Parsed ${result.trades.length} rows from ${filePath} (${result.rejected.length} rejected)`);
    return result;
  }

  parse(content: string): CsvReadResult {
    const text = content.replace(/^\uFEFF/, '');
    const delimiter = detectDelimiter(text);
    this.logger.debug(`Detected delimiter ${JSON.stringify(delimiter)}`);

    const rows: string[][] = parse(text, {
      delimiter,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: false,
      trim: true,
    });

    const trades: TradeInput[] = [];
    const rejected: RejectedTrade[] = [];

    // Row 0 is the header
    for (let index = 1; index < rows.length; index++) {
      const row = rows[index];
      const rowNumber = index;

      if (row.every((cell) => cell === '')) {
        this.logger.debug(`Stopped reading at blank row ${rowNumber}`);
        break;
      }

      const ref = row[LEDGER_COLUMNS.serialNo] || `row ${rowNumber}`;
      if (row.length < MIN_COLUMNS) {
        rejected.push({
          ref,
          stockName: row[LEDGER_COLUMNS.stockName] || undefined,
          reason: `row ${rowNumber} has ${row.length} columns, expected at least ${MIN_COLUMNS}`,
        });
        continue;
      }

      trades.push({
        ref,
        stockName: row[LEDGER_COLUMNS.stockName],
        entryPrice: row[LEDGER_COLUMNS.entryPrice],
        exitPrice: row[LEDGER_COLUMNS.exitPrice],
        entryDate: row[LEDGER_COLUMNS.entryDate],
        exitDate: row[LEDGER_COLUMNS.exitDate],
      });
    }

    return { trades, rejected };
  }
}

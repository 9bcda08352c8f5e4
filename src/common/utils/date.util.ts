import { addYears, format, isValid, parse } from 'date-fns';

// Tried in order; the first format that consumes the whole string wins.
// Day-first slashes take precedence over month-first.
export const TRADE_DATE_FORMATS = [
  'd-MMM-yy',     // 01-Nov-01
  'd-MMMM-yy',    // 01-November-01
  'd MMMM yyyy',  // 01 February 2001
  'd MMM yyyy',   // 01 Feb 2001
  'd-MMM-yyyy',   // 01-Nov-2001
  'd-MMMM-yyyy',  // 01-November-2001
  'yyyy-MM-dd',   // 2001-11-01
  'd/M/yyyy',     // 01/11/2001
  'M/d/yyyy',     // 11/01/2001
] as const;

// date-fns resolves two-digit years to within 50 years of the reference year,
// so 2019 maps 00-68 to 2000-2068 and 69-99 to 1969-1999.
const TWO_DIGIT_YEAR_REFERENCE = new Date(2019, 0, 1);

/**
 * Parses a trade date in any of the accepted ledger formats.
 * Returns undefined when no format matches.
 */
export function parseTradeDate(raw: string): Date | undefined {
  const text = raw.trim();
  if (text === '') {
    return undefined;
  }

  for (const pattern of TRADE_DATE_FORMATS) {
    const parsed = parse(text, pattern, TWO_DIGIT_YEAR_REFERENCE);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

/** Ledger display format, e.g. 15-Jan-20 */
export function formatTradeDate(date: Date): string {
  return format(date, 'dd-MMM-yy');
}

/** Calendar-day key used for grouping and ordering (yyyy-MM-dd). */
export function toDateKey(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function toMonthKey(date: Date): string {
  return format(date, 'yyyy-MM');
}

/**
 * Long-term once the holding reaches exactly one calendar year.
 * 29 Feb + 1 year lands on 28 Feb.
 */
export function isLongTermHolding(entryDate: Date, exitDate: Date): boolean {
  return exitDate.getTime() >= addYears(entryDate, 1).getTime();
}

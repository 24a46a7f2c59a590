import { isExists } from 'date-fns';

export const MIN_YEAR = 1950;
export const MAX_YEAR = 2035;

/** pt-BR month table; index + 1 is the calendar month. */
export const MONTHS = [
  { abbr: 'JAN', name: 'JANEIRO' },
  { abbr: 'FEV', name: 'FEVEREIRO' },
  { abbr: 'MAR', name: 'MARCO' },
  { abbr: 'ABR', name: 'ABRIL' },
  { abbr: 'MAI', name: 'MAIO' },
  { abbr: 'JUN', name: 'JUNHO' },
  { abbr: 'JUL', name: 'JULHO' },
  { abbr: 'AGO', name: 'AGOSTO' },
  { abbr: 'SET', name: 'SETEMBRO' },
  { abbr: 'OUT', name: 'OUTUBRO' },
  { abbr: 'NOV', name: 'NOVEMBRO' },
  { abbr: 'DEZ', name: 'DEZEMBRO' },
] as const;

const QUARTER_CENTRAL_MONTH: Record<string, number> = { '1': 2, '2': 5, '3': 8, '4': 11 };

const SENTINELS = new Set(['', '...', '(...)', '-', '--', 'n/d', 'nd', 'nan', 'none', 'null', 'x']);

const PT_BR_NUMBER = /^[+-]?(?:[1-9]\d{0,2}(?:\.\d{3})+|\d+)(?:,\d+)?$/;
const THOUSANDS_ONLY = /^[+-]?[1-9]\d{0,2}(?:\.\d{3})+$/;
const PLAIN_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

export function stripAccents(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Reads a pt-BR formatted number (`"1.234,56"`). Sentinels and anything
 * unparseable come back as `null`.
 *
 * Text without a comma is read as thousands-grouped only when every group
 * after the first has exactly three digits and the first does not start
 * with 0, so `"1.234"` is 1234 while `"100.5"` and `"0.125"` stay decimal.
 */
export function parseNumeric(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;

  const trimmed = text.trim();
  if (SENTINELS.has(trimmed.toLowerCase())) return null;

  const cleaned = trimmed.replace(/R\$|%|\s/g, '');
  if (SENTINELS.has(cleaned.toLowerCase())) return null;

  let normalized: string;
  if (cleaned.includes(',')) {
    if (!PT_BR_NUMBER.test(cleaned)) return null;
    normalized = cleaned.replace(/\./g, '').replace(',', '.');
  } else if (THOUSANDS_ONLY.test(cleaned)) {
    normalized = cleaned.replace(/\./g, '');
  } else {
    normalized = cleaned;
  }

  if (!PLAIN_NUMBER.test(normalized)) return null;

  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
}

export function isYearInRange(year: number): boolean {
  return Number.isInteger(year) && year >= MIN_YEAR && year <= MAX_YEAR;
}

/** `"2020"`, `"2020.0"` (spreadsheet floats) or `"2020*"` (footnoted). */
export function parseYear(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = text.trim().match(/^(\d{4})(?:[.,]0+)?\s*(?:\*+|\(\d+\))?$/);
  if (!match) return null;
  const year = Number(match[1]);
  return isYearInRange(year) ? year : null;
}

function normalizeLabel(label: string): string {
  return stripAccents(label).trim().toUpperCase().replace(/\.$/, '');
}

/** Month number (1-12) for an abbreviation or full month name. */
export function parseMonth(label: string | null | undefined): number | null {
  if (!label) return null;
  const normalized = normalizeLabel(label);
  if (!normalized) return null;
  const index = MONTHS.findIndex(m => m.abbr === normalized || m.name === normalized);
  return index === -1 ? null : index + 1;
}

/** Central month of a quarter label such as `1T`, `T2`, `Q3` or `4º TRI`. */
export function parseQuarter(label: string | null | undefined): number | null {
  if (!label) return null;
  const normalized = normalizeLabel(label).replace(/\s+/g, '');
  const match = normalized.match(/^(?:([1-4])(?:º|O)?(?:T|TRI|TRIM|TRIMESTRE)|[TQ]([1-4]))$/);
  if (!match) return null;
  const quarter = match[1] ?? match[2];
  return quarter ? QUARTER_CENTRAL_MONTH[quarter] ?? null : null;
}

export function isoDate(year: number, month: number, day: number = 1): string {
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * First day of `monthLabel` in `year`; January when no label is given.
 * Unknown labels and out-of-range years yield `null`.
 */
export function parseDate(year: number | string, monthLabel?: string | null): string | null {
  const parsedYear = typeof year === 'number' ? (isYearInRange(year) ? year : null) : parseYear(year);
  if (parsedYear === null) return null;

  if (monthLabel === undefined || monthLabel === null || monthLabel.trim() === '') {
    return isoDate(parsedYear, 1);
  }

  const month = parseMonth(monthLabel);
  return month === null ? null : isoDate(parsedYear, month);
}

function expandTwoDigitYear(year: string): number {
  if (year.length === 4) return Number(year);
  const short = Number(year);
  return short < 50 ? 2000 + short : 1900 + short;
}

function checkedDate(year: number, month: number, day: number): string | null {
  if (!isYearInRange(year)) return null;
  if (!isExists(year, month - 1, day)) return null;
  return isoDate(year, month, day);
}

/**
 * Reference dates as they appear in tall exports: `2024-01-15`,
 * `15/01/2024`, `2024-01`, `01/2024`, `jan/24`, `janeiro/2024` or a bare year.
 */
export function parseReferenceDate(text: string | null | undefined): string | null {
  if (!text) return null;
  const value = stripAccents(text).trim().toLowerCase();
  if (!value) return null;

  let match = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[t ].*)?$/);
  if (match) return checkedDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = value.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (match) return checkedDate(Number(match[3]), Number(match[2]), Number(match[1]));

  match = value.match(/^([a-z]+)\.?[/-](\d{2}|\d{4})$/);
  if (match) {
    const month = parseMonth(match[1]);
    return month === null ? null : checkedDate(expandTwoDigitYear(match[2]), month, 1);
  }

  match = value.match(/^(\d{1,2})[/-](\d{4})$/);
  if (match) return checkedDate(Number(match[2]), Number(match[1]), 1);

  match = value.match(/^(\d{4})[/-](\d{1,2})$/);
  if (match) return checkedDate(Number(match[1]), Number(match[2]), 1);

  const year = parseYear(value);
  return year === null ? null : isoDate(year, 1);
}

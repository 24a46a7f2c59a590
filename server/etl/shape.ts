import { parseMonth, parseQuarter, stripAccents } from './locale';
import type { Cell, RawTable } from './types';

export const DEFAULT_DATE_COLUMNS = [
  'reference_date',
  'data_referencia',
  'data',
  'date',
  'periodo',
  'mes_ano',
  'referencia',
];

export const DEFAULT_VALUE_COLUMNS = [
  'value',
  'valor',
  'indice',
  'custo_m2',
  'valor_m2',
  'taxa',
];

export const DEFAULT_SERIES_COLUMNS = ['series_id', 'serie'];

const HEADER_SCAN_LIMIT = 30;
const MIN_PERIOD_COLUMNS = 2;

export interface TallShape {
  kind: 'tall';
  /** Position of the header within `table.rows`. */
  headerRowIndex: number;
  columns: string[];
  dateColumn: number;
  valueColumn: number;
  seriesColumn: number | null;
}

export interface PeriodColumn {
  column: number;
  month: number;
  label: string;
}

export type PeriodAxis =
  | { layout: 'columns'; headerRowIndex: number; columns: PeriodColumn[] }
  | { layout: 'rows'; labelColumn: number; valueColumn: number };

export interface WideShape {
  kind: 'wide';
  groupColumn: number;
  axis: PeriodAxis;
}

export interface UnrecognizedShape {
  kind: 'unrecognized';
  reason: string;
}

export type TableShape = TallShape | WideShape | UnrecognizedShape;

export interface ShapeOptions {
  dateColumns?: string[];
  valueColumns?: string[];
  seriesColumns?: string[];
}

export function normalizeColumnName(name: string, position: number): string {
  const base = stripAccents(name)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (!base || base.startsWith('unnamed')) {
    return `col_${position}`;
  }
  return base;
}

/** Normalized names, suffixed `_2`, `_3`… when a name repeats. */
export function normalizeHeader(cells: readonly Cell[]): string[] {
  const seen = new Map<string, number>();
  return cells.map((cell, position) => {
    const name = normalizeColumnName(cell, position);
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    return count === 1 ? name : `${name}_${count}`;
  });
}

const isMonthLabel = (cell: Cell | undefined): boolean => parseMonth(cell) !== null;
const isPeriodLabel = (cell: Cell | undefined): boolean =>
  parseMonth(cell) !== null || parseQuarter(cell) !== null;

function findTallHeader(table: RawTable, options: ShapeOptions): TallShape | null {
  const dateColumns = options.dateColumns ?? DEFAULT_DATE_COLUMNS;
  const valueColumns = options.valueColumns ?? DEFAULT_VALUE_COLUMNS;
  const seriesColumns = options.seriesColumns ?? DEFAULT_SERIES_COLUMNS;
  const limit = Math.min(table.rows.length, HEADER_SCAN_LIMIT);

  for (let position = 0; position < limit; position++) {
    const columns = normalizeHeader(table.rows[position].cells);
    const dateColumn = columns.findIndex(c => dateColumns.includes(c));
    const valueColumn = columns.findIndex(c => valueColumns.includes(c));
    if (dateColumn === -1 || valueColumn === -1) continue;

    const seriesColumn = columns.findIndex(c => seriesColumns.includes(c));
    return {
      kind: 'tall',
      headerRowIndex: position,
      columns,
      dateColumn,
      valueColumn,
      seriesColumn: seriesColumn === -1 ? null : seriesColumn,
    };
  }
  return null;
}

function findPeriodHeader(table: RawTable): WideShape | null {
  const limit = Math.min(table.rows.length, HEADER_SCAN_LIMIT);

  for (let position = 0; position < limit; position++) {
    const cells = table.rows[position].cells;
    const columns: PeriodColumn[] = [];
    cells.forEach((cell, column) => {
      if (column === 0) return;
      const month = parseMonth(cell);
      if (month !== null) {
        columns.push({ column, month, label: cell.trim().toUpperCase() });
      }
    });

    if (columns.length >= MIN_PERIOD_COLUMNS) {
      return {
        kind: 'wide',
        groupColumn: 0,
        axis: { layout: 'columns', headerRowIndex: position, columns },
      };
    }
  }
  return null;
}

function findPeriodRows(table: RawTable): WideShape | null {
  const hasPeriodRows = table.rows.some(
    row => row.cells.length > 2 && isPeriodLabel(row.cells[1])
  );
  if (!hasPeriodRows) return null;

  return {
    kind: 'wide',
    groupColumn: 0,
    axis: { layout: 'rows', labelColumn: 1, valueColumn: 2 },
  };
}

/**
 * Decides once how a table is laid out. A named header with a date and a
 * value column wins; then months across a header row; then month (or
 * quarter) labels down the second column.
 */
export function detectShape(table: RawTable, options: ShapeOptions = {}): TableShape {
  if (table.rows.length === 0) {
    return { kind: 'unrecognized', reason: 'table has no rows' };
  }

  const tall = findTallHeader(table, options);
  if (tall) return tall;

  const periodHeader = findPeriodHeader(table);
  if (periodHeader) return periodHeader;

  const periodRows = findPeriodRows(table);
  if (periodRows) return periodRows;

  const sample = table.rows.slice(0, HEADER_SCAN_LIMIT);
  const monthCells = sample.reduce(
    (count, row) => count + row.cells.filter(isMonthLabel).length,
    0
  );
  return {
    kind: 'unrecognized',
    reason: monthCells === 0
      ? 'no period header or date/value header found'
      : `only ${monthCells} month label(s) found, not enough for a period header`,
  };
}

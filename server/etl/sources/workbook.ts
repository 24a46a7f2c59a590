import ExcelJS from 'exceljs';
import { AppError } from '../../utils/errors';
import type { Cell, RawRow, RawTable } from '../types';

export interface WorkbookReadOptions {
  /** Worksheet name or 1-based position. Defaults to the first worksheet. */
  sheet?: string | number;
  sourceUrl?: string;
  /** Source name recorded on the table; defaults to the worksheet name. */
  name?: string;
}

/** Decimal comma, as the published tables print it. */
function renderNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(value).replace('.', ',');
}

function renderValue(value: unknown): Cell {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return renderNumber(value);
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString().slice(0, 10);

  if (typeof value === 'object') {
    if ('richText' in value && Array.isArray(value.richText)) {
      const parts: unknown[] = value.richText;
      return parts
        .map(part => (typeof part === 'object' && part !== null && 'text' in part ? renderValue(part.text) : ''))
        .join('');
    }
    if ('result' in value) return renderValue(value.result);
    // Formula without a cached result.
    if ('formula' in value || 'sharedFormula' in value) return '';
    if ('text' in value) return renderValue(value.text);
  }
  return '';
}

function pickWorksheet(workbook: ExcelJS.Workbook, sheet: string | number | undefined): ExcelJS.Worksheet {
  const worksheet = sheet === undefined
    ? workbook.worksheets[0]
    : typeof sheet === 'number'
      ? workbook.worksheets[sheet - 1]
      : workbook.getWorksheet(sheet);

  if (!worksheet) {
    const available = workbook.worksheets.map(ws => ws.name).join(', ');
    throw new AppError(
      `Worksheet ${sheet === undefined ? '(first)' : `'${sheet}'`} not found. Available: ${available || 'none'}`,
      'WORKSHEET_NOT_FOUND',
      true,
      { sheet }
    );
  }
  return worksheet;
}

/**
 * Loads one worksheet as text cells. Empty rows are kept so row positions
 * match the sheet, and every row is padded to the widest one.
 */
export async function readWorkbookTable(buffer: Buffer, options: WorkbookReadOptions = {}): Promise<RawTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  const worksheet = pickWorksheet(workbook, options.sheet);

  const grid: Cell[][] = [];
  worksheet.eachRow({ includeEmpty: true }, (row, rowNumber) => {
    const cells: Cell[] = [];
    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      while (cells.length < colNumber - 1) cells.push('');
      cells[colNumber - 1] = renderValue(cell.value).trim();
    });
    while (grid.length < rowNumber - 1) grid.push([]);
    grid[rowNumber - 1] = cells;
  });

  const width = grid.reduce((max, cells) => Math.max(max, cells.length), 0);
  const rows: RawRow[] = grid.map((cells, index) => {
    const padded = [...cells];
    while (padded.length < width) padded.push('');
    return { index, cells: padded };
  });

  return {
    source: { name: options.name ?? worksheet.name, url: options.sourceUrl },
    rows,
  };
}

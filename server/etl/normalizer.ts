import { isoDate, parseMonth, parseNumeric, parseQuarter, parseReferenceDate, parseYear, stripAccents } from './locale';
import { isBoilerplate, isNoise, type NoiseOptions } from './noise';
import { buildRecordKey, dedupeKeepLast, sortRecords } from './records';
import {
  detectShape,
  type ShapeOptions,
  type TableShape,
  type TallShape,
  type WideShape,
} from './shape';
import type { CanonicalRecord, Cell, Dimensions, RawRow, RawTable } from './types';

export type GroupSpec =
  | {
      kind: 'year';
      /** Dimension set by section captions such as `CUB MÉDIO REGIÃO SUL`. */
      sectionDimension?: string;
    }
  | {
      kind: 'label';
      /** Dimension that receives the first-column label, e.g. `localidade`. */
      dimension: string;
      /** Wide label tables carry no year of their own. */
      referenceYear: number;
      /** Labels skipped with their rows; defaults to `TOTAL`. */
      exclude?: string[];
    };

export interface NormalizeOptions extends ShapeOptions, NoiseOptions {
  seriesId: string;
  group?: GroupSpec;
  /** Attached to every record. Not part of the key unless listed in `keyDimensions`. */
  dimensions?: Dimensions;
  keyDimensions?: string[];
  ingestedAt?: string;
}

export interface NormalizeResult {
  shape: TableShape;
  records: CanonicalRecord[];
  rawRowCount: number;
  emittedCount: number;
  duplicatesRemoved: number;
  /** Wide-table cells that parsed to exactly 0 and were treated as absent. */
  droppedZeroCells: number;
}

const DEFAULT_SECTION_DIMENSION = 'region';
const DEFAULT_EXCLUDED_GROUPS = ['TOTAL'];

interface EmitContext {
  options: NormalizeOptions;
  sourceUrl: string;
  ingestedAt: string;
}

function createRecord(
  context: EmitContext,
  seriesId: string,
  referenceDate: string,
  value: number | null,
  dimensions: Dimensions,
  defaultKeyDimensions: string[]
): CanonicalRecord {
  const allDimensions = { ...(context.options.dimensions ?? {}), ...dimensions };
  const keyDimensions = context.options.keyDimensions ?? defaultKeyDimensions;
  return {
    recordKey: buildRecordKey(seriesId, referenceDate, allDimensions, keyDimensions),
    seriesId,
    referenceDate,
    value,
    dimensions: allDimensions,
    variationMom: null,
    variationYoy: null,
    sourceUrl: context.sourceUrl,
    ingestedAt: context.ingestedAt,
  };
}

const firstCell = (row: RawRow): string => (row.cells[0] ?? '').trim();

/**
 * Region named by a section caption, `''` for a caption without one, or
 * `null` when the cell is not a caption.
 */
export function matchSectionCaption(cell: Cell): string | null {
  if (isBoilerplate(cell)) return null;
  const normalized = stripAccents(cell).trim().toUpperCase();
  if (!/^(?:CUB\b[^0-9]*MEDIO|REGIAO\b)/.test(normalized)) return null;

  const region = normalized.match(/REGIAO\s+([A-Z]+(?:-[A-Z]+)?)/);
  if (region) return region[1];
  if (normalized.includes('BRASIL')) return 'BRASIL';
  return '';
}

function normalizeTall(table: RawTable, shape: TallShape, context: EmitContext): CanonicalRecord[] {
  const { options } = context;
  const records: CanonicalRecord[] = [];
  const reserved = new Set([shape.dateColumn, shape.valueColumn, shape.seriesColumn]);
  const dimensionColumns = shape.columns
    .map((name, column) => ({ name, column }))
    .filter(({ column }) => !reserved.has(column));

  table.rows.forEach((row, position) => {
    if (position <= shape.headerRowIndex || isNoise(row, options)) return;

    const referenceDate = parseReferenceDate(row.cells[shape.dateColumn]);
    if (referenceDate === null) return;

    const seriesCell = shape.seriesColumn === null ? '' : (row.cells[shape.seriesColumn] ?? '').trim();
    const seriesId = seriesCell || options.seriesId;

    const dimensions: Dimensions = {};
    for (const { name, column } of dimensionColumns) {
      const cell = (row.cells[column] ?? '').trim();
      if (cell) dimensions[name] = cell;
    }

    records.push(createRecord(
      context,
      seriesId,
      referenceDate,
      parseNumeric(row.cells[shape.valueColumn]),
      dimensions,
      Object.keys(dimensions)
    ));
  });

  return records;
}

interface WideState {
  year: number | null;
  label: string | null;
  openDimensions: Dimensions;
}

/** Updates the carried group from the first cell. False when the row has to be skipped. */
function advanceGroup(state: WideState, row: RawRow, group: GroupSpec): boolean {
  const cell = firstCell(row);

  if (group.kind === 'year') {
    if (cell === '') return state.year !== null;
    const year = parseYear(cell);
    if (year === null) return false;
    state.year = year;
    return true;
  }

  if (cell === '') return state.label !== null;
  const excluded = (group.exclude ?? DEFAULT_EXCLUDED_GROUPS).map(g => g.toUpperCase());
  if (excluded.includes(cell.toUpperCase())) {
    state.label = null;
    return false;
  }
  state.label = cell;
  return true;
}

function normalizeWide(table: RawTable, shape: WideShape, context: EmitContext): {
  records: CanonicalRecord[];
  droppedZeroCells: number;
} {
  const { options } = context;
  const group: GroupSpec = options.group ?? { kind: 'year' };
  const sectionDimension = group.kind === 'year'
    ? group.sectionDimension ?? DEFAULT_SECTION_DIMENSION
    : null;
  const state: WideState = { year: null, label: null, openDimensions: {} };
  const records: CanonicalRecord[] = [];
  let droppedZeroCells = 0;

  const emit = (month: number, cell: Cell | undefined): void => {
    const value = parseNumeric(cell);
    if (value === null) return;
    // Blank cells are rendered as 0 by the source layout.
    if (value === 0) {
      droppedZeroCells++;
      return;
    }

    const year = group.kind === 'year' ? state.year : group.referenceYear;
    if (year === null) return;

    const dimensions: Dimensions = { ...state.openDimensions };
    const keyDimensions = Object.keys(state.openDimensions);
    if (group.kind === 'label' && state.label !== null) {
      dimensions[group.dimension] = state.label;
      keyDimensions.push(group.dimension);
    }

    records.push(createRecord(
      context,
      options.seriesId,
      isoDate(year, month),
      value,
      dimensions,
      keyDimensions
    ));
  };

  const axis = shape.axis;
  table.rows.forEach((row, position) => {
    if (sectionDimension !== null) {
      const region = matchSectionCaption(firstCell(row));
      if (region !== null) {
        if (region) state.openDimensions[sectionDimension] = region;
        state.year = null;
        return;
      }
    }

    if (axis.layout === 'columns' && position <= axis.headerRowIndex) return;
    if (isNoise(row, options)) return;
    if (!advanceGroup(state, row, group)) return;

    switch (axis.layout) {
      case 'columns':
        for (const period of axis.columns) {
          emit(period.month, row.cells[period.column]);
        }
        break;
      case 'rows': {
        const label = row.cells[axis.labelColumn];
        const month = parseMonth(label) ?? parseQuarter(label);
        if (month !== null) {
          emit(month, row.cells[axis.valueColumn]);
        }
        break;
      }
      default: {
        const exhaustive: never = axis;
        throw new Error(`Unhandled period axis: ${JSON.stringify(exhaustive)}`);
      }
    }
  });

  return { records, droppedZeroCells };
}

/**
 * Turns a raw table into canonical records sorted by series and date.
 * Within the batch a repeated key keeps the record read last.
 */
export function normalizeTable(table: RawTable, options: NormalizeOptions): NormalizeResult {
  const shape = detectShape(table, options);
  const context: EmitContext = {
    options,
    sourceUrl: table.source.url ?? table.source.name,
    ingestedAt: options.ingestedAt ?? new Date().toISOString(),
  };

  let emitted: CanonicalRecord[];
  let droppedZeroCells = 0;

  switch (shape.kind) {
    case 'tall':
      emitted = normalizeTall(table, shape, context);
      break;
    case 'wide': {
      const result = normalizeWide(table, shape, context);
      emitted = result.records;
      droppedZeroCells = result.droppedZeroCells;
      break;
    }
    case 'unrecognized':
      emitted = [];
      break;
    default: {
      const exhaustive: never = shape;
      throw new Error(`Unhandled table shape: ${JSON.stringify(exhaustive)}`);
    }
  }

  const { records, removed } = dedupeKeepLast(emitted);

  return {
    shape,
    records: sortRecords(records),
    rawRowCount: table.rows.length,
    emittedCount: emitted.length,
    duplicatesRemoved: removed,
    droppedZeroCells,
  };
}

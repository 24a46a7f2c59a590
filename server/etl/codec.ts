import { z } from 'zod';
import { SnapshotCorruptionError } from '../utils/errors';
import { parseNumeric } from './locale';
import type { CanonicalRecord, Cell, Dimensions, QualityFlag, RawRow } from './types';

export const FIXED_LEADING_COLUMNS = [
  'record_key',
  'series_id',
  'reference_date',
  'value',
  'variation_mom',
  'variation_yoy',
] as const;

export const FIXED_TRAILING_COLUMNS = ['source_url', 'ingested_at'] as const;

export const FLAG_COLUMNS = [
  'series_id',
  'reference_date',
  'flag_kind',
  'severity',
  'observed_value',
  'detail',
];

export const INGESTION_LOG_COLUMNS = [
  'run_id',
  'timestamp',
  'source',
  'status',
  'raw_rows',
  'records',
  'flags',
  'error',
];

const FIXED_COLUMNS = new Set<string>([...FIXED_LEADING_COLUMNS, ...FIXED_TRAILING_COLUMNS]);
const REQUIRED_COLUMNS = ['record_key', 'series_id', 'reference_date', 'value'];

const formatNumber = (value: number | null): Cell => (value === null ? '' : String(value));

/** Union of dimension names across the batch, ascending. */
export function dimensionColumns(records: readonly CanonicalRecord[]): string[] {
  const names = new Set<string>();
  for (const record of records) {
    for (const name of Object.keys(record.dimensions)) {
      if (!FIXED_COLUMNS.has(name)) names.add(name);
    }
  }
  return Array.from(names).sort();
}

/**
 * Header plus one row per record. Numbers use their machine text form so a
 * snapshot read back decodes to the same values.
 */
export function serializeRecords(records: readonly CanonicalRecord[]): Cell[][] {
  const dimensions = dimensionColumns(records);
  const header = [...FIXED_LEADING_COLUMNS, ...dimensions, ...FIXED_TRAILING_COLUMNS];

  const rows = records.map(record => [
    record.recordKey,
    record.seriesId,
    record.referenceDate,
    formatNumber(record.value),
    formatNumber(record.variationMom),
    formatNumber(record.variationYoy),
    ...dimensions.map(name => record.dimensions[name] ?? ''),
    record.sourceUrl,
    record.ingestedAt,
  ]);

  return [header, ...rows];
}

const numberCell = z.string().trim().transform((text, ctx) => {
  if (text === '') return null;
  const machine = Number(text);
  if (Number.isFinite(machine)) return machine;

  // Snapshots edited by hand come back in the sheet's display locale.
  const localized = parseNumeric(text);
  if (localized === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${text}' is not a number` });
    return z.NEVER;
  }
  return localized;
});

const snapshotRowSchema = z.object({
  record_key: z.string().trim().min(1, 'record_key is empty'),
  series_id: z.string().trim().min(1, 'series_id is empty'),
  reference_date: z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, 'reference_date is not YYYY-MM-DD'),
  value: numberCell,
  variation_mom: numberCell,
  variation_yoy: numberCell,
  source_url: z.string(),
  ingested_at: z.string(),
});

const isBlankRow = (row: RawRow): boolean => row.cells.every(cell => cell.trim() === '');

/**
 * Decodes a stored table. An empty table or a bare header decodes to no
 * records; any row that cannot be decoded aborts with
 * `SnapshotCorruptionError`.
 */
export function deserializeSnapshot(table: string, rows: readonly RawRow[]): CanonicalRecord[] {
  if (rows.length === 0) return [];

  const [headerRow, ...body] = rows;
  const header = headerRow.cells.map(cell => cell.trim());
  const missing = REQUIRED_COLUMNS.filter(name => !header.includes(name));
  if (missing.length > 0) {
    throw new SnapshotCorruptionError(table, headerRow.index, `missing column(s) ${missing.join(', ')}`);
  }

  const dimensionNames = header
    .map((name, column) => ({ name, column }))
    .filter(({ name }) => name !== '' && !FIXED_COLUMNS.has(name));

  const cellAt = (row: RawRow, name: string): Cell => {
    const column = header.indexOf(name);
    return column === -1 ? '' : row.cells[column] ?? '';
  };

  const records: CanonicalRecord[] = [];
  for (const row of body) {
    if (isBlankRow(row)) continue;

    const parsed = snapshotRowSchema.safeParse({
      record_key: cellAt(row, 'record_key'),
      series_id: cellAt(row, 'series_id'),
      reference_date: cellAt(row, 'reference_date'),
      value: cellAt(row, 'value'),
      variation_mom: cellAt(row, 'variation_mom'),
      variation_yoy: cellAt(row, 'variation_yoy'),
      source_url: cellAt(row, 'source_url'),
      ingested_at: cellAt(row, 'ingested_at'),
    });

    if (!parsed.success) {
      const reason = parsed.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new SnapshotCorruptionError(table, row.index, reason);
    }

    const dimensions: Dimensions = {};
    for (const { name, column } of dimensionNames) {
      const cell = (row.cells[column] ?? '').trim();
      if (cell) dimensions[name] = cell;
    }

    const data = parsed.data;
    records.push({
      recordKey: data.record_key,
      seriesId: data.series_id,
      referenceDate: data.reference_date,
      value: data.value,
      dimensions,
      variationMom: data.variation_mom,
      variationYoy: data.variation_yoy,
      sourceUrl: data.source_url,
      ingestedAt: data.ingested_at,
    });
  }

  return records;
}

export function serializeFlags(flags: readonly QualityFlag[]): Cell[][] {
  return flags.map(flag => [
    flag.seriesId,
    flag.referenceDate,
    flag.kind,
    flag.severity,
    formatNumber(flag.observedValue),
    flag.detail,
  ]);
}

export interface IngestionLogEntry {
  runId: string;
  timestamp: string;
  source: string;
  status: string;
  rawRows: number;
  records: number;
  flags: number;
  error?: string;
}

export function serializeLogRow(entry: IngestionLogEntry): Cell[] {
  return [
    entry.runId,
    entry.timestamp,
    entry.source,
    entry.status,
    String(entry.rawRows),
    String(entry.records),
    String(entry.flags),
    entry.error ?? '',
  ];
}

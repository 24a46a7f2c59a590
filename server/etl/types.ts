/** A cell as it travels on the wire: always text, `""` when empty. */
export type Cell = string;

export interface RawRow {
  /** 0-based position within the source table. */
  readonly index: number;
  readonly cells: readonly Cell[];
}

export interface TableSource {
  name: string;
  url?: string;
}

export interface RawTable {
  readonly source: TableSource;
  readonly rows: readonly RawRow[];
}

export type Dimensions = Record<string, string>;

export interface CanonicalRecord {
  recordKey: string;
  seriesId: string;
  /** ISO `YYYY-MM-DD`. Day 1 for monthly series. */
  referenceDate: string;
  /** `null` is a known gap, never a parse failure turned into zero. */
  value: number | null;
  dimensions: Dimensions;
  /** Derived by the merger only. */
  variationMom: number | null;
  variationYoy: number | null;
  sourceUrl: string;
  ingestedAt: string;
}

export const FLAG_KINDS = [
  'OUTLIER',
  'HIGH_VARIATION',
  'NEGATIVE_VALUE',
  'FUTURE_DATE',
  'CONSTANT_SERIES',
] as const;

export type FlagKind = typeof FLAG_KINDS[number];

export type Severity = 'HIGH' | 'MEDIUM' | 'LOW';

export interface QualityFlag {
  seriesId: string;
  referenceDate: string;
  kind: FlagKind;
  severity: Severity;
  observedValue: number | null;
  detail: string;
}

/**
 * External key/value-of-tables service. Implementations may chunk and pace
 * writes, so a single `writeTable` call can take several seconds.
 */
export interface SpreadsheetStore {
  /** First row is the header. A missing table reads as `[]`. */
  readTable(name: string): Promise<RawRow[]>;
  /** Replaces the whole table. Not assumed atomic. */
  writeTable(name: string, rows: Cell[][]): Promise<void>;
  appendRows(name: string, rows: Cell[][]): Promise<void>;
  /** Creates the table with `header` as its first row when it does not exist. */
  ensureTable(name: string, header: Cell[]): Promise<void>;
}

export type ShapeKind = 'tall' | 'wide' | 'unrecognized';

export type IngestionStatus = 'success' | 'empty' | 'error';

export interface MergeReport {
  table: string;
  existingCount: number;
  batchCount: number;
  brandNew: number;
  updated: number;
  duplicatesRemoved: number;
  total: number;
  records: CanonicalRecord[];
}

export interface IngestionResult {
  runId: string;
  source: string;
  shape: ShapeKind;
  status: IngestionStatus;
  rawRowCount: number;
  recordCount: number;
  droppedZeroCells: number;
  flags: QualityFlag[];
  merge: MergeReport | null;
  error?: string;
}

export const QUALITY_FLAGS_TABLE = '_quality_flags';
export const INGESTION_LOG_TABLE = '_ingestion_log';

import { buildRecordKey } from '../records';
import type { CanonicalRecord, Cell, Dimensions, RawTable } from '../types';

export const INGESTED_AT = '2024-01-10T12:00:00.000Z';

export function makeRecord(
  seriesId: string,
  referenceDate: string,
  value: number | null,
  overrides: Partial<CanonicalRecord> & { dimensions?: Dimensions } = {}
): CanonicalRecord {
  const dimensions = overrides.dimensions ?? {};
  return {
    recordKey: buildRecordKey(seriesId, referenceDate, dimensions),
    seriesId,
    referenceDate,
    value,
    dimensions,
    variationMom: null,
    variationYoy: null,
    sourceUrl: 'https://example.org/source.xlsx',
    ingestedAt: INGESTED_AT,
    ...overrides,
  };
}

/** Monthly records starting in January of `year`. */
export function monthlySeries(seriesId: string, year: number, values: Array<number | null>): CanonicalRecord[] {
  return values.map((value, i) =>
    makeRecord(seriesId, `${year}-${String(i + 1).padStart(2, '0')}-01`, value)
  );
}

export function makeTable(rows: Cell[][], name = 'CBIC', url?: string): RawTable {
  return {
    source: { name, url },
    rows: rows.map((cells, index) => ({ index, cells })),
  };
}

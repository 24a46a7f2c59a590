import type { CanonicalRecord, Dimensions } from './types';

/**
 * `<seriesId>_<referenceDate>` followed by `_<value>` for each key dimension,
 * in ascending dimension-name order.
 */
export function buildRecordKey(
  seriesId: string,
  referenceDate: string,
  dimensions: Dimensions = {},
  keyDimensions: readonly string[] = Object.keys(dimensions)
): string {
  const parts = [seriesId, referenceDate];
  for (const name of [...keyDimensions].sort()) {
    const value = dimensions[name];
    if (value !== undefined && value !== '') {
      parts.push(value);
    }
  }
  return parts.join('_');
}

/**
 * Identity of the series a record belongs to: its key with the date removed.
 * Records of one series key form one time series for variation purposes.
 */
export function seriesKeyOf(record: Pick<CanonicalRecord, 'recordKey' | 'seriesId' | 'referenceDate'>): string {
  const prefix = `${record.seriesId}_${record.referenceDate}`;
  if (record.recordKey.startsWith(prefix)) {
    return record.seriesId + record.recordKey.slice(prefix.length);
  }
  return record.seriesId;
}

export function compareRecords(a: CanonicalRecord, b: CanonicalRecord): number {
  if (a.seriesId !== b.seriesId) return a.seriesId < b.seriesId ? -1 : 1;
  if (a.referenceDate !== b.referenceDate) return a.referenceDate < b.referenceDate ? -1 : 1;
  if (a.recordKey !== b.recordKey) return a.recordKey < b.recordKey ? -1 : 1;
  return 0;
}

export function sortRecords(records: CanonicalRecord[]): CanonicalRecord[] {
  return [...records].sort(compareRecords);
}

/** Later occurrences of a key replace earlier ones. */
export function dedupeKeepLast(records: readonly CanonicalRecord[]): {
  records: CanonicalRecord[];
  removed: number;
} {
  const byKey = new Map<string, CanonicalRecord>();
  for (const record of records) {
    byKey.set(record.recordKey, record);
  }
  return { records: Array.from(byKey.values()), removed: records.length - byKey.size };
}

export function findDuplicateKeys(records: readonly CanonicalRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const record of records) {
    if (seen.has(record.recordKey)) {
      duplicates.add(record.recordKey);
    }
    seen.add(record.recordKey);
  }
  return Array.from(duplicates);
}

export function groupBySeriesKey(records: readonly CanonicalRecord[]): Map<string, CanonicalRecord[]> {
  const groups = new Map<string, CanonicalRecord[]>();
  for (const record of records) {
    const key = seriesKeyOf(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

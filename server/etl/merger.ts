import { DuplicateKeyError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { deserializeSnapshot, serializeRecords } from './codec';
import { findDuplicateKeys, sortRecords } from './records';
import { computeVariations } from './variations';
import type { CanonicalRecord, MergeReport, SpreadsheetStore } from './types';

export type MergeState = 'READ_EXISTING' | 'MERGE' | 'WRITE_BACK';

interface MergeOutcome {
  records: CanonicalRecord[];
  brandNew: number;
  updated: number;
  duplicatesRemoved: number;
}

/**
 * Collapses repeated keys in a stored snapshot. The copy with the latest
 * `ingestedAt` wins; on equal timestamps the row stored later wins.
 */
export function dedupeSnapshot(existing: readonly CanonicalRecord[]): {
  records: CanonicalRecord[];
  removed: number;
} {
  const byKey = new Map<string, CanonicalRecord>();
  for (const record of existing) {
    const kept = byKey.get(record.recordKey);
    if (!kept || record.ingestedAt >= kept.ingestedAt) {
      byKey.set(record.recordKey, record);
    }
  }
  return { records: Array.from(byKey.values()), removed: existing.length - byKey.size };
}

/** Pure MERGE step: batch records replace snapshot records with the same key. */
export function mergeRecords(
  existing: readonly CanonicalRecord[],
  batch: readonly CanonicalRecord[]
): MergeOutcome {
  const { records: snapshot, removed } = dedupeSnapshot(existing);
  const merged = new Map(snapshot.map(record => [record.recordKey, record]));

  let brandNew = 0;
  let updated = 0;
  const batchKeys = new Set<string>();
  for (const record of batch) {
    if (!batchKeys.has(record.recordKey)) {
      if (merged.has(record.recordKey)) updated++;
      else brandNew++;
      batchKeys.add(record.recordKey);
    }
    merged.set(record.recordKey, record);
  }

  return {
    records: computeVariations(sortRecords(Array.from(merged.values()))),
    brandNew,
    updated,
    duplicatesRemoved: removed,
  };
}

export function assertUniqueKeys(table: string, records: readonly CanonicalRecord[]): void {
  const duplicates = findDuplicateKeys(records);
  if (duplicates.length > 0) {
    throw new DuplicateKeyError(table, duplicates);
  }
}

/**
 * Upserts a batch into a stored fact table:
 * READ_EXISTING → MERGE → WRITE_BACK. Nothing is retried here; a failed
 * merge is re-run from the start.
 */
export class FactStoreMerger {
  private readonly log: Logger;

  constructor(private readonly store: SpreadsheetStore, log?: Logger) {
    this.log = log ?? createLogger('merger');
  }

  async merge(table: string, batch: readonly CanonicalRecord[]): Promise<MergeReport> {
    const log = this.log.child({ table });
    let state: MergeState = 'READ_EXISTING';

    const rows = await this.store.readTable(table);
    const existing = deserializeSnapshot(table, rows);
    log.debug('Snapshot read', { state, rows: rows.length, records: existing.length });

    state = 'MERGE';
    const outcome = mergeRecords(existing, batch);
    if (outcome.duplicatesRemoved > 0) {
      log.warn('Duplicate keys found in stored snapshot', {
        state,
        duplicatesRemoved: outcome.duplicatesRemoved,
      });
    }

    state = 'WRITE_BACK';
    assertUniqueKeys(table, outcome.records);

    await this.store.writeTable(table, serializeRecords(outcome.records));

    log.info('Merge complete', {
      state,
      existing: existing.length,
      batch: batch.length,
      brandNew: outcome.brandNew,
      updated: outcome.updated,
      total: outcome.records.length,
    });

    return {
      table,
      existingCount: existing.length,
      batchCount: batch.length,
      brandNew: outcome.brandNew,
      updated: outcome.updated,
      duplicatesRemoved: outcome.duplicatesRemoved,
      total: outcome.records.length,
      records: outcome.records,
    };
  }
}

import { nanoid } from 'nanoid';
import { toError } from '../utils/errors';
import { createLogger, type Logger } from '../utils/logger';
import { runWithContext } from '../utils/runContext';
import { FLAG_COLUMNS, INGESTION_LOG_COLUMNS, serializeFlags, serializeLogRow } from './codec';
import { FactStoreMerger } from './merger';
import { normalizeTable, type NormalizeOptions } from './normalizer';
import { runQualityChecksBySeries, summarizeFlags, type QualityOptionsResolver } from './quality';
import {
  INGESTION_LOG_TABLE,
  QUALITY_FLAGS_TABLE,
  type IngestionResult,
  type RawTable,
  type SpreadsheetStore,
} from './types';

export interface IngestionOptions {
  /** Fact table the batch is merged into. */
  table: string;
  normalize: NormalizeOptions;
  quality?: QualityOptionsResolver;
  runId?: string;
  /** Processing time; stamps `ingestedAt` and bounds the future-date check. */
  now?: Date;
}

export interface IngestionDeps {
  store: SpreadsheetStore;
  logger?: Logger;
}

async function appendFlags(store: SpreadsheetStore, result: IngestionResult): Promise<void> {
  if (result.flags.length === 0) return;
  await store.ensureTable(QUALITY_FLAGS_TABLE, FLAG_COLUMNS);
  await store.appendRows(QUALITY_FLAGS_TABLE, serializeFlags(result.flags));
}

async function appendLogRow(store: SpreadsheetStore, result: IngestionResult, timestamp: string): Promise<void> {
  await store.ensureTable(INGESTION_LOG_TABLE, INGESTION_LOG_COLUMNS);
  await store.appendRows(INGESTION_LOG_TABLE, [
    serializeLogRow({
      runId: result.runId,
      timestamp,
      source: result.source,
      status: result.status,
      rawRows: result.rawRowCount,
      records: result.recordCount,
      flags: result.flags.length,
      error: result.error,
    }),
  ]);
}

/**
 * One ingestion run: normalize, check, merge, then record flags and a log
 * row. Every log line written during the run carries its run id.
 */
export async function runIngestion(
  table: RawTable,
  options: IngestionOptions,
  deps: IngestionDeps
): Promise<IngestionResult> {
  const runId = options.runId ?? nanoid();
  const now = options.now ?? new Date();
  const source = table.source.name;

  return runWithContext({ runId, source, startTime: now.getTime() }, async () => {
    const log = (deps.logger ?? createLogger('ingestion')).child({ table: options.table });
    const { store } = deps;

    const normalized = normalizeTable(table, {
      ...options.normalize,
      ingestedAt: options.normalize.ingestedAt ?? now.toISOString(),
    });

    if (normalized.shape.kind === 'unrecognized') {
      log.warn('Table shape not recognized', {
        source,
        reason: normalized.shape.reason,
        rawRows: normalized.rawRowCount,
      });
    }

    const quality = options.quality ?? {};
    const flags = runQualityChecksBySeries(
      normalized.records,
      typeof quality === 'function'
        ? (key, series) => ({ now, ...quality(key, series) })
        : { now, ...quality }
    );

    const result: IngestionResult = {
      runId,
      source,
      shape: normalized.shape.kind,
      status: 'empty',
      rawRowCount: normalized.rawRowCount,
      recordCount: normalized.records.length,
      droppedZeroCells: normalized.droppedZeroCells,
      flags,
      merge: null,
    };

    if (normalized.records.length > 0) {
      try {
        result.merge = await new FactStoreMerger(store, log).merge(options.table, normalized.records);
        result.status = 'success';
      } catch (error) {
        const err = toError(error);
        result.status = 'error';
        result.error = err.message;
        log.error('Merge failed', { source, error: err.message, name: err.name });

        try {
          await appendLogRow(store, result, now.toISOString());
        } catch (logError) {
          log.error('Could not record failed run in ingestion log', {
            error: toError(logError).message,
          });
        }
        throw err;
      }
    } else {
      log.info('No records produced; merge skipped', { source, shape: normalized.shape.kind });
    }

    await appendFlags(store, result);
    await appendLogRow(store, result, now.toISOString());

    const summary = summarizeFlags(flags);
    log.info('Ingestion complete', {
      source,
      status: result.status,
      rawRows: result.rawRowCount,
      records: result.recordCount,
      droppedZeroCells: result.droppedZeroCells,
      flags: summary.total,
      highSeverityFlags: summary.bySeverity.HIGH,
      brandNew: result.merge?.brandNew ?? 0,
      updated: result.merge?.updated ?? 0,
    });

    return result;
  });
}

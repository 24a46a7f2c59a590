import { format } from 'date-fns';
import { createLogger } from '../utils/logger';
import { compareRecords, groupBySeriesKey, seriesKeyOf } from './records';
import { relativeChange } from './variations';
import type { CanonicalRecord, FlagKind, QualityFlag, Severity } from './types';

const log = createLogger('quality');

export type QualityCheck = 'outliers' | 'variation' | 'negative' | 'future' | 'constant';

export const ALL_CHECKS: readonly QualityCheck[] = ['outliers', 'variation', 'negative', 'future', 'constant'];

export interface QualityThresholds {
  outlierZ: number;
  outlierHighZ: number;
  outlierMinPoints: number;
  variation: number;
  variationHigh: number;
  constantShare: number;
  constantMinPoints: number;
}

export const DEFAULT_THRESHOLDS: QualityThresholds = {
  outlierZ: 3.0,
  outlierHighZ: 4.0,
  outlierMinPoints: 3,
  variation: 0.10,
  variationHigh: 0.25,
  constantShare: 0.5,
  constantMinPoints: 5,
};

export interface QualityOptions {
  checks?: readonly QualityCheck[];
  /** Declared by the caller for index and price levels; never guessed. */
  nonNegative?: boolean;
  /** Processing date for the future-date check. */
  now?: Date;
  thresholds?: Partial<QualityThresholds>;
}

interface Point {
  record: CanonicalRecord;
  value: number;
}

const formatNumber = (value: number): string =>
  Number.isFinite(value) ? value.toFixed(2) : String(value);

function nonNullPoints(series: readonly CanonicalRecord[]): Point[] {
  const points: Point[] = [];
  for (const record of series) {
    if (record.value !== null) points.push({ record, value: record.value });
  }
  return points;
}

function meanAndStd(values: readonly number[]): { mean: number; std: number } {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0) / values.length;
  return { mean, std: Math.sqrt(variance) };
}

function flag(
  point: { record: CanonicalRecord; value: number | null },
  kind: FlagKind,
  severity: Severity,
  detail: string
): QualityFlag {
  // Flags carry only the series id; name the dimensioned series in the detail.
  const seriesKey = seriesKeyOf(point.record);
  return {
    seriesId: point.record.seriesId,
    referenceDate: point.record.referenceDate,
    kind,
    severity,
    observedValue: point.value,
    detail: seriesKey === point.record.seriesId ? detail : `${detail} (series ${seriesKey})`,
  };
}

/**
 * Each value is scored against the mean and population deviation of the
 * other values. When the other values do not vary at all, the score falls
 * back to the mean and deviation of the whole series.
 */
export function checkOutliers(points: readonly Point[], t: QualityThresholds): QualityFlag[] {
  if (points.length < t.outlierMinPoints) return [];

  const flags: QualityFlag[] = [];
  const full = meanAndStd(points.map(p => p.value));
  points.forEach((point, i) => {
    const others = points.filter((_, j) => j !== i).map(p => p.value);
    const leaveOneOut = meanAndStd(others);
    const useAll = leaveOneOut.std === 0;
    const { mean, std } = useAll ? full : leaveOneOut;
    const deviation = Math.abs(point.value - mean);
    if (deviation === 0 || std === 0) return;

    const z = deviation / std;
    if (z <= t.outlierZ) return;

    flags.push(flag(
      point,
      'OUTLIER',
      z > t.outlierHighZ ? 'HIGH' : 'MEDIUM',
      useAll
        ? `z-score ${formatNumber(z)} against mean ${formatNumber(mean)} of all ${points.length} values`
        : `z-score ${formatNumber(z)} against mean ${formatNumber(mean)} of the other ${others.length} values`
    ));
  });
  return flags;
}

export function checkVariation(points: readonly Point[], t: QualityThresholds): QualityFlag[] {
  const flags: QualityFlag[] = [];
  for (let i = 1; i < points.length; i++) {
    const change = relativeChange(points[i].value, points[i - 1].value);
    if (change === null || Math.abs(change) <= t.variation) continue;

    flags.push(flag(
      points[i],
      'HIGH_VARIATION',
      Math.abs(change) > t.variationHigh ? 'HIGH' : 'MEDIUM',
      `Change of ${(change * 100).toFixed(2)}% from ${points[i - 1].record.referenceDate}`
    ));
  }
  return flags;
}

export function checkNegative(points: readonly Point[]): QualityFlag[] {
  return points
    .filter(point => point.value < 0)
    .map(point => flag(point, 'NEGATIVE_VALUE', 'HIGH', `Negative value ${point.value} in a non-negative series`));
}

export function checkFutureDates(series: readonly CanonicalRecord[], now: Date): QualityFlag[] {
  const today = format(now, 'yyyy-MM-dd');
  return series
    .filter(record => record.referenceDate > today)
    .map(record => flag(
      { record, value: record.value },
      'FUTURE_DATE',
      'HIGH',
      `Reference date is after the processing date ${today}`
    ));
}

export function checkConstant(points: readonly Point[], t: QualityThresholds): QualityFlag[] {
  if (points.length < t.constantMinPoints) return [];

  const counts = new Map<number, number>();
  for (const point of points) {
    counts.set(point.value, (counts.get(point.value) ?? 0) + 1);
  }

  let modal = points[0].value;
  let modalCount = 0;
  for (const [value, count] of Array.from(counts.entries())) {
    if (count > modalCount) {
      modal = value;
      modalCount = count;
    }
  }

  if (modalCount / points.length <= t.constantShare) return [];

  const last = [...points].reverse().find(point => point.value === modal);
  if (!last) return [];

  return [flag(
    last,
    'CONSTANT_SERIES',
    'MEDIUM',
    `${modalCount} of ${points.length} values equal ${modal}`
  )];
}

/**
 * Advisory checks over one series. The records are read, never modified.
 */
export function runQualityChecks(
  records: readonly CanonicalRecord[],
  options: QualityOptions = {}
): QualityFlag[] {
  const checks = new Set(options.checks ?? ALL_CHECKS);
  const thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
  const series = [...records].sort(compareRecords);
  const points = nonNullPoints(series);
  const flags: QualityFlag[] = [];

  if (checks.has('outliers')) flags.push(...checkOutliers(points, thresholds));
  if (checks.has('variation')) flags.push(...checkVariation(points, thresholds));
  if (checks.has('negative') && options.nonNegative) flags.push(...checkNegative(points));
  if (checks.has('future')) flags.push(...checkFutureDates(series, options.now ?? new Date()));
  if (checks.has('constant')) flags.push(...checkConstant(points, thresholds));

  return flags;
}

export type QualityOptionsResolver =
  | QualityOptions
  | ((seriesKey: string, series: readonly CanonicalRecord[]) => QualityOptions);

/** Splits a batch by series key and checks each series on its own. */
export function runQualityChecksBySeries(
  records: readonly CanonicalRecord[],
  options: QualityOptionsResolver = {}
): QualityFlag[] {
  const flags: QualityFlag[] = [];

  for (const [seriesKey, series] of Array.from(groupBySeriesKey(records).entries())) {
    const resolved = typeof options === 'function' ? options(seriesKey, series) : options;
    const seriesFlags = runQualityChecks(series, resolved);
    if (seriesFlags.length > 0) {
      log.debug('Quality flags raised', { seriesKey, flags: seriesFlags.length });
    }
    flags.push(...seriesFlags);
  }

  return flags;
}

export interface FlagSummary {
  total: number;
  byKind: Record<FlagKind, number>;
  bySeverity: Record<Severity, number>;
}

export function summarizeFlags(flags: readonly QualityFlag[]): FlagSummary {
  const byKind: Record<FlagKind, number> = {
    OUTLIER: 0,
    HIGH_VARIATION: 0,
    NEGATIVE_VALUE: 0,
    FUTURE_DATE: 0,
    CONSTANT_SERIES: 0,
  };
  const bySeverity: Record<Severity, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  for (const item of flags) {
    byKind[item.kind]++;
    bySeverity[item.severity]++;
  }
  return { total: flags.length, byKind, bySeverity };
}

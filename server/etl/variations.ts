import { format, parseISO, subMonths, subYears } from 'date-fns';
import { compareRecords, groupBySeriesKey } from './records';
import type { CanonicalRecord } from './types';

export function relativeChange(current: number | null, base: number | null): number | null {
  if (current === null || base === null || base === 0) return null;
  return (current - base) / base;
}

const isMonthly = (series: readonly CanonicalRecord[]): boolean =>
  series.every(record => record.referenceDate.endsWith('-01'));

function yearAgo(referenceDate: string, monthly: boolean): string {
  const date = parseISO(referenceDate);
  return format(monthly ? subMonths(date, 12) : subYears(date, 1), 'yyyy-MM-dd');
}

/**
 * Fills `variationMom` (against the preceding record of the same series key)
 * and `variationYoy` (against the record dated one year earlier) as
 * fractions. Whatever the input carried in those fields is discarded.
 */
export function computeVariations(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  const result: CanonicalRecord[] = [];

  for (const group of Array.from(groupBySeriesKey(records).values())) {
    const series = [...group].sort(compareRecords);
    const monthly = isMonthly(series);
    const byDate = new Map(series.map(record => [record.referenceDate, record]));

    series.forEach((record, i) => {
      const previous = i > 0 ? series[i - 1] : undefined;
      const lastYear = byDate.get(yearAgo(record.referenceDate, monthly));
      result.push({
        ...record,
        variationMom: relativeChange(record.value, previous?.value ?? null),
        variationYoy: relativeChange(record.value, lastYear?.value ?? null),
      });
    });
  }

  return result.sort(compareRecords);
}

import { ConflictDecisionError } from '../errors';
import { groupBy, sumBy } from '../reconcile/helpers';
import type { DateRange, LocalDate, PersistedEntry } from '../types/entry';
import type { PeriodSummary, PeriodType } from '../types/summary';
import { coverageMismatches, emptyTotals } from './helpers';
import { biweeklyIndexOf, biweeklyPeriods, monthKeyOf, monthOf, monthPeriod } from './periods';

/**
 * 按月输出 [上半月, 下半月, 整月] 三个汇总。
 * - 月份 = 条目涉及的月份 ∪ 参考日所在月份（没有条目的参考月也会输出全 0）
 * - 条目按开始日期 `date` 归属，跨午夜的班次算在开始那天
 */
export function aggregate(
  employeeId: string,
  acceptedEntries: readonly PersistedEntry[],
  referenceDate: LocalDate | Date,
): PeriodSummary[] {
  const own = acceptedEntries.filter((e) => e.employeeId === employeeId && e.status === 'accepted');
  const refMonth =
    typeof referenceDate === 'string' ? monthOf(referenceDate) : monthKeyOf(referenceDate);

  const byMonth = groupBy(own, (e) => monthOf(e.date));
  const months = new Set([refMonth, ...Object.keys(byMonth)]);

  const summaries: PeriodSummary[] = [];
  for (const month of [...months].sort()) {
    const entries = byMonth[month] ?? [];
    const halves = groupBy(entries, (e) => String(biweeklyIndexOf(e.date)));
    const [firstRange, secondRange] = biweeklyPeriods(month);

    const first = summarize(employeeId, 'biweekly', firstRange, halves['0'] ?? []);
    const second = summarize(employeeId, 'biweekly', secondRange, halves['1'] ?? []);
    const monthly = summarize(employeeId, 'monthly', monthPeriod(month), entries);

    const mismatched = coverageMismatches(first, second, monthly);
    if (mismatched.length > 0) {
      throw new ConflictDecisionError(
        `[aggregate] biweekly totals for ${employeeId} ${month} do not add up to the month (${mismatched.join(', ')})`,
      );
    }
    summaries.push(first, second, monthly);
  }
  return summaries;
}

function summarize(
  employeeId: string,
  periodType: PeriodType,
  range: DateRange,
  entries: readonly PersistedEntry[],
): PeriodSummary {
  const totalsByCode = emptyTotals();
  for (const e of entries) totalsByCode[e.serviceCode] += e.durationMinutes;
  return {
    employeeId,
    periodType,
    periodStart: range.start,
    periodEnd: range.end,
    totalsByCode,
    totalMinutes: sumBy(entries, (e) => e.durationMinutes),
    entryCount: entries.length,
  };
}

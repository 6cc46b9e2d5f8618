import { SERVICE_CODES } from '../types/entry';
import type { PeriodSummary, TotalsByCode } from '../types/summary';

export function emptyTotals(): TotalsByCode {
  return { 310: 0, 320: 0, 331: 0 };
}

export function addTotals(a: TotalsByCode, b: TotalsByCode): TotalsByCode {
  const out = emptyTotals();
  for (const code of SERVICE_CODES) out[code] = a[code] + b[code];
  return out;
}

/** Codes whose biweekly minutes do not add up to the monthly minutes. */
export function coverageMismatches(
  first: PeriodSummary,
  second: PeriodSummary,
  month: PeriodSummary,
): string[] {
  const sum = addTotals(first.totalsByCode, second.totalsByCode);
  const codes: string[] = SERVICE_CODES.filter((c) => sum[c] !== month.totalsByCode[c]).map(String);
  if (first.totalMinutes + second.totalMinutes !== month.totalMinutes) codes.push('total');
  return codes;
}

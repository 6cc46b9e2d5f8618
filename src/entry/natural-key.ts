import type { NaturalKey, WorkEntry } from '../types/entry';

const SEP = '::';

export function naturalKeyOf(
  entry: Pick<WorkEntry, 'employeeId' | 'date' | 'startTime' | 'serviceCode'>,
): NaturalKey {
  return [entry.employeeId, entry.date, entry.startTime, String(entry.serviceCode)].join(SEP);
}

export function splitNaturalKey(key: NaturalKey): {
  employeeId: string;
  date: string;
  startTime: string;
  serviceCode: string;
} {
  // employeeId 里可能带 "::"，所以从右边取三段
  const parts = key.split(SEP);
  if (parts.length < 4) throw new Error(`[shift-sync] malformed natural key: ${key}`);
  const serviceCode = parts.pop() ?? '';
  const startTime = parts.pop() ?? '';
  const date = parts.pop() ?? '';
  return { employeeId: parts.join(SEP), date, startTime, serviceCode };
}

export function compareKeys(a: NaturalKey, b: NaturalKey): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

import { compareKeys } from '../entry/natural-key';
import type { NaturalKey, PersistedEntry, WorkEntry } from '../types/entry';
import type { UpdatableField } from './types';

// ---------- 聚合工具 ----------

export function sumBy<T>(arr: readonly T[], pick: (x: T) => number): number {
  let s = 0;
  for (const it of arr) s += pick(it) || 0;
  return s;
}

export function groupBy<T>(arr: readonly T[], key: (x: T) => string): Record<string, T[]> {
  const m: Record<string, T[]> = {};
  for (const it of arr) {
    const k = key(it);
    (m[k] ||= []).push(it);
  }
  return m;
}

export function byNaturalKey<T extends { naturalKey: NaturalKey }>(a: T, b: T): number {
  return compareKeys(a.naturalKey, b.naturalKey);
}

// ---------- 字段比较 ----------

const UPDATABLE: UpdatableField[] = ['endTime', 'endDate', 'durationMinutes', 'sourceId'];

/** Fields outside the natural key whose source value differs from the stored one. */
export function changedFields(stored: PersistedEntry, fresh: WorkEntry): UpdatableField[] {
  return UPDATABLE.filter((f) => stored[f] !== fresh[f]);
}

export function inWindow(date: string, window?: { start: string; end: string }): boolean {
  if (!window) return true;
  return date >= window.start && date <= window.end;
}

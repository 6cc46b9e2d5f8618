import { compareKeys, naturalKeyOf } from '../entry/natural-key';
import { validateEntry } from '../entry/validate';
import type { ExtractedEntry, NaturalKey, PersistedEntry, WorkEntry } from '../types/entry';
import { byNaturalKey, changedFields, groupBy, inWindow } from './helpers';
import type {
  AuditRecord,
  DeleteDecision,
  DuplicateRecord,
  InsertDecision,
  ReconcileDecisions,
  ReconcileOptions,
  ReconciliationIssue,
  UpdateDecision,
} from './types';

/**
 * Diffs one employee's freshly extracted entries against what is stored for them.
 *
 * Pure: the same inputs always give the same decisions, whatever order they arrive in,
 * so a run can be repeated safely.
 */
export function reconcile(
  employeeId: string,
  newEntries: ExtractedEntry[],
  persistedEntries: PersistedEntry[],
  opts: ReconcileOptions = {},
): ReconcileDecisions {
  const { window } = opts;
  const issues: ReconciliationIssue[] = [];
  const audit: AuditRecord[] = [];
  const decisions: ReconcileDecisions = {
    employeeId,
    toInsert: [],
    toUpdate: [],
    toDelete: [],
    duplicates: [],
    validationErrors: [],
    issues,
    audit,
  };

  // ---------- 1) 校验 ----------
  const valid: WorkEntry[] = [];
  for (const raw of newEntries) {
    const result = validateEntry(raw, employeeId);
    if (result.ok) {
      valid.push(result.entry);
      continue;
    }
    const { failure } = result;
    const label = failure.sourceId ?? '(no source id)';
    const reasons = failure.problems.map((p) => p.message).join('; ');
    decisions.validationErrors.push(failure);
    issues.push({
      level: 'WARNING',
      code: 'ENTRY_INVALID',
      message: `Entry ${label} for ${employeeId} was skipped: ${reasons}.`,
      employeeId,
      date: raw.date,
      meta: { problems: failure.problems.map((p) => p.code) },
    });
    audit.push({ action: 'invalid', sourceId: failure.sourceId, detail: reasons });
  }

  // 窗口外的新条目既不插入也不比较；存储侧同样只看窗口内
  if (window) {
    const outside = valid
      .filter((e) => !inWindow(e.date, window))
      .sort((a, b) => compareKeys(naturalKeyOf(a), naturalKeyOf(b)) || compareEntries(a, b));
    for (const e of outside) {
      issues.push({
        level: 'INFO',
        code: 'OUTSIDE_WINDOW',
        message: `Entry ${e.sourceId} (${e.date}) is outside ${window.start}..${window.end} and was ignored.`,
        employeeId,
        naturalKey: naturalKeyOf(e),
        date: e.date,
      });
    }
  }

  // ---------- 2) 新数据按 natural key 去重 ----------
  const fresh = new Map<NaturalKey, WorkEntry>();
  const freshGroups = groupBy(
    valid.filter((e) => inWindow(e.date, window)),
    naturalKeyOf,
  );
  for (const key of Object.keys(freshGroups).sort(compareKeys)) {
    const [kept, ...rest] = [...freshGroups[key]].sort(compareEntries);
    fresh.set(key, kept);
    for (const dup of rest) {
      const record: DuplicateRecord = { naturalKey: key, entry: dup, keptSourceId: kept.sourceId };
      decisions.duplicates.push(record);
      issues.push({
        level: 'INFO',
        code: 'DUPLICATE_IN_FETCH',
        message: `Entry ${dup.sourceId} repeats ${kept.sourceId} (${dup.date} ${dup.startTime}, code ${dup.serviceCode}) and was dropped.`,
        employeeId,
        naturalKey: key,
        date: dup.date,
        meta: { keptSourceId: kept.sourceId, droppedSourceId: dup.sourceId },
      });
      audit.push({
        action: 'duplicate',
        naturalKey: key,
        sourceId: dup.sourceId,
        detail: `kept ${kept.sourceId}`,
      });
    }
  }

  // ---------- 3) 存储侧索引 ----------
  const inScope = persistedEntries.filter(
    (p) => p.employeeId === employeeId && inWindow(p.date, window),
  );
  const stored = new Map<NaturalKey, PersistedEntry>();

  for (const p of inScope) {
    if (p.status !== 'accepted') {
      // rejected/duplicate 不应留在库里，这里顺手清掉
      pushDelete(decisions, { naturalKey: naturalKeyOf(p), entry: p, reason: 'STALE_STATUS' });
    }
  }

  const acceptedGroups = groupBy(
    inScope.filter((p) => p.status === 'accepted'),
    naturalKeyOf,
  );
  for (const key of Object.keys(acceptedGroups).sort(compareKeys)) {
    const [kept, ...extra] = [...acceptedGroups[key]].sort((a, b) => compareIds(a.id, b.id));
    stored.set(key, kept);
    if (extra.length === 0) continue;
    issues.push({
      level: 'ERROR',
      code: 'CONFLICT_DUPLICATE_ACCEPTED',
      message: `${extra.length + 1} accepted rows share ${key}; keeping ${kept.id}.`,
      employeeId,
      naturalKey: key,
      date: kept.date,
      meta: { keptId: kept.id, removedIds: extra.map((e) => e.id) },
    });
    for (const e of extra) pushDelete(decisions, { naturalKey: key, entry: e, reason: 'CONFLICT' });
  }

  // ---------- 4) 对比 ----------
  const allKeys = new Set<NaturalKey>([...fresh.keys(), ...stored.keys()]);
  for (const key of [...allKeys].sort(compareKeys)) {
    const f = fresh.get(key);
    const s = stored.get(key);

    if (f && !s) {
      const insert: InsertDecision = { naturalKey: key, entry: f };
      decisions.toInsert.push(insert);
      audit.push({ action: 'insert', naturalKey: key, sourceId: f.sourceId, detail: 'new in source' });
    } else if (f && s) {
      const fields = changedFields(s, f);
      if (fields.length === 0) continue;
      const update: UpdateDecision = {
        naturalKey: key,
        id: s.id,
        before: s,
        entry: f,
        changedFields: fields,
      };
      decisions.toUpdate.push(update);
      audit.push({
        action: 'update',
        naturalKey: key,
        sourceId: f.sourceId,
        detail: fields.map((field) => `${field}: ${s[field] ?? '-'} -> ${f[field] ?? '-'}`).join(', '),
      });
    } else if (s) {
      pushDelete(decisions, { naturalKey: key, entry: s, reason: 'MISSING_FROM_SOURCE' });
    }
  }

  decisions.toDelete.sort((a, b) => byNaturalKey(a, b) || compareIds(a.entry.id, b.entry.id));
  return decisions;
}

function pushDelete(decisions: ReconcileDecisions, decision: DeleteDecision) {
  decisions.toDelete.push(decision);
  decisions.audit.push({
    action: 'delete',
    naturalKey: decision.naturalKey,
    sourceId: decision.entry.sourceId,
    detail: `${decision.reason} (id ${decision.entry.id}, was ${decision.entry.status})`,
  });
}

// 决定重复项里留哪一条：sourceId 最小的；相同 sourceId 再比其余字段
function compareEntries(a: WorkEntry, b: WorkEntry): number {
  return (
    compareKeys(a.sourceId, b.sourceId) ||
    compareKeys(a.endDate ?? '', b.endDate ?? '') ||
    compareKeys(a.endTime, b.endTime) ||
    a.durationMinutes - b.durationMinutes
  );
}

function compareIds(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  if (Number.isSafeInteger(na) && Number.isSafeInteger(nb)) return na - nb;
  return compareKeys(a, b);
}

import { errorMessage } from '../errors';
import { silentLogger } from '../logger';
import { compareKeys, splitNaturalKey } from '../entry/natural-key';
import { inWindow } from '../reconcile/helpers';
import type { CalendarMapping } from '../types/calendar';
import type { DateRange, NaturalKey, PersistedEntry, WorkEntry } from '../types/entry';
import type { InsertDecision } from '../reconcile/types';
import { KeyedMutex, mapWithConcurrency } from './keyed-mutex';
import { retryWithBackoff } from './retry';
import type {
  CalendarOp,
  SyncDecisions,
  SyncDeps,
  SyncFailure,
  SyncOptions,
  SyncOutcome,
  SyncResult,
} from './types';

/** Calendar-relevant fields of an entry; a changed fingerprint means the event needs rewriting. */
export function calendarFingerprint(entry: WorkEntry, profile = ''): string {
  return JSON.stringify([
    profile,
    entry.sourceId,
    entry.date,
    entry.startTime,
    entry.endDate ?? null,
    entry.endTime,
    entry.serviceCode,
    entry.durationMinutes,
  ]);
}

/**
 * 把 reconcile 的决定翻译成日历操作，每个 natural key 至多一个。
 * - CONFLICT 删除的是同 key 的多余行，key 本身仍然 accepted，日历不动
 * - 同一 key 既有删除又有新增/更新时，以新增/更新为准
 */
export function planCalendarOps(decisions: SyncDecisions): CalendarOp[] {
  const ops = new Map<NaturalKey, CalendarOp>();
  for (const d of decisions.toDelete) {
    if (d.reason === 'CONFLICT') continue;
    ops.set(d.naturalKey, { kind: 'remove', naturalKey: d.naturalKey });
  }
  for (const d of [...decisions.toInsert, ...decisions.toUpdate]) {
    ops.set(d.naturalKey, { kind: 'upsert', naturalKey: d.naturalKey, entry: d.entry });
  }
  return [...ops.values()].sort((a, b) => compareKeys(a.naturalKey, b.naturalKey));
}

/**
 * Accepted entries whose calendar event is missing or stale, e.g. because a write failed
 * on an earlier run. Feeding them back as upserts restores one current mapping per
 * accepted entry.
 */
export function collectOutOfSync(
  accepted: readonly PersistedEntry[],
  mappings: readonly CalendarMapping[],
  profile?: string,
): InsertDecision[] {
  const byKey = new Map(mappings.map((m) => [m.naturalKey, m]));
  return accepted
    .filter((e) => e.status === 'accepted')
    .map((e) => ({ naturalKey: e.naturalKey, entry: stripStorage(e) }))
    .filter(
      ({ naturalKey, entry }) =>
        byKey.get(naturalKey)?.fingerprint !== calendarFingerprint(entry, profile),
    )
    .sort((a, b) => compareKeys(a.naturalKey, b.naturalKey));
}

/**
 * Mapped keys inside `range` whose entry is no longer accepted, e.g. because the event
 * delete failed after the row was already purged. They are removed like any other delete.
 */
export function collectOrphans(
  accepted: readonly PersistedEntry[],
  mappings: readonly CalendarMapping[],
  range: DateRange,
): SyncDecisions['toDelete'] {
  const live = new Set(accepted.filter((e) => e.status === 'accepted').map((e) => e.naturalKey));
  return mappings
    .filter((m) => !live.has(m.naturalKey) && inWindow(splitNaturalKey(m.naturalKey).date, range))
    .map((m) => ({ naturalKey: m.naturalKey, reason: 'MISSING_FROM_SOURCE' as const }))
    .sort((a, b) => compareKeys(a.naturalKey, b.naturalKey));
}

export async function syncCalendar(
  decisions: SyncDecisions,
  deps: SyncDeps,
  opts: SyncOptions = {},
): Promise<SyncResult> {
  const logger = opts.logger ?? silentLogger;
  const mutex = opts.mutex ?? new KeyedMutex();
  const now = opts.now ?? (() => new Date());
  const { mappings, calendar, entries } = deps;

  const call = <T>(operation: string, fn: () => Promise<T>) =>
    retryWithBackoff(operation, fn, {
      policy: opts.retry,
      timeoutMs: opts.timeoutMs,
      sleepFn: opts.sleepFn,
      signal: opts.signal,
      onRetry: ({ attempt, delayMs, error }) =>
        logger.warn(`${operation} attempt ${attempt} failed, retrying in ${delayMs}ms`, {
          error: errorMessage(error),
        }),
    });

  const upsert = async (naturalKey: NaturalKey, entry: WorkEntry): Promise<SyncOutcome> => {
    const fingerprint = calendarFingerprint(entry, calendar.profile);
    // 幂等靠本地 mapping，不去日历里查“是否已存在”
    const existing = await call(`mapping.get ${naturalKey}`, () => mappings.getMapping(naturalKey));
    if (existing && existing.fingerprint === fingerprint) {
      return { naturalKey, action: 'unchanged', externalEventId: existing.externalEventId };
    }

    let externalEventId: string;
    if (existing) {
      externalEventId = existing.externalEventId;
      await call(`calendar.update ${naturalKey}`, () => calendar.update(externalEventId, entry));
    } else {
      externalEventId = await call(`calendar.create ${naturalKey}`, () => calendar.create(entry));
    }

    const syncedAt = now().toISOString();
    const mapping: CalendarMapping = {
      naturalKey,
      employeeId: entry.employeeId,
      externalEventId,
      fingerprint,
      syncedAt,
    };
    await call(`mapping.put ${naturalKey}`, () => mappings.putMapping(mapping));
    if (entries) await call(`entry.markSynced ${naturalKey}`, () => entries.markSynced(naturalKey, syncedAt));
    return { naturalKey, action: existing ? 'updated' : 'created', externalEventId };
  };

  const remove = async (naturalKey: NaturalKey): Promise<SyncOutcome> => {
    const existing = await call(`mapping.get ${naturalKey}`, () => mappings.getMapping(naturalKey));
    if (!existing) return { naturalKey, action: 'absent' };
    // 先删日历事件，再删 mapping；中途失败时下次还能凭 mapping 重试
    await call(`calendar.delete ${naturalKey}`, () => calendar.delete(existing.externalEventId));
    await call(`mapping.delete ${naturalKey}`, () => mappings.deleteMapping(naturalKey));
    return { naturalKey, action: 'deleted', externalEventId: existing.externalEventId };
  };

  const ops = planCalendarOps(decisions);
  const outcomes: SyncOutcome[] = [];
  const failures: SyncFailure[] = [];

  const settled = await mapWithConcurrency(ops, opts.concurrency ?? 4, (op) =>
    mutex
      .runExclusive(`mapping:${op.naturalKey}`, () =>
        op.kind === 'upsert' ? upsert(op.naturalKey, op.entry) : remove(op.naturalKey),
      )
      .then(
        (outcome) => ({ ok: true as const, outcome }),
        (error: unknown) => ({ ok: false as const, op, error }),
      ),
  );

  for (const s of settled) {
    if (s.ok) {
      outcomes.push(s.outcome);
      continue;
    }
    const failure: SyncFailure = {
      naturalKey: s.op.naturalKey,
      operation: s.op.kind,
      message: errorMessage(s.error),
      error: s.error,
    };
    failures.push(failure);
    logger.error(`calendar ${failure.operation} failed for ${failure.naturalKey}`, {
      error: failure.message,
    });
  }

  const counts: SyncResult['counts'] = {
    created: 0,
    updated: 0,
    deleted: 0,
    unchanged: 0,
    absent: 0,
    failed: failures.length,
  };
  for (const o of outcomes) counts[o.action]++;

  return { outcomes, failures, counts };
}

function stripStorage(e: PersistedEntry): WorkEntry {
  const entry: WorkEntry = {
    employeeId: e.employeeId,
    date: e.date,
    startTime: e.startTime,
    endTime: e.endTime,
    serviceCode: e.serviceCode,
    durationMinutes: e.durationMinutes,
    sourceId: e.sourceId,
  };
  if (e.endDate !== undefined) entry.endDate = e.endDate;
  return entry;
}

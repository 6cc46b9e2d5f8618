import { produce } from 'immer';
import { ConflictDecisionError } from '../errors';
import type { NaturalKey, PersistedEntry, WorkEntry } from '../types/entry';
import type { ReconcileDecisions } from '../reconcile/types';
import { byNaturalKey } from '../reconcile/helpers';

export type ApplyOptions = {
  now: string; // ISO8601，写入 updatedAt
  /** Storage identity for inserted rows. Defaults to the natural key. */
  nextId?: (naturalKey: NaturalKey) => string;
};

export function toPersistedEntry(
  entry: WorkEntry,
  naturalKey: NaturalKey,
  id: string,
  now: string,
): PersistedEntry {
  return { ...entry, id, naturalKey, status: 'accepted', lastSyncedAt: null, updatedAt: now };
}

/**
 * Projects a decision set onto a persisted set and returns the next state.
 * `current` is left untouched; unchanged rows keep their identity.
 */
export function applyDecisions(
  current: readonly PersistedEntry[],
  decisions: ReconcileDecisions,
  opts: ApplyOptions,
): PersistedEntry[] {
  const nextId = opts.nextId ?? ((key: NaturalKey) => key);

  const next = produce([...current], (draft) => {
    // 1) 删除
    const deleteIds = new Set(decisions.toDelete.map((d) => d.entry.id));
    for (let i = draft.length - 1; i >= 0; i--) {
      if (deleteIds.has(draft[i].id)) draft.splice(i, 1);
    }

    // 2) 原地更新，来源值优先
    for (const u of decisions.toUpdate) {
      const row = draft.find((r) => r.id === u.id);
      if (!row) {
        throw new ConflictDecisionError(`[apply] update targets missing row ${u.id} (${u.naturalKey})`);
      }
      Object.assign(row, u.entry, { updatedAt: opts.now });
      if (u.entry.endDate === undefined) delete row.endDate;
    }

    // 3) 新增
    for (const ins of decisions.toInsert) {
      const clash = draft.find((r) => r.naturalKey === ins.naturalKey && r.status === 'accepted');
      if (clash) {
        throw new ConflictDecisionError(
          `[apply] insert of ${ins.naturalKey} clashes with accepted row ${clash.id}`,
        );
      }
      draft.push(toPersistedEntry(ins.entry, ins.naturalKey, nextId(ins.naturalKey), opts.now));
    }

    draft.sort(byNaturalKey);
  });

  return next;
}

import { describe, it, expect } from 'vitest';
import { ConflictDecisionError, applyDecisions, reconcile } from '../src';
import { E1, makeDecisions, makeEntry, makePersisted, makeRaw } from './helpers/factories';

const NOW = '2025-07-20T00:00:00.000Z';

describe('applyDecisions', () => {
  it('applies deletes, updates and inserts and returns rows sorted by key', () => {
    const current = [
      makePersisted({ id: '1' }),
      makePersisted({ id: '2', date: '2025-07-05', sourceId: 's5' }),
    ];
    const decisions = reconcile(
      E1,
      [
        makeRaw({ endTime: '18:00', durationMinutes: 540 }),
        makeRaw({ date: '2025-07-03', sourceId: 's3' }),
      ],
      current,
    );

    const next = applyDecisions(current, decisions, { now: NOW, nextId: () => '7' });

    expect(next.map((r) => [r.id, r.date, r.endTime, r.updatedAt])).toEqual([
      ['1', '2025-07-01', '18:00', NOW],
      ['7', '2025-07-03', '17:00', NOW],
    ]);
    expect(next[1]).toMatchObject({ status: 'accepted', lastSyncedAt: null, sourceId: 's3' });
  });

  it('leaves the input untouched', () => {
    const current = [makePersisted({ id: '1' })];
    const decisions = reconcile(E1, [makeRaw({ endTime: '18:00', durationMinutes: 540 })], current);

    applyDecisions(current, decisions, { now: NOW });

    expect(current[0].endTime).toBe('17:00');
    expect(current[0].durationMinutes).toBe(480);
  });

  it('uses the natural key as id when no id source is given', () => {
    const next = applyDecisions([], reconcile(E1, [makeRaw()], []), { now: NOW });
    expect(next[0].id).toBe('emp-1::2025-07-01::09:00::310');
  });

  it('drops the end date when the source no longer reports one', () => {
    const current = [
      makePersisted({ id: '1', startTime: '22:00', endTime: '06:00', endDate: '2025-07-02' }),
    ];
    const decisions = reconcile(
      E1,
      [makeRaw({ startTime: '22:00', endTime: '23:30', durationMinutes: 90 })],
      current,
    );

    const next = applyDecisions(current, decisions, { now: NOW });

    expect(next[0].endTime).toBe('23:30');
    expect('endDate' in next[0]).toBe(false);
  });

  it('refuses an insert that clashes with an accepted row', () => {
    const decisions = makeDecisions({
      toInsert: [{ naturalKey: 'emp-1::2025-07-01::09:00::310', entry: makeEntry() }],
    });
    expect(() => applyDecisions([makePersisted({ id: '1' })], decisions, { now: NOW })).toThrow(
      ConflictDecisionError,
    );
  });

  it('refuses an update whose row is gone', () => {
    const before = makePersisted({ id: '42' });
    const decisions = makeDecisions({
      toUpdate: [
        {
          naturalKey: before.naturalKey,
          id: '42',
          before,
          entry: makeEntry({ endTime: '18:00' }),
          changedFields: ['endTime'],
        },
      ],
    });
    expect(() => applyDecisions([], decisions, { now: NOW })).toThrow(
      '[apply] update targets missing row 42',
    );
  });
});

import { describe, it, expect } from 'vitest';
import {
  MemoryEntryStore,
  MemoryMappingStore,
  TransientExternalError,
  calendarFingerprint,
  collectOrphans,
  collectOutOfSync,
  planCalendarOps,
  reconcile,
  syncCalendar,
} from '../src';
import {
  AT,
  E1,
  FakeCalendar,
  MemoryLogger,
  makeEntry,
  makeMapping,
  makePersisted,
  makeRaw,
  noSleep,
} from './helpers/factories';

const K1 = 'emp-1::2025-07-01::09:00::310';
const K2 = 'emp-1::2025-07-02::09:00::310';
const opts = { sleepFn: noSleep, retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 } };

// =======================================================
// 1) 计划
// =======================================================
describe('planCalendarOps', () => {
  it('leaves the calendar alone for conflict deletes', () => {
    expect(
      planCalendarOps({ toInsert: [], toUpdate: [], toDelete: [{ naturalKey: K1, reason: 'CONFLICT' }] }),
    ).toEqual([]);
  });

  it('lets an upsert win over a remove of the same key', () => {
    const entry = makeEntry();
    expect(
      planCalendarOps({
        toInsert: [{ naturalKey: K1, entry }],
        toUpdate: [],
        toDelete: [{ naturalKey: K1, reason: 'STALE_STATUS' }],
      }),
    ).toEqual([{ kind: 'upsert', naturalKey: K1, entry }]);
  });
});

// =======================================================
// 2) 同步
// =======================================================
describe('syncCalendar', () => {
  it('creates events once and makes no calls on a second pass', async () => {
    const mappings = new MemoryMappingStore();
    const calendar = new FakeCalendar();
    const decisions = reconcile(E1, [makeRaw(), makeRaw({ date: '2025-07-02', sourceId: 's2' })], []);

    const first = await syncCalendar(decisions, { mappings, calendar }, opts);
    expect(first.counts).toMatchObject({ created: 2, failed: 0 });
    expect(first.outcomes).toEqual([
      { naturalKey: K1, action: 'created', externalEventId: 'evt-1' },
      { naturalKey: K2, action: 'created', externalEventId: 'evt-2' },
    ]);

    const second = await syncCalendar(decisions, { mappings, calendar }, opts);
    expect(second.counts).toMatchObject({ created: 0, unchanged: 2 });
    expect(calendar.calls).toHaveLength(2);
    expect(mappings.size()).toBe(2);
  });

  it('deletes the mapped event and then its mapping', async () => {
    const entry = makeEntry();
    const mappings = new MemoryMappingStore([makeMapping(entry, { externalEventId: 'm1' })]);
    const calendar = new FakeCalendar();

    const result = await syncCalendar(
      { toInsert: [], toUpdate: [], toDelete: [{ naturalKey: K1, reason: 'MISSING_FROM_SOURCE' }] },
      { mappings, calendar },
      opts,
    );

    expect(calendar.calls).toEqual([{ op: 'delete', id: 'm1' }]);
    expect(await mappings.getMapping(K1)).toBeUndefined();
    expect(result.outcomes).toEqual([{ naturalKey: K1, action: 'deleted', externalEventId: 'm1' }]);
  });

  it('reports a remove without a mapping as absent', async () => {
    const calendar = new FakeCalendar();
    const result = await syncCalendar(
      { toInsert: [], toUpdate: [], toDelete: [{ naturalKey: K1 }] },
      { mappings: new MemoryMappingStore(), calendar },
      opts,
    );
    expect(result.outcomes).toEqual([{ naturalKey: K1, action: 'absent' }]);
    expect(calendar.calls).toEqual([]);
  });

  it('updates the existing event when a mapping is already there', async () => {
    const before = makeEntry();
    const after = makeEntry({ endTime: '18:00', durationMinutes: 540 });
    const mappings = new MemoryMappingStore([makeMapping(before, { externalEventId: 'm1' })]);
    const calendar = new FakeCalendar();

    const result = await syncCalendar(
      { toInsert: [{ naturalKey: K1, entry: after }], toUpdate: [], toDelete: [] },
      { mappings, calendar },
      { ...opts, now: () => new Date(AT) },
    );

    expect(calendar.calls).toEqual([{ op: 'update', id: 'm1', entry: after }]);
    expect(result.counts.updated).toBe(1);
    expect(await mappings.getMapping(K1)).toEqual({
      naturalKey: K1,
      employeeId: E1,
      externalEventId: 'm1',
      fingerprint: calendarFingerprint(after),
      syncedAt: AT,
    });
  });

  it('rewrites the event when only the source id changed', async () => {
    const before = makeEntry();
    const after = makeEntry({ sourceId: 's9' });
    const mappings = new MemoryMappingStore([makeMapping(before, { externalEventId: 'm1' })]);
    const calendar = new FakeCalendar();

    await syncCalendar(
      { toInsert: [], toUpdate: [{ naturalKey: K1, entry: after }], toDelete: [] },
      { mappings, calendar },
      opts,
    );

    expect(calendar.calls).toEqual([{ op: 'update', id: 'm1', entry: after }]);
  });

  it('rewrites the event once when the owner settings change', async () => {
    const entry = makeEntry();
    const mappings = new MemoryMappingStore([makeMapping(entry, { externalEventId: 'm1' })]);
    const calendar = new FakeCalendar('["Alice","9","UTC"]');
    const decisions = { toInsert: [{ naturalKey: K1, entry }], toUpdate: [], toDelete: [] };

    await syncCalendar(decisions, { mappings, calendar }, opts);
    const again = await syncCalendar(decisions, { mappings, calendar }, opts);

    expect(calendar.calls).toEqual([{ op: 'update', id: 'm1', entry }]);
    expect(again.counts.unchanged).toBe(1);
    expect((await mappings.getMapping(K1))?.fingerprint).toBe(
      calendarFingerprint(entry, '["Alice","9","UTC"]'),
    );
  });

  it('stamps the stored entry once its event is written', async () => {
    const entries = new MemoryEntryStore([makePersisted({ id: '1' })]);
    await syncCalendar(
      { toInsert: [{ naturalKey: K1, entry: makeEntry() }], toUpdate: [], toDelete: [] },
      { mappings: new MemoryMappingStore(), calendar: new FakeCalendar(), entries },
      { ...opts, now: () => new Date(AT) },
    );
    expect(entries.snapshot()[0].lastSyncedAt).toBe(AT);
  });

  it('isolates a failing key from the others', async () => {
    const mappings = new MemoryMappingStore();
    const calendar = new FakeCalendar();
    calendar.failOn = (call) =>
      call.op === 'create' && call.entry.date === '2025-07-01'
        ? new TransientExternalError('503')
        : undefined;
    const logger = new MemoryLogger();
    const decisions = reconcile(E1, [makeRaw(), makeRaw({ date: '2025-07-02', sourceId: 's2' })], []);

    const result = await syncCalendar(decisions, { mappings, calendar }, { ...opts, logger });

    expect(result.counts).toMatchObject({ created: 1, failed: 1 });
    expect(result.failures.map((f) => [f.naturalKey, f.operation, f.message])).toEqual([
      [K1, 'upsert', `calendar.create ${K1} failed after 2 attempts: 503`],
    ]);
    expect(calendar.calls).toHaveLength(3);
    expect(await mappings.getMapping(K1)).toBeUndefined();
    expect(await mappings.getMapping(K2)).toMatchObject({ externalEventId: 'evt-1' });
    expect(logger.messages('error')).toEqual([`calendar upsert failed for ${K1}`]);
  });
});

// =======================================================
// 3) 补偿
// =======================================================
describe('drift repair', () => {
  const p1 = makePersisted({ id: '1' });
  const p2 = makePersisted({ id: '2', date: '2025-07-02', sourceId: 's2' });

  it('collects accepted entries with no current mapping', () => {
    expect(collectOutOfSync([p1, p2], [makeMapping(p1)])).toEqual([
      { naturalKey: K2, entry: makeEntry({ date: '2025-07-02', sourceId: 's2' }) },
    ]);
    expect(
      collectOutOfSync([p1], [makeMapping(p1, { fingerprint: 'stale' })]).map((x) => x.naturalKey),
    ).toEqual([K1]);
    const reowned = collectOutOfSync([p1], [makeMapping(p1)], 'other-owner');
    expect(reowned.map((x) => x.naturalKey)).toEqual([K1]);
  });

  it('collects mappings inside the range whose entry is gone', () => {
    const june = makeEntry({ date: '2025-06-30' });
    const orphans = collectOrphans(
      [p1],
      [makeMapping(p1), makeMapping(p2), makeMapping(june)],
      { start: '2025-07-01', end: '2025-07-31' },
    );
    expect(orphans).toEqual([{ naturalKey: K2, reason: 'MISSING_FROM_SOURCE' }]);
  });
});

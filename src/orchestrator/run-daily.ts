import type { EmployeeConfig, RunConfig } from '../config/types';
import { RunDeadlineError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import { childLogger } from '../logger';
import { reconcile } from '../reconcile/reconcile';
import type { ReconcileDecisions, ReconciliationIssue } from '../reconcile/types';
import { aggregate } from '../summarize/aggregate';
import { retryWithBackoff } from '../sync/retry';
import { collectOrphans, collectOutOfSync, syncCalendar } from '../sync/sync';
import type { PeriodSummary } from '../types/summary';
import { applyDecisions } from './apply-decisions';
import type { RunContext } from './context';
import type { EmployeeCounts, EmployeeRunResult, RunResult, RunStatus } from './types';

/**
 * One scheduled pass over the whole roster.
 *
 * Employees run concurrently and fail independently. Work that has not finished when
 * `config.deadlineMs` passes is reported as failed; anything already committed stays,
 * and the next run picks up the remaining drift.
 */
export async function runDaily(ctx: RunContext, config: RunConfig): Promise<RunResult> {
  const startedAt = ctx.now().toISOString();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.deadlineMs);

  ctx.logger.info(
    `run started for ${config.employeeRoster.length} employee(s), ${config.dateRange.start}..${config.dateRange.end}${config.dryRun ? ' (dry run)' : ''}`,
  );

  try {
    const employees = await Promise.all(
      config.employeeRoster.map((employee) =>
        raceDeadline(runEmployee(ctx, config, employee, controller.signal), controller.signal).catch(
          (err: unknown): EmployeeRunResult => {
            ctx.logger.error(`[${employee.id}] run failed: ${errorMessage(err)}`);
            return failedResult(employee.id, err);
          },
        ),
      ),
    );

    const status = overallStatus(employees.map((e) => e.status));
    ctx.logger.info(`run finished: ${status}`);
    return {
      status,
      dryRun: config.dryRun,
      dateRange: config.dateRange,
      startedAt,
      finishedAt: ctx.now().toISOString(),
      employees,
    };
  } finally {
    clearTimeout(timer);
  }
}

export async function runEmployee(
  ctx: RunContext,
  config: RunConfig,
  employee: EmployeeConfig,
  signal: AbortSignal,
): Promise<EmployeeRunResult> {
  const log = childLogger(ctx.logger, `[${employee.id}]`);
  const range = config.dateRange;
  const errors: string[] = [];

  const call = <T>(operation: string, fn: () => Promise<T>, timeout = true) =>
    retryWithBackoff(operation, fn, {
      policy: config.retry,
      timeoutMs: timeout ? config.callTimeoutMs : undefined,
      sleepFn: ctx.sleepFn,
      signal,
      onRetry: ({ attempt, delayMs, error }) =>
        log.warn(`${operation} attempt ${attempt} failed, retrying in ${delayMs}ms`, {
          error: errorMessage(error),
        }),
    });

  // ---------- 1) 抽取（不设单次超时，整体受 deadline 约束）----------
  const extracted = await call('extract', () => ctx.extractor.fetch(employee, range), false);
  log.info(`extracted ${extracted.length} entries`);

  // ---------- 2) 同一员工的 reconcile + 落库串行 ----------
  const { decisions, accepted } = await ctx.locks.runExclusive(`employee:${employee.id}`, async () => {
    const persisted = await call('store.listEntries', () => ctx.entries.listEntries(employee.id, range));
    const decisions = reconcile(employee.id, extracted, persisted, { window: range });
    logIssues(log, decisions.issues);
    const at = ctx.now().toISOString();

    if (config.dryRun) {
      return { decisions, accepted: applyDecisions(persisted, decisions, { now: at }) };
    }
    checkDeadline(signal);
    // 事务内原子写入；不重试，失败就整员工失败，下次运行再来
    const applied = await ctx.entries.applyDecisions(decisions, at);
    log.info(`stored: +${applied.inserted} ~${applied.updated} -${applied.deleted}`);
    const current = await call('store.listEntries', () => ctx.entries.listEntries(employee.id, range));
    return { decisions, accepted: current };
  });

  const counts = countsOf(decisions);
  if (config.dryRun) {
    log.info(
      `dry run: would insert ${counts.inserted}, update ${counts.updated}, delete ${counts.deleted}`,
    );
  }

  // ---------- 3) 日历同步 ----------
  let sync: EmployeeRunResult['sync'];
  if (!config.dryRun) {
    const existing = await call('mapping.list', () => ctx.mappings.listMappings(employee.id));
    const calendar = ctx.calendarFor(employee);
    sync = await syncCalendar(
      {
        toInsert: [
          ...decisions.toInsert,
          ...collectOutOfSync(accepted, existing, calendar.profile),
        ],
        toUpdate: decisions.toUpdate,
        toDelete: [...decisions.toDelete, ...collectOrphans(accepted, existing, range)],
      },
      { mappings: ctx.mappings, calendar, entries: ctx.entries },
      {
        retry: config.retry,
        timeoutMs: config.callTimeoutMs,
        concurrency: config.syncConcurrency,
        sleepFn: ctx.sleepFn,
        signal,
        mutex: ctx.locks,
        now: ctx.now,
        logger: log,
      },
    );
    counts.calendarFailures = sync.failures.length;
    errors.push(...sync.failures.map((f) => `calendar ${f.operation} ${f.naturalKey}: ${f.message}`));
    log.info(
      `calendar: ${sync.counts.created} created, ${sync.counts.updated} updated, ${sync.counts.deleted} deleted, ${sync.counts.failed} failed`,
    );
  }

  // ---------- 4) 汇总 ----------
  let summaries: PeriodSummary[] = [];
  try {
    summaries = aggregate(employee.id, accepted, range.end);
  } catch (err) {
    // 理论上不会发生；记录下来但不中断
    errors.push(errorMessage(err));
    log.error(`aggregation failed: ${errorMessage(err)}`);
  }

  // ---------- 5) 通知 ----------
  let notified = false;
  if (!config.dryRun && summaries.length > 0) {
    try {
      await call('notify', () => ctx.notifier.send(employee.email, summaries));
      notified = true;
    } catch (err) {
      errors.push(`notify: ${errorMessage(err)}`);
      log.error(`notify failed: ${errorMessage(err)}`);
    }
  }

  return {
    employeeId: employee.id,
    status: errors.length > 0 ? 'partial-failure' : 'success',
    counts,
    summaries,
    decisions,
    sync,
    notified,
    errors,
  };
}

export function overallStatus(statuses: RunStatus[]): RunStatus {
  if (statuses.length > 0 && statuses.every((s) => s === 'success')) return 'success';
  if (statuses.every((s) => s === 'failure')) return 'failure';
  return 'partial-failure';
}

export function countsOf(decisions: ReconcileDecisions): EmployeeCounts {
  return {
    inserted: decisions.toInsert.length,
    updated: decisions.toUpdate.length,
    deleted: decisions.toDelete.length,
    rejectedValidation: decisions.validationErrors.length,
    duplicates: decisions.duplicates.length,
    calendarFailures: 0,
  };
}

function failedResult(employeeId: string, err: unknown): EmployeeRunResult {
  return {
    employeeId,
    status: 'failure',
    counts: {
      inserted: 0,
      updated: 0,
      deleted: 0,
      rejectedValidation: 0,
      duplicates: 0,
      calendarFailures: 0,
    },
    summaries: [],
    notified: false,
    errors: [errorMessage(err)],
  };
}

function logIssues(log: Logger, issues: ReconciliationIssue[]) {
  for (const issue of issues) {
    const meta = { code: issue.code, naturalKey: issue.naturalKey };
    if (issue.level === 'ERROR') log.error(issue.message, meta);
    else if (issue.level === 'WARNING') log.warn(issue.message, meta);
    else log.debug(issue.message, meta);
  }
}

function checkDeadline(signal: AbortSignal) {
  if (signal.aborted) throw new RunDeadlineError('run deadline passed');
}

function raceDeadline<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RunDeadlineError('run deadline passed'));
    void task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
}

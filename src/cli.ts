#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { GoogleCalendarClient } from './calendar/google-calendar-client';
import { loadRunConfig, wholeMonth } from './config/load';
import type { RunConfig } from './config/types';
import { FatalExternalError, errorMessage } from './errors';
import { createFileExtractor } from './extract/file-extractor';
import { createConsoleLogger } from './logger';
import { createLogNotifier } from './notify/report';
import { createRunContext } from './orchestrator/context';
import { runDaily } from './orchestrator/run-daily';
import type { RunStatus } from './orchestrator/types';
import { SqliteStore } from './store/sqlite-store';

const USAGE = `usage: shift-sync --config <file> [--dry-run] [--month yyyy-MM]`;

const EXIT_CODES: Record<RunStatus, number> = {
  success: 0,
  failure: 1,
  'partial-failure': 2,
};

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      'dry-run': { type: 'boolean', default: false },
      month: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help || !values.config) {
    console.error(USAGE);
    return values.help ? 0 : 1;
  }

  const loaded = loadRunConfig(values.config);
  const config: RunConfig = {
    ...loaded,
    dryRun: loaded.dryRun || values['dry-run'] === true,
    dateRange: values.month ? wholeMonth(values.month) : loaded.dateRange,
  };
  const logger = createConsoleLogger({ level: config.logLevel });
  if (!config.extractDir) {
    logger.error('config.extractDir is required to read timesheet exports');
    return 1;
  }

  const store = SqliteStore.open(config.storePath);
  try {
    const tokenEnv = config.calendarTokenEnv;
    const ctx = createRunContext({
      extractor: createFileExtractor(config.extractDir),
      entries: store,
      mappings: store,
      calendarFor: (employee) =>
        new GoogleCalendarClient({
          calendarId: employee.calendarId,
          owner: { displayName: employee.displayName, colorId: employee.colorId },
          timeZone: config.timezone,
          getAccessToken: async () => {
            const token = process.env[tokenEnv];
            if (!token) throw new FatalExternalError(`${tokenEnv} is not set`);
            return token;
          },
        }),
      notifier: createLogNotifier(logger),
      logger,
    });

    const result = await runDaily(ctx, config);
    for (const e of result.employees) {
      const c = e.counts;
      logger.info(
        `${e.employeeId}: ${e.status} (+${c.inserted} ~${c.updated} -${c.deleted}, ${c.rejectedValidation} invalid, ${c.duplicates} duplicate, ${c.calendarFailures} calendar failures)`,
      );
    }
    return EXIT_CODES[result.status];
  } finally {
    store.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`[shift-sync] ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);

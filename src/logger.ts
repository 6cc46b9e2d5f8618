export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

type Sink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export function createConsoleLogger(
  opts: { level?: LogLevel; prefix?: string; sink?: Sink } = {},
): Logger {
  const min = RANK[opts.level ?? 'info'];
  const prefix = opts.prefix ?? '[shift-sync]';
  const sink = opts.sink ?? console;

  const emit = (level: Exclude<LogLevel, 'silent'>) => (message: string, meta?: LogMeta) => {
    if (RANK[level] < min) return;
    const line = `${prefix} ${message}`;
    if (meta && Object.keys(meta).length > 0) sink[level](line, meta);
    else sink[level](line);
  };

  return { debug: emit('debug'), info: emit('info'), warn: emit('warn'), error: emit('error') };
}

/** Prefixes every message, e.g. with the employee a run step belongs to. */
export function childLogger(parent: Logger, scope: string): Logger {
  return {
    debug: (m, meta) => parent.debug(`${scope} ${m}`, meta),
    info: (m, meta) => parent.info(`${scope} ${m}`, meta),
    warn: (m, meta) => parent.warn(`${scope} ${m}`, meta),
    error: (m, meta) => parent.error(`${scope} ${m}`, meta),
  };
}

export const silentLogger: Logger = createConsoleLogger({ level: 'silent' });

export type ShiftSyncErrorCode =
  | 'VALIDATION'
  | 'CONFLICT_DECISION'
  | 'TRANSIENT_EXTERNAL'
  | 'FATAL_EXTERNAL'
  | 'EXHAUSTED_RETRY'
  | 'RUN_DEADLINE';

export abstract class ShiftSyncError extends Error {
  abstract readonly code: ShiftSyncErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed input: an extracted entry or the run configuration. */
export class ValidationError extends ShiftSyncError {
  readonly code = 'VALIDATION';
  readonly retryable = false;

  constructor(
    message: string,
    readonly problems: string[] = [],
  ) {
    super(message);
  }
}

/** Two decisions (or two stored rows) contradict the data model. */
export class ConflictDecisionError extends ShiftSyncError {
  readonly code = 'CONFLICT_DECISION';
  readonly retryable = false;
}

/** Timeout, rate limit or 5xx from the store, calendar or mail channel. */
export class TransientExternalError extends ShiftSyncError {
  readonly code = 'TRANSIENT_EXTERNAL';
  readonly retryable = true;
}

/** Authentication failure or permanent rejection. */
export class FatalExternalError extends ShiftSyncError {
  readonly code = 'FATAL_EXTERNAL';
  readonly retryable = false;
}

export class ExhaustedRetryError extends ShiftSyncError {
  readonly code = 'EXHAUSTED_RETRY';
  readonly retryable = false;

  constructor(
    readonly operation: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`${operation} failed after ${attempts} attempts: ${errorMessage(cause)}`, { cause });
  }
}

export class RunDeadlineError extends ShiftSyncError {
  readonly code = 'RUN_DEADLINE';
  readonly retryable = false;
}

export function isRetryable(err: unknown): boolean {
  return err instanceof ShiftSyncError && err.retryable;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

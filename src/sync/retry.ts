import {
  ExhaustedRetryError,
  RunDeadlineError,
  TransientExternalError,
  isRetryable,
} from '../errors';

export type RetryPolicy = {
  maxAttempts: number; // 含第一次
  baseDelayMs: number;
  maxDelayMs: number;
};

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type RetryOptions = {
  policy?: RetryPolicy;
  /** Per-attempt timeout; a timed-out attempt counts as a transient failure. */
  timeoutMs?: number;
  sleepFn?: SleepFn;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Rejects with TransientExternalError when `task` has not settled within `ms`.
 * The underlying call is not cancelled; its late result is ignored.
 */
export function withTimeout<T>(operation: string, task: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransientExternalError(`${operation} timed out after ${ms}ms`)),
      ms,
    );
  });
  return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
}

/**
 * 有界指数退避：
 * - 只重试 retryable 的错误（TransientExternalError）
 * - 其余错误原样抛出
 * - 次数用完抛 ExhaustedRetryError
 */
export async function retryWithBackoff<T>(
  operation: string,
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const policy = opts.policy ?? defaultRetryPolicy;
  const sleepFn = opts.sleepFn ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) {
      throw new RunDeadlineError(`${operation} abandoned: run deadline passed`);
    }
    try {
      const task = fn();
      return await (opts.timeoutMs ? withTimeout(operation, task, opts.timeoutMs) : task);
    } catch (error) {
      if (!isRetryable(error)) throw error;
      if (attempt >= attempts) throw new ExhaustedRetryError(operation, attempt, error);
      const delayMs = backoffDelay(attempt, policy);
      opts.onRetry?.({ attempt, delayMs, error });
      await sleepFn(delayMs);
    }
  }
}

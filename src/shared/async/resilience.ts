import { AppError } from '../errors/app-error';

export function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  operation: string;
  /** Invoked once when the deadline fires, before the returned promise rejects. */
  onTimeout?: () => void;
}

/**
 * Race an async call against a deadline.
 *
 * The underlying promise is not cancelled; pass `onTimeout` to abort it through
 * whatever mechanism the callee supports.
 */
export async function withTimeout<T>(promise: Promise<T>, opts: TimeoutOptions): Promise<T> {
  assertPositiveInteger(opts.timeoutMs, 'timeoutMs');

  let timeoutId: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutId = setTimeout(() => {
          opts.onTimeout?.();
          reject(new AppError('TIMEOUT', `${opts.operation} timed out after ${opts.timeoutMs}ms`));
        }, opts.timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  operationName: string;
  onRetry?: (attempt: number, error: unknown) => void;
}

export async function retry<T>(operation: () => Promise<T>, opts: RetryOptions): Promise<T> {
  if (!Number.isInteger(opts.retries) || opts.retries < 0) {
    throw new RangeError('retries must be a non-negative integer');
  }
  assertPositiveInteger(opts.baseDelayMs, 'baseDelayMs');

  let lastError: unknown;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt === opts.retries) break;
      opts.onRetry?.(attempt + 1, error);
      await new Promise((resolve) => setTimeout(resolve, opts.baseDelayMs * 2 ** attempt));
    }
  }

  throw new AppError(
    'EXTERNAL_CALL_FAILED',
    `${opts.operationName} failed after ${opts.retries + 1} attempts`,
    lastError,
  );
}

import { AppError, errorMessage, logger } from '../logger.js';

export type FailureKind = 'rate-limited' | 'transient' | 'terminal';

export type RemoteFailure =
  | { kind: 'rate-limited'; message: string; status: number; retryAfterSeconds: number }
  | { kind: 'transient'; message: string; status?: number }
  | { kind: 'terminal'; message: string; status?: number };

export type RemoteResult<T> = { ok: true; value: T } | { ok: false; failure: RemoteFailure };

export function succeeded<T>(value: T): RemoteResult<T> {
  return { ok: true, value };
}

export function failed(failure: RemoteFailure): { ok: false; failure: RemoteFailure } {
  return { ok: false, failure };
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const DEFAULT_MAX_ATTEMPTS = 5;

/** Raised when a remote call is rejected outright or its retry budget runs out. */
export class RemoteCallError extends AppError {
  readonly failure: RemoteFailure;
  readonly attempts: number;

  constructor(message: string, code: 'REMOTE_REJECTED' | 'RETRY_EXHAUSTED', failure: RemoteFailure, attempts: number) {
    super(message, code, failure.status ?? 502, { kind: failure.kind, attempts });
    this.name = 'RemoteCallError';
    this.failure = failure;
    this.attempts = attempts;
  }
}

export interface RetryOptions {
  maxAttempts?: number;
  sleep?: Sleep;
  /** Used in log lines and error messages. */
  label?: string;
}

/** Exponential schedule: 2^attempt + 1 seconds, attempt counted from zero. */
export function backoffSeconds(attempt: number): number {
  return 2 ** attempt + 1;
}

/** Seconds to wait before the next attempt, or undefined when the failure must not be retried. */
export function retryDelaySeconds(failure: RemoteFailure, attempt: number): number | undefined {
  switch (failure.kind) {
    case 'rate-limited':
      return failure.retryAfterSeconds + 1;
    case 'transient':
      return backoffSeconds(attempt);
    case 'terminal':
      return undefined;
  }
}

async function attemptCall<T>(call: () => Promise<RemoteResult<T>>): Promise<RemoteResult<T>> {
  try {
    return await call();
  } catch (error) {
    return failed({ kind: 'transient', message: errorMessage(error) });
  }
}

/**
 * Runs a classified remote call until it succeeds, is rejected, or uses up
 * `maxAttempts`. Every attempt counts toward the ceiling, rate-limited ones included.
 */
export async function withRetry<T>(call: () => Promise<RemoteResult<T>>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'remote call';

  let lastFailure: RemoteFailure | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const result = await attemptCall(call);
    if (result.ok) {
      return result.value;
    }

    const failure = result.failure;
    lastFailure = failure;
    const delaySeconds = retryDelaySeconds(failure, attempt);

    if (delaySeconds === undefined) {
      throw new RemoteCallError(`${label} rejected: ${failure.message}`, 'REMOTE_REJECTED', failure, attempt + 1);
    }

    if (attempt + 1 >= maxAttempts) {
      break;
    }

    logger.warn(`${label} failed (${failure.kind}), retrying in ${delaySeconds}s`, {
      attempt: attempt + 1,
      maxAttempts,
      status: failure.status,
      error: failure.message,
    });
    await wait(delaySeconds * 1000);
  }

  const failure: RemoteFailure = lastFailure ?? { kind: 'transient', message: 'no attempt was made' };
  throw new RemoteCallError(
    `${label} failed after ${maxAttempts} attempts: ${failure.message}`,
    'RETRY_EXHAUSTED',
    failure,
    maxAttempts,
  );
}

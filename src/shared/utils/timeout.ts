// Timeout helpers for async operations.
//
// Runs a Promise-based operation under a time budget and reports whether it
// finished, timed out or was canceled, with its duration. Pairs with the
// cancellation primitives in ./cancellation.ts.

import {
  isOperationCanceledError,
  type CancellationReason,
  type CancellationToken,
} from './cancellation';

export type TimedOperationOutcome = 'ok' | 'timeout' | 'canceled';

export type TimedOperationResult<T> =
  | { kind: 'ok'; durationMs: number; value: T }
  | { kind: 'timeout'; durationMs: number }
  | { kind: 'canceled'; durationMs: number; cancellationReason: CancellationReason };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
  token?: CancellationToken;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

class TimeoutSignal extends Error {
  constructor() {
    super('Timed operation exceeded timeoutMs');
    this.name = 'TimeoutSignal';
    Object.setPrototypeOf(this, TimeoutSignal.prototype);
  }
}

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout.
 *
 * - A token that is already canceled short-circuits to `kind: 'canceled'`.
 * - An {@link OperationCanceledError} thrown by the operation maps to
 *   `kind: 'canceled'`.
 * - In-flight work is not aborted on timeout; operations that should stop
 *   must observe a token the caller cancels afterwards.
 * - Any other error is rethrown.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, token, now = Date.now } = options;
  const start = now();

  if (token?.isCanceled) {
    return { kind: 'canceled', durationMs: 0, cancellationReason: token.reason };
  }

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new TimeoutSignal()), timeoutMs);
  });

  try {
    const value = await Promise.race([operation(), timeoutPromise]);
    return { kind: 'ok', durationMs: now() - start, value };
  } catch (error) {
    const durationMs = now() - start;

    if (error instanceof TimeoutSignal) {
      return { kind: 'timeout', durationMs };
    }

    if (isOperationCanceledError(error)) {
      return { kind: 'canceled', durationMs, cancellationReason: error.cancellationReason };
    }

    throw error;
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}

/** Promise that resolves after `ms` milliseconds. */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

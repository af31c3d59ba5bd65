// Cancellation token primitives for async host operations (external agent
// polling, interactive prompts). Host-agnostic and dependency-free.

export type CancellationReason = unknown;

/**
 * Error raised by {@link CancellationToken.throwIfCanceled}. Carries the
 * reason handed to `cancel()` so callers can log it.
 */
export class OperationCanceledError extends Error {
  readonly cancellationReason: CancellationReason;

  constructor(message: string, reason: CancellationReason) {
    super(message);
    this.name = 'OperationCanceledError';
    this.cancellationReason = reason;
    Object.setPrototypeOf(this, OperationCanceledError.prototype);
  }
}

export function isOperationCanceledError(error: unknown): error is OperationCanceledError {
  return error instanceof OperationCanceledError;
}

/**
 * Read-only view of a cancellation token.
 */
export interface CancellationToken {
  /** True once cancel() has been invoked on the associated source. */
  readonly isCanceled: boolean;
  readonly reason?: CancellationReason;

  /**
   * Throws an {@link OperationCanceledError} if the token has been canceled.
   *
   *   token.throwIfCanceled('before reading the move file');
   */
  throwIfCanceled(contextMessage?: string): void;
}

/**
 * Mutable source for a {@link CancellationToken}.
 *
 *   const source = createCancellationSource();
 *   pollForMove(source.token).catch(handleError);
 *   // later, from a deadline:
 *   source.cancel('deadline reached');
 */
export interface CancellationSource {
  readonly token: CancellationToken;
  /** Marks the token as canceled. Subsequent calls are no-ops. */
  cancel(reason?: CancellationReason): void;
}

export function createCancellationSource(): CancellationSource {
  let canceled = false;
  let reason: CancellationReason | undefined;

  const token: CancellationToken = {
    get isCanceled() {
      return canceled;
    },
    get reason() {
      return reason;
    },
    throwIfCanceled(contextMessage?: string): void {
      if (!canceled) return;
      const detail = contextMessage ? ` (${contextMessage})` : '';
      throw new OperationCanceledError(`Operation canceled${detail}`, reason);
    },
  };

  return {
    token,
    cancel(nextReason?: CancellationReason): void {
      if (canceled) return;
      canceled = true;
      reason = nextReason;
    },
  };
}

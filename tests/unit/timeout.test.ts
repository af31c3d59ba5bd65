import {
  OperationCanceledError,
  createCancellationSource,
  isOperationCanceledError,
} from '../../src/shared/utils/cancellation';
import { delay, runWithTimeout } from '../../src/shared/utils/timeout';
import { steppingClock } from '../utils/fixtures';

describe('cancellation', () => {
  it('is idle until canceled', () => {
    const source = createCancellationSource();
    expect(source.token.isCanceled).toBe(false);
    expect(() => source.token.throwIfCanceled()).not.toThrow();
  });

  it('keeps the first reason', () => {
    const source = createCancellationSource();
    source.cancel('first');
    source.cancel('second');
    expect(source.token.reason).toBe('first');
  });

  it('throws OperationCanceledError with context', () => {
    const source = createCancellationSource();
    source.cancel('shutdown');
    let caught: unknown;
    try {
      source.token.throwIfCanceled('reading move_3.txt');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(OperationCanceledError);
    expect(isOperationCanceledError(caught) && caught.message).toBe(
      'Operation canceled (reading move_3.txt)'
    );
    expect(isOperationCanceledError(caught) && caught.cancellationReason).toBe('shutdown');
  });
});

describe('runWithTimeout', () => {
  it('returns the value and the measured duration', async () => {
    const result = await runWithTimeout(async () => 'done', {
      timeoutMs: 1000,
      now: steppingClock(7),
    });
    expect(result).toEqual({ kind: 'ok', durationMs: 7, value: 'done' });
  });

  it('reports a timeout', async () => {
    const result = await runWithTimeout(() => delay(200).then(() => 'late'), { timeoutMs: 10 });
    expect(result.kind).toBe('timeout');
  });

  it('short-circuits on an already canceled token', async () => {
    const source = createCancellationSource();
    source.cancel('stop');
    const operation = jest.fn(async () => 1);
    const result = await runWithTimeout(operation, { timeoutMs: 100, token: source.token });
    expect(result).toEqual({ kind: 'canceled', durationMs: 0, cancellationReason: 'stop' });
    expect(operation).not.toHaveBeenCalled();
  });

  it('maps cancellation thrown by the operation', async () => {
    const result = await runWithTimeout(
      async () => {
        throw new OperationCanceledError('Operation canceled', 'agent gone');
      },
      { timeoutMs: 100, now: () => 0 }
    );
    expect(result).toEqual({ kind: 'canceled', durationMs: 0, cancellationReason: 'agent gone' });
  });

  it('rethrows other errors', async () => {
    await expect(
      runWithTimeout(
        async () => {
          throw new Error('disk full');
        },
        { timeoutMs: 100 }
      )
    ).rejects.toThrow('disk full');
  });
});

import { TransportFailure } from './errors';
import type { BudgetPolicy } from '../types/gasEstimation';

/** Longest delay `setTimeout` honours; Node fires anything larger after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Time a single source may take, given what is left of the overall budget
 * and how many sources (this one included) have yet to be tried.
 */
export function allotSlice(
  policy: BudgetPolicy,
  remainingMs: number,
  sourcesLeft: number,
): number {
  if (remainingMs <= 0) return 0;
  switch (policy) {
    case 'remaining':
      return remainingMs;
    case 'even-split':
      return Math.max(1, Math.floor(remainingMs / Math.max(1, sourcesLeft)));
  }
}

export const abortedError = (signal: AbortSignal): TransportFailure =>
  signal.reason instanceof TransportFailure
    ? signal.reason
    : new TransportFailure('Estimation aborted by caller', {
        aborted: true,
        cause: signal.reason,
      });

/**
 * Runs `task` with its own abort signal, which fires when `timeoutMs` elapses or
 * when the parent `signal` aborts. The returned promise settles no later than
 * that; whatever the task resolves with afterwards is dropped. Timeouts beyond
 * `MAX_TIMER_DELAY_MS` are cut to it.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: { signal?: AbortSignal; onTimeout: () => Error },
): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      settle();
    };

    const onParentAbort = () => {
      if (!parent) return;
      const error = abortedError(parent);
      controller.abort(error);
      finish(() => reject(error));
    };

    const timer = setTimeout(() => {
      const error = options.onTimeout();
      controller.abort(error);
      finish(() => reject(error));
    }, Math.min(Math.max(0, timeoutMs), MAX_TIMER_DELAY_MS));

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      finish(() => reject(error));
      return;
    }
    pending.then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error)),
    );
  });
}

/**
 * Rejects as soon as `signal` aborts, for calls that cannot be cancelled
 * themselves (the underlying request keeps running, its result is ignored).
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortedError(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

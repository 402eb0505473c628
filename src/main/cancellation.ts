import type { ServiceResult } from '../shared/types';

export type Outcome<T> = { status: 'settled'; value: T } | { status: 'abandoned' };

/**
 * Resolves with the work's value, or with `abandoned` as soon as the signal
 * aborts. The work itself keeps running; a late result or rejection is
 * dropped.
 */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<Outcome<T>> {
  return new Promise<Outcome<T>>((resolve, reject) => {
    const onAbort = () => resolve({ status: 'abandoned' });

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ status: 'settled', value });
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/** Combines the run's cancel signal with an optional deadline. 0 disables the deadline. */
export function withTimeout(cancel: AbortSignal, timeoutMs: number): AbortSignal {
  return timeoutMs > 0 ? AbortSignal.any([cancel, AbortSignal.timeout(timeoutMs)]) : cancel;
}

export function cancelledResult<T>(): ServiceResult<T> {
  return { ok: false, kind: 'Cancelled', message: 'Cancelled' };
}

/** An abandoned call is a cancellation if the run asked for it, otherwise its deadline passed. */
export function abandonedResult<T>(cancel: AbortSignal, timeoutMs: number, service: string): ServiceResult<T> {
  if (cancel.aborted) {
    return cancelledResult();
  }
  return { ok: false, kind: 'NetworkError', message: `${service} timed out after ${timeoutMs}ms` };
}

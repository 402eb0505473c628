import { describe, it, expect } from 'vitest';
import { abandonedResult, untilAborted, withTimeout } from './cancellation';

function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

describe('untilAborted', () => {
  it('passes through settled work', async () => {
    const controller = new AbortController();

    await expect(untilAborted(Promise.resolve('text'), controller.signal)).resolves.toEqual({
      status: 'settled',
      value: 'text',
    });
  });

  it('abandons pending work when the signal aborts', async () => {
    const controller = new AbortController();
    const outcome = untilAborted(never<string>(), controller.signal);

    controller.abort();

    await expect(outcome).resolves.toEqual({ status: 'abandoned' });
  });

  it('abandons immediately on an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(untilAborted(Promise.resolve('late'), controller.signal)).resolves.toEqual({ status: 'abandoned' });
  });

  it('propagates rejections of the work', async () => {
    const controller = new AbortController();

    await expect(untilAborted(Promise.reject(new Error('socket hang up')), controller.signal)).rejects.toThrow(
      'socket hang up'
    );
  });
});

describe('withTimeout', () => {
  it('returns the cancel signal itself when the deadline is disabled', () => {
    const controller = new AbortController();

    expect(withTimeout(controller.signal, 0)).toBe(controller.signal);
  });

  it('aborts on cancel or on the deadline', async () => {
    const cancelled = new AbortController();
    const first = withTimeout(cancelled.signal, 60_000);
    cancelled.abort();
    expect(first.aborted).toBe(true);

    const idle = new AbortController();
    const second = withTimeout(idle.signal, 10);
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(second.aborted).toBe(true);
    expect(idle.signal.aborted).toBe(false);
  });
});

describe('abandonedResult', () => {
  it('tells cancellation apart from a deadline', () => {
    const cancelled = new AbortController();
    cancelled.abort();

    expect(abandonedResult(cancelled.signal, 100, 'Transcription')).toEqual({
      ok: false,
      kind: 'Cancelled',
      message: 'Cancelled',
    });
    expect(abandonedResult(new AbortController().signal, 100, 'Transcription')).toEqual({
      ok: false,
      kind: 'NetworkError',
      message: 'Transcription timed out after 100ms',
    });
  });
});

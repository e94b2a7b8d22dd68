import { describe, it, expect, afterEach, vi } from 'vitest';
import { MAX_TIMER_MS, sleep } from '../sleep.js';

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the requested time', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    await expect(sleep(60_000, controller.signal)).rejects.toThrow('cancelled');
  });

  it('rejects with the abort reason when cancelled mid-wait', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    await vi.advanceTimersByTimeAsync(10);
    controller.abort(new Error('shutting down'));

    await expect(pending).rejects.toThrow('shutting down');
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves normally when the signal never aborts', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(50, controller.signal);

    await vi.advanceTimersByTimeAsync(50);
    await expect(pending).resolves.toBeUndefined();
  });

  it('keeps waiting past the longest single timer delay', async () => {
    vi.useFakeTimers();
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    let done = false;
    const pending = sleep(thirtyDays).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS + 1);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(thirtyDays - MAX_TIMER_MS - 2);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('can be cancelled during a later timer of a long wait', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(MAX_TIMER_MS * 2, controller.signal);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS + 5);
    controller.abort(new Error('shutting down'));

    await expect(pending).rejects.toThrow('shutting down');
    expect(vi.getTimerCount()).toBe(0);
  });
});

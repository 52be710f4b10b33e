import { describe, it, expect, vi, afterEach } from 'vitest';
import { delay } from './transport';

describe('delay', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the timeout', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = delay(100).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(99);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when aborted', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    let done = false;
    const pending = delay(10_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await pending;

    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves immediately with an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(delay(10_000, controller.signal)).resolves.toBeUndefined();
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ResultStore } from '../../../src/core/result-store.js';
import { ResultSweeper } from '../../../src/core/result-sweeper.js';

describe('ResultSweeper', () => {
  let store: ResultStore;

  beforeEach(() => {
    store = new ResultStore('unused-results-dir', { ttlMs: 1000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes the TTL to the store and returns the count', async () => {
    const sweep = vi.spyOn(store, 'sweep').mockResolvedValue(3);
    const sweeper = new ResultSweeper(store, 1000, 60_000);

    expect(await sweeper.runOnce()).toBe(3);
    expect(sweep).toHaveBeenCalledWith(1000);
  });

  it('logs and swallows sweep errors', async () => {
    vi.spyOn(store, 'sweep').mockRejectedValue(new Error('disk gone'));
    const sweeper = new ResultSweeper(store, 1000, 60_000);

    expect(await sweeper.runOnce()).toBe(0);
  });

  it('skips a tick while the previous sweep is still running', async () => {
    let release: (count: number) => void = () => undefined;
    const sweep = vi
      .spyOn(store, 'sweep')
      .mockImplementation(() => new Promise<number>(resolve => (release = resolve)));
    const sweeper = new ResultSweeper(store, 1000, 60_000);

    const first = sweeper.runOnce();
    expect(await sweeper.runOnce()).toBe(0);
    release(2);

    expect(await first).toBe(2);
    expect(sweep).toHaveBeenCalledTimes(1);
  });

  it('sweeps on start and then every interval', async () => {
    vi.useFakeTimers();
    const sweep = vi.spyOn(store, 'sweep').mockResolvedValue(0);
    const sweeper = new ResultSweeper(store, 1000, 5000);

    sweeper.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(sweep).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(sweep).toHaveBeenCalledTimes(3);

    await sweeper.stop();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(sweep).toHaveBeenCalledTimes(3);
  });
});

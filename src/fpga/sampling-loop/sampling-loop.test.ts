/**
 * SamplingLoop Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  SamplingLoop,
  computeSleepMs,
  samplingIntervalFor,
  type DeviceSampler,
} from './sampling-loop.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    debug: vi.fn(),
  })),
}));

function nextSample(loop: SamplingLoop): Promise<number[]> {
  return new Promise(resolve => loop.once('sampled', resolve));
}

describe('computeSleepMs', () => {
  it('should wait out the remainder of the interval', () => {
    expect(computeSleepMs(10_000, 4_000)).toBe(6_000);
    expect(computeSleepMs(10_000, 0)).toBe(10_000);
    expect(computeSleepMs(10_000, 10_000)).toBe(0);
  });

  it('should wait for the next boundary after a short overrun', () => {
    expect(computeSleepMs(10_000, 15_000)).toBe(5_000);
    expect(computeSleepMs(10_000, 19_999)).toBe(1);
    expect(computeSleepMs(10_000, 20_000)).toBe(0);
  });

  it('should wait a full interval after a long overrun', () => {
    expect(computeSleepMs(10_000, 25_000)).toBe(10_000);
  });
});

describe('samplingIntervalFor', () => {
  it('should never sample more often than every 10 seconds', () => {
    expect(samplingIntervalFor(1)).toBe(10);
    expect(samplingIntervalFor(10)).toBe(10);
    expect(samplingIntervalFor(30)).toBe(30);
  });
});

describe('SamplingLoop', () => {
  let loop: SamplingLoop | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    loop?.stop();
    loop = undefined;
    vi.useRealTimers();
  });

  it('should sample every device as soon as it starts', async () => {
    const sample = vi.fn<Parameters<DeviceSampler>, ReturnType<DeviceSampler>>(
      async (_kind, index) => 40 + index,
    );
    loop = new SamplingLoop({ kind: 'temperature', deviceCount: 2, interval: 10, sample });

    const sampled = nextSample(loop);
    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    await expect(sampled).resolves.toEqual([40, 41]);
    expect(sample).toHaveBeenNthCalledWith(1, 'temperature', 0);
    expect(sample).toHaveBeenNthCalledWith(2, 'temperature', 1);
    expect(loop.getReadings()).toEqual([40, 41]);
  });

  it('should overwrite readings with failures on the next iteration', async () => {
    const sample = vi.fn<Parameters<DeviceSampler>, ReturnType<DeviceSampler>>()
      .mockResolvedValueOnce(55)
      .mockResolvedValueOnce(0);
    loop = new SamplingLoop({ kind: 'power', deviceCount: 1, interval: 10, sample });

    const first = nextSample(loop);
    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await expect(first).resolves.toEqual([55]);

    const second = nextSample(loop);
    await vi.advanceTimersByTimeAsync(10_000);
    await expect(second).resolves.toEqual([0]);
    expect(loop.completedIterations).toBe(2);
  });

  it('should run the next iteration one interval after a fast one', async () => {
    const sample = vi.fn<Parameters<DeviceSampler>, ReturnType<DeviceSampler>>(async () => 1);
    loop = new SamplingLoop({ kind: 'temperature', deviceCount: 1, interval: 10, sample });

    const first = nextSample(loop);
    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await first;

    await vi.advanceTimersByTimeAsync(9_999);
    expect(sample).toHaveBeenCalledTimes(1);

    const second = nextSample(loop);
    await vi.advanceTimersByTimeAsync(1);
    await second;
    expect(sample).toHaveBeenCalledTimes(2);
  });

  it('should shorten the wait by the time spent sampling', async () => {
    // the vendor tool takes 15 seconds to answer
    const sample = vi.fn<Parameters<DeviceSampler>, ReturnType<DeviceSampler>>(
      () => new Promise(resolve => setTimeout(() => resolve(1), 15_000)),
    );
    loop = new SamplingLoop({ kind: 'temperature', deviceCount: 1, interval: 10, sample });

    const first = nextSample(loop);
    loop.start();
    await vi.advanceTimersByTimeAsync(15_000);
    await first;

    // overran by 5s, so the next boundary is 5s away
    await vi.advanceTimersByTimeAsync(4_999);
    expect(sample).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(sample).toHaveBeenCalledTimes(2);
  });

  it('should keep a single schedule when restarted mid-iteration', async () => {
    // every probe takes 5 seconds
    const sample = vi.fn<Parameters<DeviceSampler>, ReturnType<DeviceSampler>>(
      () => new Promise(resolve => setTimeout(() => resolve(1), 5_000)),
    );
    loop = new SamplingLoop({ kind: 'power', deviceCount: 1, interval: 10, sample });

    loop.start();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(sample).toHaveBeenCalledTimes(1);

    loop.stop();
    loop.start();
    await vi.advanceTimersByTimeAsync(99_000);

    // the abandoned iteration plus one every 10s from the restart at 1s
    expect(sample).toHaveBeenCalledTimes(11);
    expect(vi.getTimerCount()).toBe(1);
  });

  it('should keep running after a sampler error', async () => {
    const sample = vi.fn<Parameters<DeviceSampler>, ReturnType<DeviceSampler>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce(33);
    loop = new SamplingLoop({ kind: 'temperature', deviceCount: 1, interval: 10, sample });

    const failed = new Promise(resolve => loop?.once('samplingError', resolve));
    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await expect(failed).resolves.toBeInstanceOf(Error);
    expect(loop.isRunning).toBe(true);

    const recovered = nextSample(loop);
    await vi.advanceTimersByTimeAsync(10_000);
    await expect(recovered).resolves.toEqual([33]);
  });

  it('should stop scheduling once stopped', async () => {
    const sample = vi.fn<Parameters<DeviceSampler>, ReturnType<DeviceSampler>>(async () => 1);
    loop = new SamplingLoop({ kind: 'power', deviceCount: 1, interval: 10, sample });

    const first = nextSample(loop);
    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await first;

    loop.stop();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(sample).toHaveBeenCalledTimes(1);
    expect(loop.isRunning).toBe(false);
  });

  it('should start with zeroed readings', () => {
    loop = new SamplingLoop({ kind: 'power', deviceCount: 3, interval: 10, sample: async () => 1 });

    expect(loop.getReadings()).toEqual([0, 0, 0]);
    expect(loop.intervalMs).toBe(10_000);
  });
});

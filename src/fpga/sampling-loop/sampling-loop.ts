/**
 * Sampling Loop
 *
 * Background timer that refreshes one reading per device for a single
 * probe kind. Iterations are chained with setTimeout so a slow vendor
 * tool never causes overlapping runs.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, type SubsystemLogger } from '../../logging/subsystem.js';
import type { ProbeKind } from '../vendor-probe/index.js';

/** Lower bound on the sampling interval, in seconds */
export const MIN_SAMPLING_INTERVAL_SECONDS = 10;

export type DeviceSampler = (kind: ProbeKind, deviceIndex: number) => Promise<number>;

export interface SamplingLoopOptions {
  kind: ProbeKind;
  deviceCount: number;
  /** Interval in seconds */
  interval: number;
  sample: DeviceSampler;
}

/**
 * Sampling interval for a given reporting interval, in seconds
 */
export function samplingIntervalFor(updateEvery: number): number {
  return Math.max(MIN_SAMPLING_INTERVAL_SECONDS, updateEvery);
}

/**
 * Time to wait after an iteration that took `elapsedMs`.
 *
 * Within the interval the loop waits out the remainder. An overrun of less
 * than one interval waits for the following boundary; a longer overrun
 * waits one full interval from completion.
 */
export function computeSleepMs(intervalMs: number, elapsedMs: number): number {
  const slack = intervalMs - elapsedMs;
  if (slack >= 0) {
    return slack;
  }

  const catchUp = intervalMs + slack;
  return catchUp >= 0 ? catchUp : intervalMs;
}

export class SamplingLoop extends EventEmitter {
  private readonly logger: SubsystemLogger;
  private readonly readings: number[];
  private timer?: NodeJS.Timeout;
  private running = false;
  private iterations = 0;
  /** Bumped on every start and stop; only the current chain reschedules */
  private generation = 0;

  constructor(private readonly options: SamplingLoopOptions) {
    super();
    this.readings = new Array<number>(options.deviceCount).fill(0);
    this.logger = createSubsystemLogger(`fpga/sampling/${options.kind}`);
  }

  get kind(): ProbeKind {
    return this.options.kind;
  }

  get intervalMs(): number {
    return this.options.interval * 1000;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get completedIterations(): number {
    return this.iterations;
  }

  /** Last known reading per device index */
  getReadings(): readonly number[] {
    return this.readings;
  }

  /**
   * Starts sampling immediately; subsequent iterations follow the sleep policy
   */
  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.generation++;
    this.logger.info('Sampling loop started', {
      devices: this.options.deviceCount,
      interval: this.options.interval,
    });
    this.emit('started', { kind: this.options.kind, interval: this.options.interval });
    this.schedule(0);
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.logger.info('Sampling loop stopped', { iterations: this.iterations });
    this.emit('stopped', { kind: this.options.kind });
  }

  /**
   * Probes every device once, overwriting each slot
   */
  async sampleAll(): Promise<void> {
    for (let index = 0; index < this.options.deviceCount; index++) {
      this.readings[index] = await this.options.sample(this.options.kind, index);
    }
  }

  private schedule(delayMs: number): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.runIteration(generation).catch((error: unknown) => {
        this.logger.error('Sampling iteration failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        this.emit('samplingError', error);
      });
    }, delayMs);
  }

  private async runIteration(generation: number): Promise<void> {
    const before = Date.now();
    try {
      await this.sampleAll();
      this.iterations++;
      this.emit('sampled', [...this.readings]);
    } finally {
      const elapsed = Date.now() - before;
      if (this.running && generation === this.generation) {
        this.schedule(computeSleepMs(this.intervalMs, elapsed));
      }
    }
  }
}

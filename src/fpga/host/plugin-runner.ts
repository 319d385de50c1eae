/**
 * Plugin Runner
 *
 * Drives a collector on the host's reporting interval: chart definitions
 * once after setup, then one block of values per tick. A failed tick is
 * logged and skipped.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { formatChartDefinitions, formatSnapshot } from './chart-protocol.js';
import type { ChartDefinition, Snapshot } from '../types/index.js';

/** The contract a collector offers to its host */
export interface CollectorPlugin {
  check(): boolean;
  setup(): Promise<void>;
  collect(): Promise<Snapshot>;
  stop(): Promise<void>;
  readonly definitions: readonly ChartDefinition[];
}

export type LineWriter = (text: string) => void;

export interface PluginRunnerOptions {
  /** Reporting interval in seconds */
  updateEvery: number;
  write?: LineWriter;
}

export class PluginRunner extends EventEmitter {
  private readonly logger = createSubsystemLogger('fpga/runner');
  private readonly write: LineWriter;
  private timer?: NodeJS.Timeout;
  private running = false;
  private inFlight?: Promise<void>;
  private ticks = 0;
  private failedTicks = 0;

  constructor(
    private readonly plugin: CollectorPlugin,
    private readonly options: PluginRunnerOptions,
  ) {
    super();
    this.write = options.write ?? (text => {
      process.stdout.write(text);
    });
  }

  get stats(): { ticks: number; failedTicks: number } {
    return { ticks: this.ticks, failedTicks: this.failedTicks };
  }

  /**
   * Sets the plugin up and starts ticking. Resolves false when the plugin
   * reports it cannot run.
   */
  async start(): Promise<boolean> {
    if (this.running) {
      return true;
    }

    if (!this.plugin.check()) {
      this.logger.warn('Plugin check failed, not starting');
      return false;
    }

    await this.plugin.setup();
    this.emitLines(formatChartDefinitions(this.plugin.definitions, this.options.updateEvery));

    this.running = true;
    this.timer = setInterval(() => {
      if (this.inFlight) {
        this.logger.warn('Previous collection still running, skipping tick');
        return;
      }
      this.inFlight = this.tick()
        .then(
          () => undefined,
          (error: unknown) => {
            this.logger.error('Unexpected tick failure', {
              error: error instanceof Error ? error.message : String(error),
            });
          },
        )
        .finally(() => {
          this.inFlight = undefined;
        });
    }, this.options.updateEvery * 1000);

    this.logger.info('Plugin runner started', {
      updateEvery: this.options.updateEvery,
      charts: this.plugin.definitions.length,
    });
    return true;
  }

  /**
   * Collects once and writes the values. Resolves false when the tick was skipped.
   */
  async tick(): Promise<boolean> {
    this.ticks++;
    try {
      const snapshot = await this.plugin.collect();
      this.emitLines(formatSnapshot(this.plugin.definitions, snapshot));
      this.emit('tick', snapshot);
      return true;
    } catch (error) {
      this.failedTicks++;
      this.logger.error('Collection failed, skipping tick', {
        error: error instanceof Error ? error.message : String(error),
        failedTicks: this.failedTicks,
      });
      this.emit('tickFailed', error);
      return false;
    }
  }

  /**
   * Stops ticking, lets a collection already under way finish, then stops the plugin
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.running = false;
    await this.inFlight;
    await this.plugin.stop();
    this.logger.info('Plugin runner stopped', this.stats);
  }

  private emitLines(lines: string[]): void {
    if (lines.length > 0) {
      this.write(`${lines.join('\n')}\n`);
    }
  }
}

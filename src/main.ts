#!/usr/bin/env node
/**
 * FPGA stats collector, run as an external plugin of the host agent.
 *
 * Usage: fpga-stats-collector [update_every] [--config <path>]
 */

import { parseArgs } from 'node:util';
import { createSubsystemLogger } from './logging/subsystem.js';
import {
  DEFAULT_CONFIG_PATH,
  FpgaStatsCollector,
  PluginRunner,
  loadCollectorConfiguration,
  type FpgaCollectorConfig,
} from './fpga/index.js';

const log = createSubsystemLogger('fpga/main');

function parseCommandLine(argv: string[]): { configPath: string; overrides: Partial<FpgaCollectorConfig> } {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
    },
    allowPositionals: true,
  });

  const overrides: Partial<FpgaCollectorConfig> = {};
  const [updateEvery] = positionals;
  if (updateEvery !== undefined) {
    overrides.updateEvery = Number(updateEvery);
  }

  return {
    configPath: values.config ?? process.env.FPGA_COLLECTOR_CONFIG ?? DEFAULT_CONFIG_PATH,
    overrides,
  };
}

async function main(): Promise<number> {
  const { configPath, overrides } = parseCommandLine(process.argv.slice(2));
  const config = loadCollectorConfiguration(configPath, overrides);

  const runner = new PluginRunner(new FpgaStatsCollector(config), { updateEvery: config.updateEvery });

  const shutdown = (signal: string): void => {
    log.info('Shutting down', { signal });
    runner.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const started = await runner.start();
  return started ? 0 : 1;
}

main().then(
  code => {
    if (code !== 0) {
      process.exit(code);
    }
  },
  (error: unknown) => {
    log.fatal('Collector failed to start', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  },
);

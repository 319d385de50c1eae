/**
 * Collector Configuration
 *
 * Loads the YAML job file, applies defaults and validates the result.
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ConfigurationError } from '../errors.js';
import type { FpgaCollectorConfig } from '../types/index.js';

const log = createSubsystemLogger('fpga/config');

export const DEFAULT_CONFIG_PATH = 'fpga.conf';

export const DEFAULT_COLLECTOR_CONFIG: Readonly<FpgaCollectorConfig> = {
  dsn: 'postgresql://postgres@localhost:5432/postgres',
  intelCmd: '/usr/bin/fpgainfo',
  xilinxCmd: '/opt/xilinx/xrt/bin/xbutil',
  checkTempPower: false,
  puDdrStatsEnable: false,
  updateEvery: 1,
};

const MAPPING_REQUIRED = 'configuration must be a mapping of keys to values';

/**
 * Shape of the YAML job file. Keys left empty fall back to the defaults;
 * keys not listed here pass through and are warned about.
 */
export const configDocumentSchema = z.object({
  dsn: z.string({ invalid_type_error: 'dsn must be a string' }).nullish(),
  intel_cmd: z.string({ invalid_type_error: 'intel_cmd must be a string' }).nullish(),
  xilinx_cmd: z.string({ invalid_type_error: 'xilinx_cmd must be a string' }).nullish(),
  check_temp_power: z.boolean({ invalid_type_error: 'check_temp_power must be a boolean' }).nullish(),
  pu_ddr_stats_enable: z.boolean({ invalid_type_error: 'pu_ddr_stats_enable must be a boolean' }).nullish(),
  update_every: z.number({ invalid_type_error: 'update_every must be a number' }).nullish(),
}, { invalid_type_error: MAPPING_REQUIRED }).passthrough();

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length === 0 ? MAPPING_REQUIRED : issue.message;
}

/**
 * Validates collector configuration, returning every problem found
 */
export function validateCollectorConfiguration(config: FpgaCollectorConfig): string[] {
  const errors: string[] = [];

  if (config.dsn.trim().length === 0) {
    errors.push('dsn must not be empty');
  }
  if (config.intelCmd.trim().length === 0) {
    errors.push('intel_cmd must not be empty');
  }
  if (config.xilinxCmd.trim().length === 0) {
    errors.push('xilinx_cmd must not be empty');
  }
  if (!Number.isInteger(config.updateEvery) || config.updateEvery <= 0) {
    errors.push('update_every must be a positive integer');
  }

  return errors;
}

/**
 * Parses YAML job configuration text into a validated config
 *
 * @throws {ConfigurationError} when the document does not match the schema or fails validation
 */
export function parseCollectorConfiguration(
  text: string,
  overrides: Partial<FpgaCollectorConfig> = {},
): FpgaCollectorConfig {
  const raw: unknown = parse(text) ?? {};
  const parsed = configDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(describeIssue));
  }
  const document = parsed.data;

  for (const key of Object.keys(document)) {
    if (!Object.hasOwn(configDocumentSchema.shape, key)) {
      log.warn('Ignoring unknown configuration key', { key });
    }
  }

  const config: FpgaCollectorConfig = {
    dsn: document.dsn ?? DEFAULT_COLLECTOR_CONFIG.dsn,
    intelCmd: document.intel_cmd ?? DEFAULT_COLLECTOR_CONFIG.intelCmd,
    xilinxCmd: document.xilinx_cmd ?? DEFAULT_COLLECTOR_CONFIG.xilinxCmd,
    checkTempPower: document.check_temp_power ?? DEFAULT_COLLECTOR_CONFIG.checkTempPower,
    puDdrStatsEnable: document.pu_ddr_stats_enable ?? DEFAULT_COLLECTOR_CONFIG.puDdrStatsEnable,
    updateEvery: document.update_every ?? DEFAULT_COLLECTOR_CONFIG.updateEvery,
  };

  const merged: FpgaCollectorConfig = { ...config, ...overrides };
  const errors = validateCollectorConfiguration(merged);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return merged;
}

/**
 * Reads the configuration file. A missing file yields the defaults.
 */
export function loadCollectorConfiguration(
  path: string = DEFAULT_CONFIG_PATH,
  overrides: Partial<FpgaCollectorConfig> = {},
): FpgaCollectorConfig {
  if (!existsSync(path)) {
    log.info('Configuration file not found, using defaults', { path });
    return parseCollectorConfiguration('', overrides);
  }

  return parseCollectorConfiguration(readFileSync(path, 'utf8'), overrides);
}

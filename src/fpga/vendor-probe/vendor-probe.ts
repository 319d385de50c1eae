/**
 * Vendor Probe
 *
 * Runs the vendor tool for one device and reads a temperature or power
 * value from its text output. Any failure reads as zero.
 */

import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { VendorProtocol } from './detection.js';

export type ProbeKind = 'temperature' | 'power';

/** Runs a shell command line and resolves with its stdout; rejects on non-zero exit */
export type CommandRunner = (commandLine: string) => Promise<string>;

/** Reading reported when a value could not be obtained */
export const PROBE_FAILURE = 0;

const INTEL_TEMPERATURE_PATTERN = /^.*FPGA Core TEMP \s+: (\d+)/;
const INTEL_POWER_PATTERN = /^.*Total Input Power \s+: (\d+)\./;
const XILINX_TEMPERATURE_HEADING = /^FPGA TEMP/;
const XILINX_POWER_HEADING = /^Card Power/;
const XILINX_VALUE_PATTERN = /^(\d+)\s+/;

const execAsync = promisify(exec);

export const shellCommandRunner: CommandRunner = async (commandLine) => {
  const { stdout } = await execAsync(commandLine, { encoding: 'utf8' });
  return stdout;
};

/**
 * Returns the first capture group of the first line matching the pattern
 */
export function parseSingleLine(output: string, pattern: RegExp): number | undefined {
  for (const line of output.split('\n')) {
    const match = pattern.exec(line);
    if (match?.[1] !== undefined) {
      return Number(match[1]);
    }
  }
  return undefined;
}

/**
 * Finds a heading line, then returns the leading number of the next line
 * that starts with one. A later heading restarts the search.
 */
export function parseHeadingValue(output: string, heading: RegExp): number | undefined {
  let headingFound = false;

  for (const line of output.split('\n')) {
    if (heading.test(line)) {
      headingFound = true;
      continue;
    }

    const value = XILINX_VALUE_PATTERN.exec(line);
    if (value && headingFound) {
      return parseInt(value[0], 10);
    }
  }

  return undefined;
}

interface ProbeQuery {
  commandLine: string;
  parse: (output: string) => number | undefined;
}

/**
 * Builds the command and parser for one reading, or undefined when no
 * vendor tool is available
 */
export function buildProbeQuery(protocol: VendorProtocol, kind: ProbeKind, deviceIndex: number): ProbeQuery | undefined {
  switch (protocol.vendor) {
    case 'intel': {
      const subcommand = kind === 'temperature' ? 'temp' : 'power';
      const pattern = kind === 'temperature' ? INTEL_TEMPERATURE_PATTERN : INTEL_POWER_PATTERN;
      return {
        commandLine: `${protocol.command} ${subcommand} --device ${deviceIndex}`,
        parse: output => parseSingleLine(output, pattern),
      };
    }
    case 'xilinx': {
      const heading = kind === 'temperature' ? XILINX_TEMPERATURE_HEADING : XILINX_POWER_HEADING;
      return {
        commandLine: `${protocol.command} query -d ${deviceIndex}`,
        parse: output => parseHeadingValue(output, heading),
      };
    }
    case 'none':
      return undefined;
  }
}

export class VendorProbe {
  private readonly logger = createSubsystemLogger('fpga/vendor-probe');

  constructor(
    readonly protocol: VendorProtocol,
    private readonly run: CommandRunner = shellCommandRunner,
  ) {}

  get available(): boolean {
    return this.protocol.vendor !== 'none';
  }

  /**
   * Reads one value for one device. Never rejects.
   */
  async read(kind: ProbeKind, deviceIndex: number): Promise<number> {
    const query = buildProbeQuery(this.protocol, kind, deviceIndex);
    if (!query) {
      return PROBE_FAILURE;
    }

    let output: string;
    try {
      output = await this.run(query.commandLine);
    } catch (error) {
      this.logger.debug('Vendor command failed', {
        command: query.commandLine,
        error: error instanceof Error ? error.message : String(error),
      });
      return PROBE_FAILURE;
    }

    const value = query.parse(output);
    if (value === undefined || Number.isNaN(value)) {
      this.logger.debug('No reading in vendor output', { command: query.commandLine, kind });
      return PROBE_FAILURE;
    }

    return value;
  }
}

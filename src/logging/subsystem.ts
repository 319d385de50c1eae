/**
 * Subsystem Logging
 *
 * Structured loggers scoped to a named subsystem, backed by tslog.
 * Everything is written to stderr: stdout carries the chart protocol.
 */

import { formatWithOptions } from 'node:util';
import { Logger, type ILogObj } from 'tslog';

export interface SubsystemLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  fatal(message: string, meta?: unknown): void;
}

const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Maps a level name to tslog's numeric minimum level, defaulting to info
 */
export function resolveMinLevel(level: string | undefined): number {
  if (!level) {
    return LOG_LEVELS.info;
  }
  return LOG_LEVELS[level.toLowerCase()] ?? LOG_LEVELS.info;
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

const rootLogger = new Logger<ILogObj>({
  name: 'fpga',
  type: process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  overwrite: {
    transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
      const body = formatWithOptions({ colors: false, breakLength: Infinity }, ...logArgs);
      writeStderr([`${logMetaMarkup}${body}`, ...logErrors].join('\n'));
    },
    transportJSON: (json: unknown) => {
      writeStderr(JSON.stringify(json));
    },
  },
});

/**
 * Creates a logger whose entries are tagged with the given subsystem name
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = rootLogger.getSubLogger({ name: subsystem });

  const emit = (
    write: (...args: unknown[]) => unknown,
    message: string,
    meta: unknown,
  ): void => {
    if (meta === undefined) {
      write(message);
    } else {
      write(message, meta);
    }
  };

  return {
    debug: (message, meta) => emit((...args) => logger.debug(...args), message, meta),
    info: (message, meta) => emit((...args) => logger.info(...args), message, meta),
    warn: (message, meta) => emit((...args) => logger.warn(...args), message, meta),
    error: (message, meta) => emit((...args) => logger.error(...args), message, meta),
    fatal: (message, meta) => emit((...args) => logger.fatal(...args), message, meta),
  };
}

/**
 * Collector Errors
 */

export class ConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid collector configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export class CollectorStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CollectorStateError';
  }
}

/**
 * Raised when a monitor is built with an interval or miss threshold the
 * detection loop cannot run with.
 */
export class MonitorConfigError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown) {
    super(`${field} must be a positive integer (got ${String(value)})`);
    this.name = 'MonitorConfigError';
    this.field = field;
    this.value = value;
  }
}

/**
 * Bad command-line input. The CLI maps it to exit code 2.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

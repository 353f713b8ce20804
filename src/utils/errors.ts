/**
 * Error taxonomy
 *
 * Every failure the tool can report is a WorkError. The exit code groups them
 * the way the CLI reports them: 2 for user errors, 3 for log file errors and
 * 4 for system errors.
 */

export type ErrorCode =
  | 'ALTERNATION_VIOLATION'
  | 'NON_MONOTONIC_TIMESTAMP'
  | 'LOG_UNREADABLE'
  | 'LOG_ACCESS'
  | 'UNPARSEABLE_TIME'
  | 'UNPARSEABLE_DURATION'
  | 'UNKNOWN_INTERVAL'
  | 'TIME_OUT_OF_RANGE'
  | 'USAGE'
  | 'CONFIG'
  | 'PROCESS_FAILED';

export const EXIT_USER_ERROR = 2;
export const EXIT_LOG_ERROR = 3;
export const EXIT_SYSTEM_ERROR = 4;

export class WorkError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'WorkError';
  }
}

/**
 * Appending an event of the same kind as the last one, or a stop to an
 * empty log
 */
export class AlternationViolation extends WorkError {
  constructor(message: string) {
    super(message, 'ALTERNATION_VIOLATION', EXIT_USER_ERROR);
    this.name = 'AlternationViolation';
  }
}

export class NonMonotonicTimestamp extends WorkError {
  constructor(
    public readonly timestamp: number,
    public readonly previous: number
  ) {
    super(
      `Event at ${new Date(timestamp * 1000).toISOString()} would precede the last logged event at ${new Date(previous * 1000).toISOString()}`,
      'NON_MONOTONIC_TIMESTAMP',
      EXIT_USER_ERROR
    );
    this.name = 'NonMonotonicTimestamp';
  }
}

/**
 * A log line that cannot be decoded, or a stored sequence that breaks the
 * log invariants
 */
export class LogUnreadable extends WorkError {
  constructor(
    public readonly path: string,
    public readonly line: number,
    reason: string
  ) {
    super(`Corrupt work log ${path} at line ${line}: ${reason}`, 'LOG_UNREADABLE', EXIT_LOG_ERROR);
    this.name = 'LogUnreadable';
  }
}

export class LogAccessError extends WorkError {
  constructor(message: string) {
    super(message, 'LOG_ACCESS', EXIT_LOG_ERROR);
    this.name = 'LogAccessError';
  }
}

export class UnparseableTime extends WorkError {
  constructor(public readonly input: string) {
    super(`Invalid time specifier: "${input}"`, 'UNPARSEABLE_TIME', EXIT_USER_ERROR);
    this.name = 'UnparseableTime';
  }
}

export class UnparseableDuration extends WorkError {
  constructor(
    public readonly input: string,
    reason: string
  ) {
    super(`Invalid duration "${input}": ${reason}`, 'UNPARSEABLE_DURATION', EXIT_USER_ERROR);
    this.name = 'UnparseableDuration';
  }
}

export class UnknownInterval extends WorkError {
  constructor(public readonly input: string) {
    super(
      `Unknown interval "${input}". Use today, yesterday, week, month, year, a time, or "<start> - <end>".`,
      'UNKNOWN_INTERVAL',
      EXIT_USER_ERROR
    );
    this.name = 'UnknownInterval';
  }
}

/**
 * A resolved time on the wrong side of "now" for the command using it
 */
export class TimeOutOfRange extends WorkError {
  constructor(message: string) {
    super(message, 'TIME_OUT_OF_RANGE', EXIT_USER_ERROR);
    this.name = 'TimeOutOfRange';
  }
}

export class UsageError extends WorkError {
  constructor(message: string) {
    super(message, 'USAGE', EXIT_USER_ERROR);
    this.name = 'UsageError';
  }
}

export class ConfigError extends WorkError {
  constructor(message: string) {
    super(message, 'CONFIG', EXIT_USER_ERROR);
    this.name = 'ConfigError';
  }
}

export class ProcessFailed extends WorkError {
  constructor(
    message: string,
    public readonly status: number | null
  ) {
    super(message, 'PROCESS_FAILED', EXIT_SYSTEM_ERROR);
    this.name = 'ProcessFailed';
  }
}

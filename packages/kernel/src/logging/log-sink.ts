/**
 * Stepwise Kernel - Log Sink Interface
 *
 * Defines the injection point for log persistence.
 *
 * The kernel owns the contract (this interface) and the Logger class.
 * Concrete implementations live in the runtime host and the CLI and are
 * injected at construction time; the kernel never writes output directly.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Numeric ordering used for level thresholds. */
export const LOG_LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * One structured log record.
 */
export interface LogEntry {
  /** ISO-8601 timestamp. */
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * A sink that receives and persists log entries.
 *
 * append() is synchronous: module construction is a blocking, startup-time
 * operation and entries must be written in the order they were produced.
 */
export interface LogSink {
  append(entry: LogEntry): void;
}

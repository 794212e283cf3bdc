/**
 * Stepwise Kernel - Logger
 *
 * The Logger stamps and forwards structured entries to an injected LogSink.
 * If no sink is injected (e.g., in tests that do not inspect output), every
 * call is a no-op.
 */

import type { LogEntry, LogLevel, LogSink } from './log-sink.js';
import { LOG_LEVEL_ORDER } from './log-sink.js';

export interface LoggerOptions {
  /** Entries below this level are dropped. Default: 'debug'. */
  readonly minLevel?: LogLevel | undefined;
  /** Clock override for deterministic timestamps. */
  readonly now?: (() => Date) | undefined;
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly now: () => Date;

  constructor(
    private readonly sink?: LogSink,
    opts?: LoggerOptions,
  ) {
    this.minLevel = opts?.minLevel ?? 'debug';
    this.now = opts?.now ?? (() => new Date());
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (this.sink === undefined) return;
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.minLevel]) return;
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      context,
    };
    this.sink.append(entry);
  }
}

/**
 * Stepwise CLI - Console Log Sink
 *
 * Writes log entries to stderr, one line each, coloured by level. stdout is
 * left for command output so `--json` stays machine-readable.
 */

import type { LogEntry, LogSink } from '@stepwise/kernel';
import { levelColor, t } from '../output/theme.js';

export function formatLogLine(entry: LogEntry): string {
  const context =
    entry.context === undefined
      ? ''
      : ' ' +
        Object.entries(entry.context)
          .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
          .join(' ');
  return `${levelColor(entry.level)(entry.level.toUpperCase().padEnd(5))} ${entry.message}${t.dim(context)}`;
}

export class ConsoleLogSink implements LogSink {
  append(entry: LogEntry): void {
    process.stderr.write(formatLogLine(entry) + '\n');
  }
}

/**
 * Forwards every entry to each of several sinks, in order.
 */
export class FanOutLogSink implements LogSink {
  private readonly sinks: ReadonlyArray<LogSink>;

  constructor(...sinks: LogSink[]) {
    this.sinks = sinks;
  }

  append(entry: LogEntry): void {
    for (const sink of this.sinks) {
      sink.append(entry);
    }
  }
}

/**
 * Stepwise Runtime Host - In-memory Log Sink
 *
 * Keeps entries in an array. No file system access. Suitable for unit tests
 * and for embedders that render log output themselves.
 */

import type { LogEntry, LogLevel, LogSink } from '@stepwise/kernel';

export class MemoryLogSink implements LogSink {
  private readonly entries: LogEntry[] = [];

  append(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** All entries, in append order. */
  list(): ReadonlyArray<LogEntry> {
    return this.entries;
  }

  /** Messages of entries at exactly `level`, in append order. */
  messages(level: LogLevel): ReadonlyArray<string> {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

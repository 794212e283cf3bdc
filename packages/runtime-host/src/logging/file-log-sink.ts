/**
 * Stepwise Runtime Host - File-backed Log Sink
 *
 * Implements the LogSink interface from @stepwise/kernel by appending one
 * JSON object per line to a log file (JSONL).
 *
 * This sink is synchronous: the write completes before the call returns, so
 * a failing module build has its reason on disk before the caller moves on
 * to the next module.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogEntry, LogSink } from '@stepwise/kernel';

export class FileLogSink implements LogSink {
  private dirReady = false;

  constructor(private readonly logPath: string) {}

  append(entry: LogEntry): void {
    if (!this.dirReady) {
      mkdirSync(dirname(this.logPath), { recursive: true });
      this.dirReady = true;
    }
    const line = JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      ...(entry.context !== undefined ? { context: entry.context } : {}),
    });
    appendFileSync(this.logPath, line + '\n', 'utf-8');
  }
}

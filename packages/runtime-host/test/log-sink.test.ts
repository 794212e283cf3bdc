/**
 * Stepwise Runtime Host - Log Sink Tests
 *
 *   LOG-1: FileLogSink writes one JSON object per line, creating the directory
 *   LOG-2: FileLogSink omits context when the entry has none
 *   LOG-3: MemoryLogSink keeps entries in order and filters by level
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { LogEntry } from '@stepwise/kernel';
import { FileLogSink } from '../src/logging/file-log-sink.js';
import { MemoryLogSink } from '../src/logging/memory-log-sink.js';

const WARN: LogEntry = {
  timestamp: '2024-05-01T12:00:00.000Z',
  level: 'warn',
  message: 'Bad module configuration format',
  context: { path: '/etc/calamares/modules/welcome.conf' },
};

const ERROR: LogEntry = {
  timestamp: '2024-05-01T12:00:01.000Z',
  level: 'error',
  message: 'Bad module directory',
};

describe('FileLogSink', () => {
  it('LOG-1: appends JSONL lines and creates the log directory', () => {
    const logPath = join(mkdtempSync(join(tmpdir(), 'stepwise-log-')), 'logs', 'modules.jsonl');
    const sink = new FileLogSink(logPath);

    sink.append(WARN);
    sink.append(ERROR);

    const lines = readFileSync(logPath, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0] ?? '')).toEqual(WARN);
  });

  it('LOG-2: omits the context key when the entry has no context', () => {
    const logPath = join(mkdtempSync(join(tmpdir(), 'stepwise-log-')), 'modules.jsonl');
    new FileLogSink(logPath).append(ERROR);

    expect(readFileSync(logPath, 'utf-8')).toBe(
      '{"timestamp":"2024-05-01T12:00:01.000Z","level":"error","message":"Bad module directory"}\n',
    );
  });
});

describe('MemoryLogSink', () => {
  it('LOG-3: keeps entries in order and filters messages by level', () => {
    const sink = new MemoryLogSink();

    sink.append(WARN);
    sink.append(ERROR);

    expect(sink.list()).toEqual([WARN, ERROR]);
    expect(sink.messages('error')).toEqual(['Bad module directory']);
    expect(sink.messages('debug')).toEqual([]);
  });
});

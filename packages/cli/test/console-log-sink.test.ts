/**
 * Playhost CLI — ConsoleLogSink Tests
 *
 * Coverage:
 *   CLS1: entries below the default 'warn' level are dropped
 *   CLS2: minLevel 'debug' lets everything through
 *   CLS3: theme paints level and scope; empty data is omitted
 */

import { describe, it, expect } from 'vitest';
import type { LogEntry } from '@playhost/kernel';
import { ConsoleLogSink, formatLogLine } from '../src/logging/console-log-sink.js';
import { plainTheme, type Theme } from '../src/output/theme.js';

function entry(level: LogEntry['level'], message: string, data?: Record<string, unknown>): LogEntry {
  return {
    level,
    scope: 'loader',
    message,
    timestamp: '2026-01-01T00:00:00.000Z',
    ...(data !== undefined ? { data } : {}),
  };
}

describe('ConsoleLogSink', () => {
  it('CLS1: drops entries below warn by default', () => {
    const lines: string[] = [];
    const sink = new ConsoleLogSink({ write: (line) => { lines.push(line); } });

    sink.append(entry('info', 'Loaded module', { module: 'chess' }));
    sink.append(entry('warn', 'Build failed', { module: 'chess' }));

    expect(lines).toEqual(['warn  loader  Build failed {"module":"chess"}']);
  });

  it('CLS2: minLevel debug lets everything through', () => {
    const lines: string[] = [];
    const sink = new ConsoleLogSink({ minLevel: 'debug', write: (line) => { lines.push(line); } });

    sink.append(entry('debug', 'Skipped directory'));
    sink.append(entry('error', 'Refresh aborted'));

    expect(lines).toEqual(['debug loader  Skipped directory', 'error loader  Refresh aborted']);
  });
});

describe('formatLogLine', () => {
  it('CLS3: paints level and scope through the theme', () => {
    const tagged: Theme = {
      ...plainTheme,
      error: (s) => `E(${s})`,
      muted: (s) => `M(${s})`,
    };

    expect(formatLogLine(entry('error', 'boom', {}), tagged)).toBe('E(error) M(loader)  boom');
  });
});

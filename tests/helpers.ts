/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { Logger, setLogger } from '../src/logger.js';

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'flyte-settings-test-'));
}

export function writeTempFile(dir: string, relPath: string, content: string): string {
  const filePath = join(dir, relPath);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

export interface LogRecord {
  level: string;
  message: string;
  logger: string;
  extra: Record<string, unknown> | null;
}

/** Installs a buffering package logger; call `setLogger(null)` afterwards. */
export function captureLogs(level = 'trace'): { lines: string[]; records: () => LogRecord[] } {
  const lines: string[] = [];
  setLogger(new Logger({ level, output: { write: (s: string) => lines.push(s) } }));
  return {
    lines,
    records: () => lines.map((line): LogRecord => JSON.parse(line)),
  };
}

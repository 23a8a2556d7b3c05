import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { expect } from 'vitest';
import type { ParsedArgs } from '@/core/args/parse';
import type { ArgError, Result, TikeConfig } from '@/types';

export interface CapturedOutput {
  stdout: string;
  stderr: string;
}

/**
 * Capture console.log and console.error output during a function call.
 */
export function captureOutput<T>(fn: () => T): CapturedOutput & { result: T } {
  const originalLog = console.log;
  const originalError = console.error;
  let stdout = '';
  let stderr = '';
  console.log = (...args: unknown[]) => {
    stdout += `${args.map(String).join(' ')}\n`;
  };
  console.error = (...args: unknown[]) => {
    stderr += `${args.map(String).join(' ')}\n`;
  };
  try {
    const result = fn();
    return { stdout, stderr, result };
  } finally {
    console.log = originalLog;
    console.error = originalError;
  }
}

export function expectParsed(result: Result<ParsedArgs, ArgError>): ParsedArgs {
  if (!result.ok) {
    throw new Error(`expected parse to succeed, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

export function expectArgError(result: Result<ParsedArgs, ArgError>): ArgError {
  expect(result.ok).toBe(false);
  if (result.ok) {
    throw new Error('expected parse to fail');
  }
  return result.error;
}

/**
 * Create a temp directory to hold the database file.
 * Call the returned cleanup in afterEach.
 */
export function createTempConfig(): { config: TikeConfig; dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'tike-test-'));
  return {
    dir,
    config: {
      dbPath: join(dir, 'tike.db'),
    },
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

import { colors } from './utils/colors';
import type { Result, TaskError } from '../types';

export function missingTitle(): TaskError {
  return { kind: 'MissingTitle', message: 'Missing required argument: --title' };
}

export function invalidTaskNumber(option: string, raw: string): TaskError {
  return { kind: 'InvalidTaskNumber', message: `Invalid task number for --${option}: ${raw}` };
}

export function taskNotFound(taskNumber: number): TaskError {
  return { kind: 'TaskNotFound', message: `Task not found: ${taskNumber}` };
}

/**
 * Task numbers are positive decimal integers; no sign, no whitespace.
 */
export function parseTaskNumber(option: string, raw: string): Result<number, TaskError> {
  if (!/^\d+$/.test(raw)) {
    return { ok: false, error: invalidTaskNumber(option, raw) };
  }
  const taskNumber = Number(raw);
  if (!Number.isSafeInteger(taskNumber) || taskNumber < 1) {
    return { ok: false, error: invalidTaskNumber(option, raw) };
  }
  return { ok: true, value: taskNumber };
}

/** Print an anticipated failure (parse or command error). */
export function reportError(message: string): void {
  console.error(`${colors.red('Error:')} ${message}`);
}

/** Print a failure nothing upstream anticipated. */
export function reportUnexpected(error: unknown): void {
  if (error instanceof Error) {
    console.error(`Unhandled exception: ${error.message}`);
  } else {
    console.error('Unknown error occurred');
  }
}

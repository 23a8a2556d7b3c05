/**
 * Table output for task listings.
 */

import { colors } from './utils/colors';
import type { CompletedTask, Task } from '../types';

const NUMBER_WIDTH = 5;
const COLUMN_WIDTH = 20;

const TASK_HEADERS = ['Task Title', 'Task Description', 'Time Created (UTC)'];
const COMPLETED_HEADERS = [...TASK_HEADERS, 'Time Completed (UTC)'];

export interface NumberedTask<T extends Task = Task> {
  /** Task number shown to the user */
  number: number;
  task: T;
}

function formatRow(first: string, cells: readonly string[]): string {
  const row = first.padEnd(NUMBER_WIDTH) + cells.map((cell) => cell.padEnd(COLUMN_WIDTH)).join('');
  return row.trimEnd();
}

function formatTable(heading: string, headers: readonly string[], rows: string[][]): string {
  const lines: string[] = [];
  lines.push(colors.bold(heading));
  lines.push(formatRow('#', headers));
  lines.push(colors.dim('-'.repeat(NUMBER_WIDTH + headers.length * COLUMN_WIDTH)));
  for (const [number = '', ...cells] of rows) {
    lines.push(formatRow(number, cells));
  }
  return lines.join('\n');
}

function taskCells(task: Task): string[] {
  return [task.title, task.description, task.timeCreated];
}

export function formatTasks(heading: string, tasks: readonly NumberedTask[]): string {
  const rows = tasks.map(({ number, task }) => [String(number), ...taskCells(task)]);
  return formatTable(heading, TASK_HEADERS, rows);
}

/** Completed tables add a "Time Completed (UTC)" column. */
export function formatCompletedTasks(
  heading: string,
  tasks: readonly NumberedTask<CompletedTask>[],
): string {
  const rows = tasks.map(({ number, task }) => [
    String(number),
    ...taskCells(task),
    task.timeCompleted,
  ]);
  return formatTable(heading, COMPLETED_HEADERS, rows);
}

/** Number tasks 1..n in the order given (the store's id order). */
export function numberTasks<T extends Task>(tasks: readonly T[]): NumberedTask<T>[] {
  return tasks.map((task, i) => ({ number: i + 1, task }));
}

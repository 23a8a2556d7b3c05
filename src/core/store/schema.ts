import * as z from 'zod';
import type { Column } from './database';

export const TASKS_TABLE = 'tasks';
export const COMPLETED_TASKS_TABLE = 'completedTasks';

export const TASKS_COLUMNS: readonly Column[] = [
  { name: 'id', type: 'INTEGER', primaryKey: true, autoIncrement: true },
  { name: 'title', type: 'TEXT' },
  { name: 'description', type: 'TEXT' },
  { name: 'timeCreated', type: 'DATETIME', defaultValue: 'CURRENT_TIMESTAMP' },
];

export const COMPLETED_TASKS_COLUMNS: readonly Column[] = [
  { name: 'id', type: 'INTEGER', primaryKey: true },
  { name: 'title', type: 'TEXT' },
  { name: 'description', type: 'TEXT' },
  { name: 'timeCreated', type: 'DATETIME' },
  { name: 'timeCompleted', type: 'DATETIME', defaultValue: 'CURRENT_TIMESTAMP' },
];

// NULL text columns read back as empty strings
const text = z
  .string()
  .nullable()
  .transform((value) => value ?? '');

export const TaskRowSchema = z.object({
  id: z.number().int(),
  title: text,
  description: text,
  timeCreated: text,
});

export const CompletedTaskRowSchema = TaskRowSchema.extend({
  timeCompleted: text,
});

import * as z from 'zod';
import { Database, type RecordData } from './database';
import {
  COMPLETED_TASKS_COLUMNS,
  COMPLETED_TASKS_TABLE,
  CompletedTaskRowSchema,
  TASKS_COLUMNS,
  TASKS_TABLE,
  TaskRowSchema,
} from './schema';
import type { CompletedTask, NewTask, Task } from '../../types';

function parseRow<S extends z.ZodType>(schema: S, table: string, record: RecordData): z.output<S> {
  const result = schema.safeParse(record);
  if (!result.success) {
    throw new Error(`Malformed row in ${table}: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}

/**
 * Pending and completed tasks, addressed by task number: the 1-based
 * position of a task when its table is ordered by id.
 */
export class TaskStore {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
    db.createTable(TASKS_TABLE, TASKS_COLUMNS);
    db.createTable(COMPLETED_TASKS_TABLE, COMPLETED_TASKS_COLUMNS);
  }

  /** Open (creating if needed) the database at `path`. */
  static open(path: string): TaskStore {
    return new TaskStore(new Database(path));
  }

  add(task: NewTask): void {
    const data: RecordData = { title: task.title };
    if (task.description !== undefined) {
      data.description = task.description;
    }
    this.db.addRecord(TASKS_TABLE, data);
  }

  get(taskNumber: number): Task | null {
    const record = this.db.getRecordByPseudoId(TASKS_TABLE, taskNumber);
    return record ? parseRow(TaskRowSchema, TASKS_TABLE, record) : null;
  }

  list(): Task[] {
    return this.db
      .getAllRecords(TASKS_TABLE)
      .map((record) => parseRow(TaskRowSchema, TASKS_TABLE, record));
  }

  /** @returns the removed task, or null if there is no such task number */
  remove(taskNumber: number): Task | null {
    return this.db.transaction(() => {
      const task = this.get(taskNumber);
      if (task) {
        this.db.removeRecord(TASKS_TABLE, { id: task.id });
      }
      return task;
    });
  }

  /**
   * Move a pending task to the completed table.
   * @returns the task as it was, or null if there is no such task number
   */
  complete(taskNumber: number): Task | null {
    return this.db.transaction(() => {
      const task = this.get(taskNumber);
      if (!task) {
        return null;
      }
      this.db.addRecord(COMPLETED_TASKS_TABLE, {
        title: task.title,
        description: task.description,
        timeCreated: task.timeCreated,
      });
      this.db.removeRecord(TASKS_TABLE, { id: task.id });
      return task;
    });
  }

  getCompleted(taskNumber: number): CompletedTask | null {
    const record = this.db.getRecordByPseudoId(COMPLETED_TASKS_TABLE, taskNumber);
    return record ? parseRow(CompletedTaskRowSchema, COMPLETED_TASKS_TABLE, record) : null;
  }

  listCompleted(): CompletedTask[] {
    return this.db
      .getAllRecords(COMPLETED_TASKS_TABLE)
      .map((record) => parseRow(CompletedTaskRowSchema, COMPLETED_TASKS_TABLE, record));
  }

  close(): void {
    this.db.close();
  }
}

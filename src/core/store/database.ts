/**
 * Thin synchronous wrapper over a SQLite file.
 *
 * Records are plain column → value maps. Table and column names are
 * interpolated into SQL, so they are checked against IDENTIFIER_PATTERN;
 * values are always bound as parameters.
 */

import BetterSqlite3 from 'better-sqlite3';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type Field = string | number | null;
export type RecordData = Record<string, Field>;

export interface Column {
  name: string;
  type: string;
  primaryKey?: boolean;
  autoIncrement?: boolean;
  notNull?: boolean;
  unique?: boolean;
  /** SQL expression, e.g. "CURRENT_TIMESTAMP" */
  defaultValue?: string;
  /** Foreign key target, e.g. "tasks(id)" */
  references?: string;
}

function identifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return name;
}

function columnDefinition(column: Column): string {
  let definition = `${identifier(column.name)} ${column.type}`;
  if (column.primaryKey) definition += ' PRIMARY KEY';
  if (column.autoIncrement) definition += ' AUTOINCREMENT';
  if (column.notNull) definition += ' NOT NULL';
  if (column.unique) definition += ' UNIQUE';
  if (column.defaultValue !== undefined) definition += ` DEFAULT ${column.defaultValue}`;
  if (column.references !== undefined) definition += ` REFERENCES ${column.references}`;
  return definition;
}

function whereClause(criteria: RecordData): { sql: string; params: Field[] } {
  const keys = Object.keys(criteria);
  if (keys.length === 0) {
    throw new Error('At least one criterion is required');
  }
  return {
    sql: keys.map((key) => `${identifier(key)} = ?`).join(' AND '),
    params: keys.map((key) => criteria[key] ?? null),
  };
}

function pseudoIdSubquery(table: string): string {
  return `SELECT id FROM (
      SELECT ROW_NUMBER() OVER (ORDER BY id) AS pseudo_id, id FROM ${table}
    ) WHERE pseudo_id = ?`;
}

function toRecord(row: unknown): RecordData | null {
  if (!row || typeof row !== 'object') {
    return null;
  }
  const record: RecordData = {};
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string' || typeof value === 'number' || value === null) {
      record[key] = value;
    } else if (typeof value === 'bigint') {
      record[key] = Number(value);
    } else {
      throw new Error(`Unsupported column type for column: ${key}`);
    }
  }
  return record;
}

export class Database {
  private readonly db: BetterSqlite3.Database;

  /** @param path - file path, or ":memory:" */
  constructor(path: string) {
    this.db = new BetterSqlite3(path);
  }

  createTable(table: string, columns: readonly Column[]): void {
    if (columns.length === 0) {
      throw new Error('Cannot create a table without columns.');
    }
    const definitions = columns.map(columnDefinition).join(', ');
    this.db.exec(`CREATE TABLE IF NOT EXISTS ${identifier(table)} (${definitions})`);
  }

  addRecord(table: string, data: RecordData): void {
    const keys = Object.keys(data);
    if (keys.length === 0) {
      this.db.prepare(`INSERT INTO ${identifier(table)} DEFAULT VALUES`).run();
      return;
    }
    const columns = keys.map(identifier).join(', ');
    const placeholders = keys.map(() => '?').join(', ');
    this.db
      .prepare(`INSERT INTO ${identifier(table)} (${columns}) VALUES (${placeholders})`)
      .run(...keys.map((key) => data[key] ?? null));
  }

  /** @returns number of rows deleted */
  removeRecord(table: string, criteria: RecordData): number {
    const where = whereClause(criteria);
    return this.db
      .prepare(`DELETE FROM ${identifier(table)} WHERE ${where.sql}`)
      .run(...where.params).changes;
  }

  getRecord(table: string, criteria: RecordData): RecordData | null {
    const where = whereClause(criteria);
    const row = this.db
      .prepare(`SELECT * FROM ${identifier(table)} WHERE ${where.sql} LIMIT 1`)
      .get(...where.params);
    return toRecord(row);
  }

  /**
   * Row at 1-based position `pseudoId` when the table is ordered by id.
   * Tables without an `id` column are not supported.
   */
  getRecordByPseudoId(table: string, pseudoId: number): RecordData | null {
    const name = identifier(table);
    const row = this.db
      .prepare(`SELECT * FROM ${name} WHERE id = (${pseudoIdSubquery(name)})`)
      .get(pseudoId);
    return toRecord(row);
  }

  /** @returns number of rows deleted (0 or 1) */
  removeRecordByPseudoId(table: string, pseudoId: number): number {
    const name = identifier(table);
    return this.db
      .prepare(`DELETE FROM ${name} WHERE id = (${pseudoIdSubquery(name)})`)
      .run(pseudoId).changes;
  }

  getAllRecords(table: string): RecordData[] {
    const rows = this.db.prepare(`SELECT * FROM ${identifier(table)} ORDER BY id`).all();
    return rows.map((row) => {
      const record = toRecord(row);
      if (!record) {
        throw new Error(`Unexpected row shape in table: ${table}`);
      }
      return record;
    });
  }

  /** Run `fn` inside a transaction; it rolls back if `fn` throws. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

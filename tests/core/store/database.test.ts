import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { Database } from '@/core/store/database';

describe('Database', () => {
  let db: Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.createTable('notes', [
      { name: 'id', type: 'INTEGER', primaryKey: true, autoIncrement: true },
      { name: 'body', type: 'TEXT', notNull: true },
      { name: 'score', type: 'REAL' },
      { name: 'tag', type: 'TEXT', defaultValue: "'none'" },
    ]);
  });

  afterEach(() => {
    db.close();
  });

  describe('createTable', () => {
    test('is idempotent', () => {
      db.addRecord('notes', { body: 'kept' });
      db.createTable('notes', [{ name: 'id', type: 'INTEGER', primaryKey: true }]);
      expect(db.getAllRecords('notes')).toHaveLength(1);
    });

    test('rejects an empty column list', () => {
      expect(() => db.createTable('empty', [])).toThrow('Cannot create a table without columns.');
    });

    test('rejects unsafe identifiers', () => {
      expect(() => db.createTable('bad; DROP TABLE notes', [{ name: 'id', type: 'INTEGER' }])).toThrow(
        'Invalid SQL identifier: bad; DROP TABLE notes',
      );
      expect(() => db.getAllRecords('notes WHERE 1=1')).toThrow('Invalid SQL identifier');
    });

    test('applies column defaults', () => {
      db.addRecord('notes', { body: 'first' });
      expect(db.getRecord('notes', { body: 'first' })).toEqual({
        id: 1,
        body: 'first',
        score: null,
        tag: 'none',
      });
    });

    test('enforces NOT NULL', () => {
      expect(() => db.addRecord('notes', { score: 1 })).toThrow();
    });
  });

  describe('records', () => {
    beforeEach(() => {
      db.addRecord('notes', { body: 'one', score: 1.5 });
      db.addRecord('notes', { body: 'two', tag: 'work' });
      db.addRecord('notes', { body: 'three', tag: 'work' });
    });

    test('getAllRecords returns rows ordered by id', () => {
      expect(db.getAllRecords('notes').map((r) => r.body)).toEqual(['one', 'two', 'three']);
    });

    test('getRecord matches every criterion', () => {
      expect(db.getRecord('notes', { tag: 'work', body: 'three' })?.id).toBe(3);
      expect(db.getRecord('notes', { tag: 'work', body: 'one' })).toBeNull();
    });

    test('getRecord keeps numeric types', () => {
      expect(db.getRecord('notes', { body: 'one' })?.score).toBe(1.5);
    });

    test('getRecord requires criteria', () => {
      expect(() => db.getRecord('notes', {})).toThrow('At least one criterion is required');
    });

    test('removeRecord deletes matching rows', () => {
      expect(db.removeRecord('notes', { tag: 'work' })).toBe(2);
      expect(db.getAllRecords('notes').map((r) => r.body)).toEqual(['one']);
    });

    test('binds values rather than interpolating them', () => {
      db.addRecord('notes', { body: "it's; DROP TABLE notes" });
      expect(db.getRecord('notes', { body: "it's; DROP TABLE notes" })?.id).toBe(4);
    });
  });

  describe('pseudo ids', () => {
    beforeEach(() => {
      db.addRecord('notes', { body: 'one' });
      db.addRecord('notes', { body: 'two' });
      db.addRecord('notes', { body: 'three' });
      // ids are now 1, 3 with a gap at 2
      db.removeRecord('notes', { id: 2 });
    });

    test('address rows by position, not id', () => {
      expect(db.getRecordByPseudoId('notes', 1)?.body).toBe('one');
      expect(db.getRecordByPseudoId('notes', 2)?.body).toBe('three');
      expect(db.getRecordByPseudoId('notes', 2)?.id).toBe(3);
    });

    test('out of range positions return null', () => {
      expect(db.getRecordByPseudoId('notes', 0)).toBeNull();
      expect(db.getRecordByPseudoId('notes', 3)).toBeNull();
    });

    test('removeRecordByPseudoId removes the row at that position', () => {
      expect(db.removeRecordByPseudoId('notes', 2)).toBe(1);
      expect(db.getAllRecords('notes').map((r) => r.body)).toEqual(['one']);
    });

    test('removeRecordByPseudoId reports nothing removed when out of range', () => {
      expect(db.removeRecordByPseudoId('notes', 9)).toBe(0);
      expect(db.getAllRecords('notes')).toHaveLength(2);
    });
  });

  describe('transaction', () => {
    test('commits when the callback returns', () => {
      const result = db.transaction(() => {
        db.addRecord('notes', { body: 'inside' });
        return 'done';
      });
      expect(result).toBe('done');
      expect(db.getAllRecords('notes')).toHaveLength(1);
    });

    test('rolls back when the callback throws', () => {
      expect(() =>
        db.transaction(() => {
          db.addRecord('notes', { body: 'inside' });
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(db.getAllRecords('notes')).toEqual([]);
    });
  });
});

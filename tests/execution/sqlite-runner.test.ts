import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type sqlite3 from 'sqlite3';

import { StoreAccessError } from '../../src/core/errors.js';
import {
  createSqliteRunner,
  createSqliteTransaction,
} from '../../src/core/execution/runners/sqlite-runner.js';
import {
  defineStatement,
  getBoundSql,
  type MappedStatement,
} from '../../src/core/mapping/mapped-statement.js';
import { RowBounds } from '../../src/core/mapping/row-bounds.js';
import { MetadataRegistry } from '../../src/reflection/metadata-registry.js';
import { Types } from '../../src/reflection/types.js';
import { closeDb, createBlogDb, selectRows } from '../e2e/sqlite-helpers.js';

class BlogPost {
  id = 0;
  title = '';
  authorName: string | null = null;
}

const request = (statement: MappedStatement, parameter: unknown, bounds = RowBounds.DEFAULT) => ({
  statement,
  parameter,
  bounds,
  boundSql: getBoundSql(statement, parameter),
});

describe('sqlite runner', () => {
  let db: sqlite3.Database;
  const registry = new MetadataRegistry();

  beforeEach(async () => {
    db = await createBlogDb();
  });

  afterEach(async () => {
    await closeDb(db);
  });

  it('should fetch rows and apply the pagination window', async () => {
    const runner = createSqliteRunner(db, { registry });
    const selectAll = defineStatement({ id: 'selectAll', sql: 'SELECT id, title FROM blog ORDER BY id' });

    const rows = await runner.query(request(selectAll, null, new RowBounds(1, 1)));

    expect(rows).toEqual([{ id: 2, title: 'second' }]);
  });

  it('should bind parameters and map rows onto the result type', async () => {
    const runner = createSqliteRunner(db, { registry });
    const selectPost = defineStatement({
      id: 'selectPost',
      sql: 'SELECT id, title, author_name FROM blog WHERE id = ?',
      parameterMappings: ['id'],
      resultType: BlogPost,
    });

    const [post] = await runner.query(request(selectPost, { id: 1 }));

    expect(post).toBeInstanceOf(BlogPost);
    expect(post).toEqual(Object.assign(new BlogPost(), { id: 1, title: 'first', authorName: 'ann' }));
  });

  it('should return the first column for value result types', async () => {
    const runner = createSqliteRunner(db, { registry });
    const selectTitles = defineStatement({
      id: 'selectTitles',
      sql: 'SELECT title FROM blog ORDER BY id',
      resultType: Types.string,
    });

    await expect(runner.query(request(selectTitles, null))).resolves.toEqual(['first', 'second', 'third']);
  });

  it('should pass every row to the result handler', async () => {
    const runner = createSqliteRunner(db, { registry });
    const selectIds = defineStatement({ id: 'selectIds', sql: 'SELECT id FROM blog ORDER BY id', resultType: Number });
    const handled: Array<[unknown, number]> = [];

    await runner.query({ ...request(selectIds, null), resultHandler: (row, index) => handled.push([row, index]) });

    expect(handled).toEqual([
      [1, 0],
      [2, 1],
      [3, 2],
    ]);
  });

  it('should return the affected row count of updates', async () => {
    const runner = createSqliteRunner(db, { registry });
    const renameAfter = defineStatement({
      id: 'renameAfter',
      sql: 'UPDATE blog SET title = ? WHERE id > ?',
      commandType: 'UPDATE',
      parameterMappings: ['title', 'id'],
    });

    await expect(runner.update(request(renameAfter, { title: 'renamed', id: 1 }))).resolves.toBe(2);
    await expect(selectRows(db, 'SELECT title FROM blog ORDER BY id')).resolves.toEqual([
      { title: 'first' },
      { title: 'renamed' },
      { title: 'renamed' },
    ]);
  });

  it('should step through rows with a cursor', async () => {
    const runner = createSqliteRunner(db, { registry });
    const selectIds = defineStatement({ id: 'selectIds', sql: 'SELECT id FROM blog ORDER BY id', resultType: Number });

    const cursor = await runner.queryCursor(request(selectIds, null, new RowBounds(1, RowBounds.NO_ROW_LIMIT)));
    const ids: unknown[] = [];
    for await (const id of cursor) {
      ids.push(id);
    }

    expect(ids).toEqual([2, 3]);
    expect(cursor.isConsumed()).toBe(true);
  });

  it('should wrap driver errors', async () => {
    const runner = createSqliteRunner(db, { registry });
    const broken = defineStatement({ id: 'broken', sql: 'SELECT * FROM missing_table' });

    const error = await runner.query(request(broken, null)).then(
      () => undefined,
      (rejection: unknown) => rejection
    );

    expect(error).toBeInstanceOf(StoreAccessError);
    expect(error instanceof StoreAccessError ? error.details : undefined).toEqual({
      statementId: 'broken',
      sql: 'SELECT * FROM missing_table',
    });
    expect(error instanceof StoreAccessError ? error.message : '').toMatch(/^Error running statement 'broken'\. Cause: .*no such table: missing_table/);
  });

  it('should report where a failing statement was declared', async () => {
    const runner = createSqliteRunner(db, { registry });
    const broken = defineStatement({
      id: 'broken',
      sql: 'DELETE FROM missing_table',
      commandType: 'DELETE',
      resource: 'mappers/blog.ts',
    });

    const error = await runner.update(request(broken, null)).then(
      () => undefined,
      (rejection: unknown) => rejection
    );

    expect(error instanceof StoreAccessError ? error.details : undefined).toEqual({
      statementId: 'broken',
      sql: 'DELETE FROM missing_table',
      resource: 'mappers/blog.ts',
    });
  });

  describe('transactions', () => {
    const deleteAll = defineStatement({ id: 'deleteAll', sql: 'DELETE FROM blog', commandType: 'DELETE' });

    it('should begin lazily and roll back', async () => {
      const transaction = createSqliteTransaction(db, { autoCommit: false });
      const runner = createSqliteRunner(db, { registry, transaction });

      expect(transaction.isActive()).toBe(false);
      await runner.update(request(deleteAll, null));
      expect(transaction.isActive()).toBe(true);
      await transaction.rollback();

      expect(transaction.isActive()).toBe(false);
      await expect(selectRows(db, 'SELECT COUNT(*) AS total FROM blog')).resolves.toEqual([{ total: 3 }]);
    });

    it('should commit', async () => {
      const transaction = createSqliteTransaction(db, { autoCommit: false });
      const runner = createSqliteRunner(db, { registry, transaction });

      await runner.update(request(deleteAll, null));
      await transaction.commit();
      await transaction.close();

      await expect(selectRows(db, 'SELECT COUNT(*) AS total FROM blog')).resolves.toEqual([{ total: 0 }]);
    });

    it('should not open a transaction in auto-commit mode', async () => {
      const transaction = createSqliteTransaction(db, { autoCommit: true, timeout: 5 });
      const runner = createSqliteRunner(db, { registry, transaction });

      await runner.update(request(deleteAll, null));
      await transaction.rollback();

      expect(transaction.getTimeout()).toBe(5);
      await expect(selectRows(db, 'SELECT COUNT(*) AS total FROM blog')).resolves.toEqual([{ total: 0 }]);
    });
  });
});

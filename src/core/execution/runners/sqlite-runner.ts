import type sqlite3 from 'sqlite3';

import { describeCause, StoreAccessError } from '../../errors.js';
import { type MappedStatement, resourceDetails } from '../../mapping/mapped-statement.js';
import { resolveInputValues } from '../../mapping/parameter-values.js';
import { createRowMapper, type RowMapper, type StoreRow } from '../../mapping/row-mapper.js';
import type { MetadataRegistry } from '../../../reflection/metadata-registry.js';
import { ObjectAccessor } from '../../../reflection/object-accessor.js';
import { DefaultCursor, type RowSource } from '../cursor.js';
import type {
  RunnerFactory,
  StatementRunner,
  Transaction,
  TransactionFactory,
} from '../statement-runner.js';

const isStoreRow = (value: unknown): value is StoreRow => typeof value === 'object' && value !== null;

const toBindValue = (value: unknown): unknown => {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  if (value instanceof Date) return value.toISOString();
  return value;
};

const execSql = (db: sqlite3.Database, sql: string): Promise<void> =>
  new Promise((resolve, reject) => {
    db.exec(sql, err => (err ? reject(err) : resolve()));
  });

const allRows = (db: sqlite3.Database, sql: string, params: unknown[]): Promise<StoreRow[]> =>
  new Promise((resolve, reject) => {
    db.all(sql, params, (err: Error | null, rows: unknown[]) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(rows.filter(isStoreRow));
    });
  });

const runSql = (db: sqlite3.Database, sql: string, params: unknown[]): Promise<number> =>
  new Promise((resolve, reject) => {
    db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
      if (err) {
        reject(err);
        return;
      }
      resolve(this.changes);
    });
  });

const prepare = (db: sqlite3.Database, sql: string, params: unknown[]): Promise<sqlite3.Statement> =>
  new Promise((resolve, reject) => {
    const statement = db.prepare(sql, params, (err: Error | null) => (err ? reject(err) : resolve(statement)));
  });

const storeError = (statement: MappedStatement, sql: string, cause: unknown): StoreAccessError =>
  new StoreAccessError(`Error running statement '${statement.id}'. Cause: ${describeCause(cause)}`, {
    cause,
    details: { statementId: statement.id, sql, ...resourceDetails(statement) },
  });

/**
 * Row source that steps a prepared statement one row per call.
 */
const createStatementRowSource = (
  statement: sqlite3.Statement,
  mapRow: RowMapper,
  onError: (cause: unknown) => Error
): RowSource<unknown> => {
  let finalized = false;
  return {
    next: () =>
      new Promise<IteratorResult<unknown, undefined>>((resolve, reject) => {
        statement.get((err: Error | null, row?: unknown) => {
          if (err) {
            reject(onError(err));
            return;
          }
          resolve(isStoreRow(row) ? { done: false, value: mapRow(row) } : { done: true, value: undefined });
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (finalized) {
          resolve();
          return;
        }
        finalized = true;
        statement.finalize(err => (err ? reject(onError(err)) : resolve()));
      }),
  };
};

/**
 * Transaction over a sqlite3 connection. Without auto-commit, `BEGIN` is
 * issued lazily before the first statement of each unit of work. The
 * connection itself is owned by the caller and stays open on `close`.
 */
export class SqliteTransaction implements Transaction {
  private active = false;

  constructor(
    private readonly db: sqlite3.Database,
    readonly autoCommit: boolean,
    private readonly timeout?: number
  ) {}

  isActive(): boolean {
    return this.active;
  }

  async begin(): Promise<void> {
    if (this.autoCommit || this.active) {
      return;
    }
    await execSql(this.db, 'BEGIN');
    this.active = true;
  }

  async commit(): Promise<void> {
    if (!this.active) {
      return;
    }
    await execSql(this.db, 'COMMIT');
    this.active = false;
  }

  async rollback(): Promise<void> {
    if (!this.active) {
      return;
    }
    await execSql(this.db, 'ROLLBACK');
    this.active = false;
  }

  async close(): Promise<void> {
    await this.rollback();
  }

  getTimeout(): number | undefined {
    return this.timeout;
  }
}

export interface SqliteTransactionOptions {
  autoCommit: boolean;
  /** Seconds */
  timeout?: number;
}

export const createSqliteTransaction = (db: sqlite3.Database, options: SqliteTransactionOptions): SqliteTransaction =>
  new SqliteTransaction(db, options.autoCommit, options.timeout);

export interface SqliteRunnerOptions {
  registry: MetadataRegistry;
  /** Transaction to begin before each statement */
  transaction?: SqliteTransaction;
}

/**
 * Creates a statement runner for SQLite.
 * @param db An open sqlite3 database.
 * @param options Metadata registry used to read parameters and build result objects.
 * @returns A StatementRunner implementation for SQLite.
 */
export function createSqliteRunner(db: sqlite3.Database, options: SqliteRunnerOptions): StatementRunner {
  const accessor = new ObjectAccessor(options.registry);
  const mappers = new Map<MappedStatement, RowMapper>();

  const rowMapperFor = (statement: MappedStatement): RowMapper => {
    let mapper = mappers.get(statement);
    if (!mapper) {
      mapper = createRowMapper(options.registry, statement.resultType);
      mappers.set(statement, mapper);
    }
    return mapper;
  };

  const prepareCall = async (timeout: number | undefined): Promise<void> => {
    if (timeout !== undefined) {
      db.configure('busyTimeout', timeout * 1000);
    }
    await options.transaction?.begin();
  };

  return {
    async query({ statement, boundSql, bounds, resultHandler, timeout }) {
      const params = resolveInputValues(boundSql, accessor).map(toBindValue);
      let rows: StoreRow[];
      try {
        await prepareCall(timeout);
        rows = await allRows(db, boundSql.sql, params);
      } catch (error) {
        throw storeError(statement, boundSql.sql, error);
      }
      const mapRow = rowMapperFor(statement);
      const results = bounds.slice(rows).map(mapRow);
      if (resultHandler) {
        results.forEach((row, index) => resultHandler(row, index));
      }
      return results;
    },

    async update({ statement, boundSql, timeout }) {
      const params = resolveInputValues(boundSql, accessor).map(toBindValue);
      try {
        await prepareCall(timeout);
        return await runSql(db, boundSql.sql, params);
      } catch (error) {
        throw storeError(statement, boundSql.sql, error);
      }
    },

    async queryCursor({ statement, boundSql, bounds, timeout }) {
      const params = resolveInputValues(boundSql, accessor).map(toBindValue);
      let prepared: sqlite3.Statement;
      try {
        await prepareCall(timeout);
        prepared = await prepare(db, boundSql.sql, params);
      } catch (error) {
        throw storeError(statement, boundSql.sql, error);
      }
      const source = createStatementRowSource(prepared, rowMapperFor(statement), error =>
        storeError(statement, boundSql.sql, error)
      );
      return new DefaultCursor(source, bounds);
    },
  };
}

export interface SqliteEnvironmentOptions {
  registry: MetadataRegistry;
  /** Transaction timeout in seconds */
  timeout?: number;
}

/**
 * Transaction and runner factories that share one sqlite3 connection.
 */
export const createSqliteFactories = (
  db: sqlite3.Database,
  options: SqliteEnvironmentOptions
): { transactionFactory: TransactionFactory; runnerFactory: RunnerFactory } => ({
  transactionFactory: {
    newTransaction: ({ autoCommit }) => createSqliteTransaction(db, { autoCommit, timeout: options.timeout }),
  },
  runnerFactory: transaction =>
    createSqliteRunner(db, {
      registry: options.registry,
      transaction: transaction instanceof SqliteTransaction ? transaction : undefined,
    }),
});

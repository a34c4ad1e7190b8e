import type { BoundSql, MappedStatement } from '../mapping/mapped-statement.js';
import type { RowBounds } from '../mapping/row-bounds.js';
import type { Cursor } from './cursor.js';

/**
 * Receives every row of a handled query, in store order.
 */
export type ResultHandler = (row: unknown, index: number) => void;

/**
 * What a runner needs to execute one statement.
 */
export interface StatementRequest {
  statement: MappedStatement;
  parameter: unknown;
  boundSql: BoundSql;
  /** Seconds before the store call is abandoned */
  timeout?: number;
  /** Rows fetched per round trip, where the driver supports it */
  fetchSize?: number;
}

export interface QueryRequest extends StatementRequest {
  bounds: RowBounds;
  resultHandler?: ResultHandler;
}

/**
 * Store-facing half of a session. The executor owns caching and ordering;
 * the runner only talks to the store.
 */
export interface StatementRunner {
  /**
   * Fetches the rows of a select, already windowed by `bounds`. With a
   * result handler every row is also passed to it.
   */
  query(request: QueryRequest): Promise<unknown[]>;
  /** Runs an insert, update or delete and returns the affected row count */
  update(request: StatementRequest): Promise<number>;
  queryCursor(request: Omit<QueryRequest, 'resultHandler'>): Promise<Cursor<unknown>>;
  /** Sends statements the runner batched, or discards them on rollback */
  flushStatements?(isRollback: boolean): Promise<void>;
}

/**
 * Unit of work on the store.
 */
export interface Transaction {
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
  /** Seconds left before the transaction times out, when it has a limit */
  getTimeout?(): number | undefined;
}

export interface TransactionFactory {
  newTransaction(options: { autoCommit: boolean }): Transaction;
}

/**
 * Creates the runner of a session bound to its transaction.
 */
export type RunnerFactory = (transaction: Transaction) => StatementRunner;

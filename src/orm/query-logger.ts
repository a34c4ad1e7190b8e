import type { StatementRunner } from '../core/execution/statement-runner.js';
import type { BoundSql } from '../core/mapping/mapped-statement.js';
import { resolveInputValues } from '../core/mapping/parameter-values.js';
import type { ObjectAccessor } from '../reflection/object-accessor.js';

/**
 * Represents a single SQL query log entry
 */
export interface QueryLogEntry {
  /** Id of the mapped statement */
  statementId: string;
  /** The SQL query that was executed (or whose rows were served from the cache) */
  sql: string;
  /** Parameters used in the query */
  params?: unknown[];
  /** Where the rows came from */
  source: 'store' | 'local-cache';
}

/**
 * Function type for query logging callbacks
 * @param entry - The query log entry to process
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

export interface WarningLogEntry {
  message: string;
  cause?: unknown;
}

/**
 * Receives failures that are reported but not rethrown (close-time errors).
 */
export type WarningLogger = (entry: WarningLogEntry) => void;

export const consoleWarningLogger: WarningLogger = ({ message, cause }) => {
  if (cause === undefined) {
    console.warn(message);
  } else {
    console.warn(message, cause);
  }
};

export const createLogEntry = (
  statementId: string,
  boundSql: BoundSql,
  accessor: ObjectAccessor,
  source: QueryLogEntry['source']
): QueryLogEntry => ({
  statementId,
  sql: boundSql.sql,
  params: resolveInputValues(boundSql, accessor),
  source,
});

/**
 * Creates a wrapped statement runner that logs all SQL sent to the store
 * @param runner - Original runner to wrap
 * @param accessor - Reads bind values from parameter objects
 * @param logger - Optional logger function to receive query log entries
 * @returns Wrapped runner that logs statements before execution
 */
export const createQueryLoggingRunner = (
  runner: StatementRunner,
  accessor: ObjectAccessor,
  logger?: QueryLogger
): StatementRunner => {
  if (!logger) {
    return runner;
  }

  const wrapped: StatementRunner = {
    async query(request) {
      logger(createLogEntry(request.statement.id, request.boundSql, accessor, 'store'));
      return runner.query(request);
    },
    async update(request) {
      logger(createLogEntry(request.statement.id, request.boundSql, accessor, 'store'));
      return runner.update(request);
    },
    async queryCursor(request) {
      logger(createLogEntry(request.statement.id, request.boundSql, accessor, 'store'));
      return runner.queryCursor(request);
    },
  };
  if (runner.flushStatements) {
    const flush = runner.flushStatements.bind(runner);
    wrapped.flushStatements = isRollback => flush(isRollback);
  }

  return wrapped;
};

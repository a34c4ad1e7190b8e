import type { TypeRef } from '../../reflection/types.js';

export type SqlCommandType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

/**
 * `CALLABLE` statements may write output parameters back into the parameter object.
 */
export type StatementType = 'STATEMENT' | 'PREPARED' | 'CALLABLE';

export type ParameterMode = 'IN' | 'OUT' | 'INOUT';

export interface ParameterMapping {
  /** Property path read from (or written to) the parameter object */
  property: string;
  mode: ParameterMode;
}

/**
 * SQL text resolved for one parameter object, with its placeholders in order.
 */
export interface BoundSql {
  sql: string;
  parameterMappings: readonly ParameterMapping[];
  parameterObject: unknown;
  /** Values generated while building the SQL (loop variables, bind expressions) */
  additionalParameters: ReadonlyMap<string, unknown>;
}

export type SqlSource = (parameter: unknown) => BoundSql;

export interface MappedStatement {
  id: string;
  commandType: SqlCommandType;
  statementType: StatementType;
  sqlSource: SqlSource;
  /** Clear the local cache before running (outermost calls only) */
  flushCacheRequired: boolean;
  /** Seconds; falls back to the configuration's default statement timeout */
  timeout?: number;
  fetchSize?: number;
  resultType?: TypeRef;
  /** Where the statement was declared; reported in error details */
  resource?: string;
}

export interface StatementOptions {
  id: string;
  sql: string | SqlSource;
  commandType?: SqlCommandType;
  statementType?: StatementType;
  parameterMappings?: ReadonlyArray<string | ParameterMapping>;
  flushCacheRequired?: boolean;
  timeout?: number;
  fetchSize?: number;
  resultType?: TypeRef;
  resource?: string;
}

export const param = (property: string, mode: ParameterMode = 'IN'): ParameterMapping => ({ property, mode });

export const createBoundSql = (
  sql: string,
  parameterMappings: ReadonlyArray<string | ParameterMapping>,
  parameterObject: unknown,
  additionalParameters: ReadonlyMap<string, unknown> = new Map()
): BoundSql => ({
  sql,
  parameterMappings: parameterMappings.map(mapping => (typeof mapping === 'string' ? param(mapping) : mapping)),
  parameterObject,
  additionalParameters,
});

/**
 * SQL source whose text does not depend on the parameter object.
 */
export const staticSql =
  (sql: string, parameterMappings: ReadonlyArray<string | ParameterMapping> = []): SqlSource =>
  parameter =>
    createBoundSql(sql, parameterMappings, parameter);

/**
 * Builds a statement; selects keep the local cache, writes flush it by default.
 */
export const defineStatement = (options: StatementOptions): MappedStatement => {
  const commandType = options.commandType ?? 'SELECT';
  const sqlSource = typeof options.sql === 'string' ? staticSql(options.sql, options.parameterMappings) : options.sql;
  return {
    id: options.id,
    commandType,
    statementType: options.statementType ?? 'PREPARED',
    sqlSource,
    flushCacheRequired: options.flushCacheRequired ?? commandType !== 'SELECT',
    timeout: options.timeout,
    fetchSize: options.fetchSize,
    resultType: options.resultType,
    resource: options.resource,
  };
};

/**
 * `{ resource }` for error details, empty when the statement has no recorded origin.
 */
export const resourceDetails = (statement: MappedStatement): { resource?: string } =>
  statement.resource === undefined ? {} : { resource: statement.resource };

export const getBoundSql = (statement: MappedStatement, parameter: unknown): BoundSql =>
  statement.sqlSource(parameter);

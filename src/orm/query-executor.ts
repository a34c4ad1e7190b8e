import { CacheKey } from '../cache/cache-key.js';
import {
  isMaterialized,
  isPending,
  LocalResultCache,
  materialized,
  PENDING,
} from '../cache/local-result-cache.js';
import { describeCause, ExecutorClosedError, ExecutorError } from '../core/errors.js';
import type { Cursor } from '../core/execution/cursor.js';
import type { ResultHandler, StatementRunner, Transaction } from '../core/execution/statement-runner.js';
import {
  type BoundSql,
  getBoundSql,
  type MappedStatement,
  resourceDetails,
} from '../core/mapping/mapped-statement.js';
import { resolveParameterValue } from '../core/mapping/parameter-values.js';
import { RowBounds } from '../core/mapping/row-bounds.js';
import { ObjectAccessor } from '../reflection/object-accessor.js';
import type { TypeRef } from '../reflection/types.js';
import type { Configuration } from './configuration.js';
import { DeferredLoad, DeferredLoadQueue } from './deferred-load.js';
import { createLogEntry, createQueryLoggingRunner } from './query-logger.js';
import { ResultExtractor } from './result-extractor.js';

export interface QueryOptions {
  /** Rows are streamed to the handler and the local cache is bypassed */
  resultHandler?: ResultHandler;
  /** Precomputed fingerprint; built from the statement when omitted */
  key?: CacheKey;
  boundSql?: BoundSql;
}

interface StatementSettings {
  timeout?: number;
  fetchSize?: number;
}

/**
 * Runs mapped statements for one session, backed by a session-local result
 * cache.
 *
 * Queries nest: a runner (or the caller's result mapping) may issue further
 * queries while an outer one is still fetching. The depth of that nesting is
 * tracked so that deferred loads are resolved, and a `STATEMENT` scoped cache
 * is cleared, only when the outermost query returns.
 *
 * ```ts
 * const executor = await factory.openSession();
 * try {
 *   const rows = await executor.query(selectBlog, { id: 1 });
 *   await executor.commit(true);
 * } finally {
 *   await executor.close(false);
 * }
 * ```
 */
export class QueryExecutor {
  private readonly localCache = new LocalResultCache();
  private readonly deferredLoads = new DeferredLoadQueue();
  private readonly accessor: ObjectAccessor;
  private readonly resultExtractor: ResultExtractor;
  private readonly runner: StatementRunner;
  private queryStack = 0;
  private closed = false;

  constructor(
    private readonly configuration: Configuration,
    private readonly transaction: Transaction,
    runner: StatementRunner
  ) {
    this.accessor = new ObjectAccessor(configuration.metadataRegistry);
    this.resultExtractor = new ResultExtractor(configuration.objectFactory);
    this.runner = createQueryLoggingRunner(runner, this.accessor, configuration.queryLogger);
  }

  isClosed(): boolean {
    return this.closed;
  }

  isOpen(): boolean {
    return !this.closed;
  }

  getTransaction(): Transaction {
    this.ensureOpen();
    return this.transaction;
  }

  /**
   * Returns the rows of `statement` for `parameter`, from the local cache when
   * the same fingerprint was fetched before in this session.
   *
   * @throws ExecutorError when the fingerprint is still being fetched by an
   * enclosing query; check `isCached` and use `deferLoad` instead
   */
  async query(
    statement: MappedStatement,
    parameter: unknown,
    bounds: RowBounds = RowBounds.DEFAULT,
    options: QueryOptions = {}
  ): Promise<unknown[]> {
    this.ensureOpen();
    const boundSql = options.boundSql ?? getBoundSql(statement, parameter);
    const key = options.key ?? this.createCacheKey(statement, parameter, bounds, boundSql);

    if (this.queryStack === 0 && statement.flushCacheRequired) {
      this.clearLocalCache();
    }

    let list: unknown[];
    this.queryStack++;
    try {
      if (options.resultHandler) {
        list = await this.runner.query({
          statement,
          parameter,
          boundSql,
          bounds,
          resultHandler: options.resultHandler,
          ...this.statementSettings(statement),
        });
      } else {
        list = await this.queryWithLocalCache(statement, parameter, bounds, key, boundSql);
      }
    } catch (error) {
      if (this.queryStack === 1) {
        this.deferredLoads.clear();
        this.clearStatementScopedCache();
      }
      throw error;
    } finally {
      this.queryStack--;
    }

    if (this.queryStack === 0) {
      try {
        this.deferredLoads.drainAll();
      } finally {
        this.clearStatementScopedCache();
      }
    }
    return list;
  }

  /**
   * Opens a cursor over the rows of `statement`. Cursors never read or fill
   * the local cache.
   */
  async queryCursor(
    statement: MappedStatement,
    parameter: unknown,
    bounds: RowBounds = RowBounds.DEFAULT
  ): Promise<Cursor<unknown>> {
    this.ensureOpen();
    const boundSql = getBoundSql(statement, parameter);
    return this.runner.queryCursor({ statement, parameter, boundSql, bounds, ...this.statementSettings(statement) });
  }

  async update(statement: MappedStatement, parameter: unknown): Promise<number> {
    this.ensureOpen();
    this.clearLocalCache();
    const boundSql = getBoundSql(statement, parameter);
    return this.runner.update({ statement, parameter, boundSql, ...this.statementSettings(statement) });
  }

  async flushStatements(isRollback = false): Promise<void> {
    this.ensureOpen();
    await this.runner.flushStatements?.(isRollback);
  }

  async commit(required: boolean): Promise<void> {
    if (this.closed) {
      throw new ExecutorClosedError('Cannot commit, transaction is already closed');
    }
    this.clearLocalCache();
    await this.flushStatements();
    if (required) {
      await this.transaction.commit();
    }
  }

  async rollback(required: boolean): Promise<void> {
    if (this.closed) {
      return;
    }
    try {
      this.clearLocalCache();
      await this.flushStatements(true);
    } finally {
      if (required) {
        await this.transaction.rollback();
      }
    }
  }

  /**
   * Rolls back (when forced) and closes the transaction. Failures are reported
   * to the warning logger, never thrown; the executor is closed either way.
   */
  async close(forceRollback: boolean): Promise<void> {
    if (this.closed) {
      return;
    }
    try {
      try {
        await this.rollback(forceRollback);
      } finally {
        await this.transaction.close();
      }
    } catch (error) {
      this.configuration.warningLogger({
        message: `Unexpected exception on closing transaction. Cause: ${describeCause(error)}`,
        cause: error,
      });
    } finally {
      this.localCache.clear();
      this.deferredLoads.clear();
      this.closed = true;
    }
  }

  /**
   * Sets `property` of `target` from the rows cached under `key`: right away
   * when they are there, otherwise once the outermost query returns.
   */
  deferLoad(statement: MappedStatement, target: object, property: string, key: CacheKey, targetType: TypeRef): void {
    this.ensureOpen();
    const load = new DeferredLoad(
      { statementId: statement.id, target, property, key, targetType },
      this.localCache,
      this.accessor,
      this.resultExtractor
    );
    if (load.canLoad()) {
      load.load();
    } else {
      this.deferredLoads.enqueue(load);
    }
  }

  /**
   * True when rows for `key` are cached or being fetched.
   */
  isCached(statement: MappedStatement, key: CacheKey): boolean {
    this.ensureOpen();
    return this.localCache.get(key) !== undefined;
  }

  createCacheKey(statement: MappedStatement, parameter: unknown, bounds: RowBounds, boundSql: BoundSql): CacheKey {
    this.ensureOpen();
    const key = new CacheKey();
    key.append(statement.id);
    key.append(bounds.offset);
    key.append(bounds.limit);
    key.append(boundSql.sql);
    for (const mapping of boundSql.parameterMappings) {
      if (mapping.mode !== 'OUT') {
        key.append(resolveParameterValue(boundSql, mapping, this.accessor));
      }
    }
    if (this.configuration.environment) {
      key.append(this.configuration.environment.id);
    }
    return key;
  }

  clearLocalCache(): void {
    if (!this.closed) {
      this.localCache.clear();
    }
  }

  private async queryWithLocalCache(
    statement: MappedStatement,
    parameter: unknown,
    bounds: RowBounds,
    key: CacheKey,
    boundSql: BoundSql
  ): Promise<unknown[]> {
    const cached = this.localCache.get(key);
    if (isPending(cached)) {
      throw new ExecutorError(
        `Rows of statement '${statement.id}' are already being fetched by an enclosing query; defer the load instead`,
        { details: { statementId: statement.id, key: key.toString(), ...resourceDetails(statement) } }
      );
    }
    if (isMaterialized(cached)) {
      this.handleLocallyCachedOutputParameters(statement, key, parameter, boundSql);
      this.configuration.queryLogger?.(createLogEntry(statement.id, boundSql, this.accessor, 'local-cache'));
      return [...cached.rows];
    }
    return this.queryFromDatabase(statement, parameter, bounds, key, boundSql);
  }

  private async queryFromDatabase(
    statement: MappedStatement,
    parameter: unknown,
    bounds: RowBounds,
    key: CacheKey,
    boundSql: BoundSql
  ): Promise<unknown[]> {
    this.localCache.put(key, PENDING);
    let list: unknown[];
    try {
      list = await this.runner.query({ statement, parameter, boundSql, bounds, ...this.statementSettings(statement) });
    } finally {
      this.localCache.remove(key);
    }
    this.localCache.put(key, materialized([...list]));
    if (statement.statementType === 'CALLABLE') {
      this.localCache.putOutputParameters(key, parameter);
    }
    return list;
  }

  private handleLocallyCachedOutputParameters(
    statement: MappedStatement,
    key: CacheKey,
    parameter: unknown,
    boundSql: BoundSql
  ): void {
    if (statement.statementType !== 'CALLABLE') {
      return;
    }
    const cachedParameter = this.localCache.getOutputParameters(key);
    if (cachedParameter === null || cachedParameter === undefined || parameter === null || parameter === undefined) {
      return;
    }
    for (const mapping of boundSql.parameterMappings) {
      if (mapping.mode !== 'IN') {
        const value = this.accessor.getValue(cachedParameter, mapping.property);
        this.accessor.setValue(parameter, mapping.property, value);
      }
    }
  }

  /**
   * The statement's timeout (or the default), capped by the transaction's.
   */
  private statementSettings(statement: MappedStatement): StatementSettings {
    let timeout = statement.timeout ?? this.configuration.defaultStatementTimeout;
    const transactionTimeout = this.transaction.getTimeout?.();
    if (transactionTimeout !== undefined && (timeout === undefined || transactionTimeout < timeout)) {
      timeout = transactionTimeout;
    }
    return { timeout, fetchSize: statement.fetchSize ?? this.configuration.defaultFetchSize };
  }

  private clearStatementScopedCache(): void {
    if (this.configuration.localCacheScope === 'STATEMENT') {
      this.clearLocalCache();
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ExecutorClosedError();
    }
  }
}

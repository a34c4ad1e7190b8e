import type { CacheKey } from '../cache/cache-key.js';
import { isMaterialized, type LocalResultCache } from '../cache/local-result-cache.js';
import { ExecutorError } from '../core/errors.js';
import type { ObjectAccessor } from '../reflection/object-accessor.js';
import { typeName, type TypeRef } from '../reflection/types.js';
import type { ResultExtractor } from './result-extractor.js';

export interface DeferredLoadOptions {
  /** Statement whose rows are awaited */
  statementId: string;
  target: object;
  property: string;
  key: CacheKey;
  targetType: TypeRef;
}

/**
 * Assignment of cached rows to a property, waiting for the rows of its key to
 * be fetched.
 */
export class DeferredLoad {
  readonly statementId: string;
  readonly target: object;
  readonly property: string;
  readonly key: CacheKey;
  readonly targetType: TypeRef;

  constructor(
    options: DeferredLoadOptions,
    private readonly localCache: LocalResultCache,
    private readonly accessor: ObjectAccessor,
    private readonly resultExtractor: ResultExtractor
  ) {
    this.statementId = options.statementId;
    this.target = options.target;
    this.property = options.property;
    this.key = options.key;
    this.targetType = options.targetType;
  }

  canLoad(): boolean {
    return isMaterialized(this.localCache.get(this.key));
  }

  /**
   * @throws ExecutorError when the rows of the key are absent or still pending
   */
  load(): void {
    const entry = this.localCache.get(this.key);
    if (!isMaterialized(entry)) {
      throw new ExecutorError(
        `Cannot resolve deferred load of '${this.property}': rows for key ${this.key.toString()} are ${entry === undefined ? 'not cached' : 'still being fetched'}`,
        {
          details: {
            statementId: this.statementId,
            property: this.property,
            key: this.key.toString(),
            targetType: typeName(this.targetType),
          },
        }
      );
    }
    const value = this.resultExtractor.extractObjectFromList(entry.rows, this.targetType);
    this.accessor.setValue(this.target, this.property, value);
  }
}

/**
 * FIFO queue of deferred loads, drained when the outermost query returns.
 */
export class DeferredLoadQueue {
  private readonly loads: DeferredLoad[] = [];

  enqueue(load: DeferredLoad): void {
    this.loads.push(load);
  }

  /**
   * Resolves every queued load in insertion order, including loads queued
   * while draining. The queue is empty afterwards, also when a load fails.
   */
  drainAll(): void {
    try {
      for (let load = this.loads.shift(); load; load = this.loads.shift()) {
        load.load();
      }
    } finally {
      this.loads.length = 0;
    }
  }

  isEmpty(): boolean {
    return this.loads.length === 0;
  }

  get size(): number {
    return this.loads.length;
  }

  clear(): void {
    this.loads.length = 0;
  }
}

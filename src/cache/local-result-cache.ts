import type { CacheKey } from './cache-key.js';

/**
 * Marker stored while the rows of a key are being fetched. Compared by identity.
 */
export const PENDING: Readonly<{ kind: 'pending' }> = Object.freeze({ kind: 'pending' });

export type PendingResult = typeof PENDING;

export interface MaterializedResult {
  readonly kind: 'materialized';
  readonly rows: readonly unknown[];
}

/**
 * A cache entry is either the pending marker or the fetched rows (possibly
 * empty); an absent key has no entry at all.
 */
export type CachedResult = PendingResult | MaterializedResult;

export const materialized = (rows: readonly unknown[]): MaterializedResult => ({ kind: 'materialized', rows });

export const isPending = (entry: CachedResult | undefined): entry is PendingResult => entry === PENDING;

export const isMaterialized = (entry: CachedResult | undefined): entry is MaterializedResult =>
  entry !== undefined && entry !== PENDING && entry.kind === 'materialized';

/**
 * Map keyed by value-equal CacheKeys: buckets by hash, resolves with `equals`.
 */
class CacheKeyMap<V> {
  private readonly buckets = new Map<number, Array<{ key: CacheKey; value: V }>>();
  private count = 0;

  get size(): number {
    return this.count;
  }

  get(key: CacheKey): V | undefined {
    return this.buckets.get(key.hashCode())?.find(entry => entry.key.equals(key))?.value;
  }

  set(key: CacheKey, value: V): void {
    const hash = key.hashCode();
    const bucket = this.buckets.get(hash) ?? [];
    const existing = bucket.find(entry => entry.key.equals(key));
    if (existing) {
      existing.value = value;
      return;
    }
    bucket.push({ key, value });
    this.buckets.set(hash, bucket);
    this.count++;
  }

  delete(key: CacheKey): boolean {
    const hash = key.hashCode();
    const bucket = this.buckets.get(hash);
    const index = bucket?.findIndex(entry => entry.key.equals(key)) ?? -1;
    if (!bucket || index < 0) {
      return false;
    }
    bucket.splice(index, 1);
    if (bucket.length === 0) {
      this.buckets.delete(hash);
    }
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *keys(): IterableIterator<CacheKey> {
    for (const bucket of this.buckets.values()) {
      for (const entry of bucket) {
        yield entry.key;
      }
    }
  }
}

/**
 * Session-local result cache. It stores whatever the executor puts in it; the
 * placeholder discipline belongs to the caller.
 */
export class LocalResultCache {
  private readonly results = new CacheKeyMap<CachedResult>();
  private readonly outputParameters = new CacheKeyMap<unknown>();

  get size(): number {
    return this.results.size;
  }

  get(key: CacheKey): CachedResult | undefined {
    return this.results.get(key);
  }

  put(key: CacheKey, value: CachedResult): void {
    this.results.set(key, value);
  }

  remove(key: CacheKey): boolean {
    return this.results.delete(key);
  }

  keys(): CacheKey[] {
    return [...this.results.keys()];
  }

  /**
   * Parameter object captured after a callable statement ran, so a cache hit
   * can restore its output values.
   */
  getOutputParameters(key: CacheKey): unknown {
    return this.outputParameters.get(key);
  }

  putOutputParameters(key: CacheKey, parameter: unknown): void {
    this.outputParameters.set(key, parameter);
  }

  clear(): void {
    this.results.clear();
    this.outputParameters.clear();
  }
}

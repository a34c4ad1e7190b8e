import { ExecutorError } from '../core/errors.js';

const DEFAULT_MULTIPLIER = 37;
const DEFAULT_HASHCODE = 17;
const NULL_HASHCODE = 1;

const identityHashes = new WeakMap<object, number>();
let nextIdentityHash = 1;

const identityHash = (value: object): number => {
  let hash = identityHashes.get(value);
  if (hash === undefined) {
    hash = nextIdentityHash++;
    identityHashes.set(value, hash);
  }
  return hash;
};

const symbolHashes = new Map<symbol, number>();

const symbolHash = (value: symbol): number => {
  let hash = symbolHashes.get(value);
  if (hash === undefined) {
    hash = nextIdentityHash++;
    symbolHashes.set(value, hash);
  }
  return hash;
};

const hashString = (value: string): number => {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
};

const hashNumber = (value: number): number =>
  Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff ? value | 0 : hashString(String(value));

/**
 * Hash of one key component. Scalars hash by value, arrays element-wise, dates
 * by instant, any other object by identity.
 */
const hashComponent = (value: unknown): number => {
  if (value === null || value === undefined) {
    return NULL_HASHCODE;
  }
  if (value instanceof CacheKey) {
    return value.hashCode();
  }
  switch (typeof value) {
    case 'string':
      return hashString(value);
    case 'number':
      return hashNumber(value);
    case 'boolean':
      return value ? 1231 : 1237;
    case 'bigint':
      return hashString(value.toString());
    case 'object': {
      if (value instanceof Date) {
        return hashNumber(value.getTime());
      }
      if (Array.isArray(value)) {
        let hash = 1;
        for (const item of value) {
          hash = (Math.imul(31, hash) + hashComponent(item)) | 0;
        }
        return hash;
      }
      return identityHash(value);
    }
    case 'function':
      return identityHash(value);
    case 'symbol':
      return symbolHash(value);
    default:
      return NULL_HASHCODE;
  }
};

const componentEquals = (a: unknown, b: unknown): boolean => {
  if (a === b || Object.is(a, b)) {
    return true;
  }
  if (a instanceof CacheKey && b instanceof CacheKey) {
    return a.equals(b);
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => componentEquals(item, b[index]));
  }
  return false;
};

const renderComponent = (value: unknown): string => {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `[${value.map(renderComponent).join(',')}]`;
  return String(value);
};

/**
 * Append-only composite fingerprint with value equality.
 *
 * Two keys are equal when the same values were appended in the same order.
 * The hash is updated incrementally (`hash = 37 * hash + componentHash * count`)
 * so it always agrees with `equals`.
 */
export class CacheKey {
  static readonly NULL: CacheKey = new (class NullCacheKey extends CacheKey {
    override append(): this {
      throw new ExecutorError('Not allowed to update a null cache key instance.');
    }
  })();

  private readonly multiplier = DEFAULT_MULTIPLIER;
  private hashcode = DEFAULT_HASHCODE;
  private checksum = 0;
  private count = 0;
  private readonly updateList: unknown[] = [];

  constructor(values: readonly unknown[] = []) {
    this.appendAll(values);
  }

  /**
   * Appends one component. `undefined` is recorded as `null`.
   */
  append(value: unknown): this {
    const component = value === undefined ? null : value;
    let baseHashCode = hashComponent(component);

    this.count++;
    this.checksum = (this.checksum + baseHashCode) | 0;
    baseHashCode = Math.imul(baseHashCode, this.count);
    this.hashcode = (Math.imul(this.multiplier, this.hashcode) + baseHashCode) | 0;

    this.updateList.push(component);
    return this;
  }

  appendAll(values: readonly unknown[]): this {
    for (const value of values) {
      this.append(value);
    }
    return this;
  }

  getUpdateCount(): number {
    return this.count;
  }

  hashCode(): number {
    return this.hashcode;
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof CacheKey)) {
      return false;
    }
    if (this.hashcode !== other.hashcode || this.checksum !== other.checksum || this.count !== other.count) {
      return false;
    }
    return this.updateList.every((value, index) => componentEquals(value, other.updateList[index]));
  }

  clone(): CacheKey {
    return new CacheKey(this.updateList);
  }

  toString(): string {
    return [String(this.hashcode), String(this.checksum), ...this.updateList.map(renderComponent)].join(':');
  }
}

/**
 * Runtime type tokens used to declare accessor types and to order them by
 * assignability when several accessors compete for one property.
 */

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = object> = new (...args: any[]) => T;

/**
 * A named value type with an optional supertype. Built-in tokens form a small
 * lattice rooted at `Types.any`.
 */
export class ValueType {
  constructor(
    readonly name: string,
    readonly supertype?: ValueType,
    readonly collection = false
  ) {}

  toString(): string {
    return this.name;
  }
}

const anyType = new ValueType('any');
const numberType = new ValueType('number', anyType);
const listType = new ValueType('list', anyType, true);

export const Types = {
  any: anyType,
  number: numberType,
  integer: new ValueType('integer', numberType),
  bigint: new ValueType('bigint', anyType),
  string: new ValueType('string', anyType),
  boolean: new ValueType('boolean', anyType),
  date: new ValueType('date', anyType),
  list: listType,
  set: new ValueType('set', listType, true),
  map: new ValueType('map', anyType),
} as const;

/**
 * Either a value type token or a class. Native constructors (`Number`,
 * `String`, `Array`, ...) are accepted and mapped onto their token.
 */
export type TypeRef = ValueType | Constructor<unknown>;

const NATIVE_TOKENS = new Map<unknown, ValueType>([
  [Object, Types.any],
  [Number, Types.number],
  [String, Types.string],
  [Boolean, Types.boolean],
  [BigInt, Types.bigint],
  [Date, Types.date],
  [Array, Types.list],
  [Set, Types.set],
  [Map, Types.map],
]);

export const isConstructor = (value: unknown): value is Constructor<unknown> => typeof value === 'function';

export const normalizeType = (type: TypeRef): TypeRef => NATIVE_TOKENS.get(type) ?? type;

export const typeName = (type: TypeRef): string => {
  const normalized = normalizeType(type);
  return normalized instanceof ValueType ? normalized.name : normalized.name || 'anonymous';
};

export const sameType = (a: TypeRef, b: TypeRef): boolean => normalizeType(a) === normalizeType(b);

/**
 * True when a value of `source` can be used where `target` is declared, i.e.
 * `target` is `source` or one of its supertypes.
 */
export const isAssignableFrom = (target: TypeRef, source: TypeRef): boolean => {
  const t = normalizeType(target);
  const s = normalizeType(source);
  if (t === s || t === Types.any) {
    return true;
  }
  if (t instanceof ValueType) {
    if (!(s instanceof ValueType)) {
      return false;
    }
    for (let current = s.supertype; current; current = current.supertype) {
      if (current === t) {
        return true;
      }
    }
    return false;
  }
  if (s instanceof ValueType) {
    return false;
  }
  return s.prototype instanceof t;
};

export const isCollectionType = (type: TypeRef): boolean => {
  const normalized = normalizeType(type);
  if (normalized instanceof ValueType) {
    return normalized.collection;
  }
  return normalized.prototype instanceof Array || normalized.prototype instanceof Set;
};

/**
 * Best-effort type of a runtime value, used for fields nobody declared.
 */
export const inferType = (value: unknown): TypeRef => {
  switch (typeof value) {
    case 'number':
      return Types.number;
    case 'string':
      return Types.string;
    case 'boolean':
      return Types.boolean;
    case 'bigint':
      return Types.bigint;
    case 'object': {
      if (value === null) return Types.any;
      if (value instanceof Date) return Types.date;
      if (value instanceof Set) return Types.set;
      if (Array.isArray(value)) return Types.list;
      if (value instanceof Map) return Types.map;
      const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
      return isConstructor(ctor) && ctor !== Object ? normalizeType(ctor) : Types.any;
    }
    default:
      return Types.any;
  }
};

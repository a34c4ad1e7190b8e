import {
  ConstructionUnsupportedError,
  MetadataConflictError,
  PropertyNotFoundError,
  ReflectionError
} from '../core/errors.js';
import { GetFieldInvoker, type Invoker, MethodInvoker, SetFieldInvoker } from './invokers.js';
import { isGetter, isSetter, methodToProperty } from './property-namer.js';
import { getDeclaredFields, getMethodSignature } from './signatures.js';
import {
  type Constructor,
  inferType,
  isAssignableFrom,
  isConstructor,
  sameType,
  type TypeRef,
  typeName,
  Types
} from './types.js';

/**
 * An accessor method found on the prototype chain, with its declared types.
 */
interface AccessorMethod {
  name: string;
  declaringType: Constructor<unknown>;
  /** Return type for getters, first parameter type for setters */
  type: TypeRef;
}

interface FieldCandidate {
  name: string;
  type: TypeRef;
  readable: boolean;
  writable: boolean;
  owner?: object;
}

const RESERVED_NAMES = new Set(['constructor', 'prototype', '__proto__', '__v']);
const STATIC_BUILTINS = new Set(['length', 'name', 'prototype', 'caller', 'arguments']);

const isValidPropertyName = (name: string): boolean => !(name.startsWith('$') || RESERVED_NAMES.has(name));

const ownConstructor = (proto: object): Constructor<unknown> | undefined => {
  const ctor: unknown = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;
  return isConstructor(ctor) ? ctor : undefined;
};

/**
 * Prototypes of `type` and its ancestors, most-derived first, without `Object.prototype`.
 */
const prototypeChain = (type: Constructor<unknown>): object[] => {
  const chain: object[] = [];
  let proto: unknown = type.prototype;
  while (typeof proto === 'object' && proto !== null && proto !== Object.prototype) {
    chain.push(proto);
    proto = Object.getPrototypeOf(proto);
  }
  return chain;
};

const constructorChain = (type: Constructor<unknown>): Constructor<unknown>[] => {
  const chain: Constructor<unknown>[] = [];
  let current: unknown = type;
  while (isConstructor(current) && current !== Function.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
};

const signatureKey = (name: string, returns: TypeRef, params: readonly TypeRef[]): string =>
  `${typeName(returns)}#${name}:${params.map(typeName).join(',')}`;

/**
 * Collects getter and setter methods of the prototype chain. A method overridden
 * with the same declared types is kept once (most-derived wins); an override with
 * different declared types is kept as a separate candidate.
 */
const collectAccessorMethods = (type: Constructor<unknown>) => {
  const seen = new Set<string>();
  const getters: Array<{ property: string; method: AccessorMethod }> = [];
  const setters: Array<{ property: string; method: AccessorMethod }> = [];

  for (const proto of prototypeChain(type)) {
    const declaringType = ownConstructor(proto);
    if (!declaringType) continue;

    for (const name of Object.getOwnPropertyNames(proto)) {
      if (name === 'constructor') continue;
      const fn: unknown = Object.getOwnPropertyDescriptor(proto, name)?.value;
      if (typeof fn !== 'function') continue;

      const getter = isGetter(name) && fn.length === 0;
      const setter = isSetter(name) && fn.length === 1;
      if (!getter && !setter) continue;

      const signature = getMethodSignature(declaringType, name);
      const returns = signature?.returns ?? Types.any;
      const params = setter ? [signature?.params?.[0] ?? Types.any] : [];
      const key = signatureKey(name, returns, params);
      if (seen.has(key)) continue;
      seen.add(key);

      const method: AccessorMethod = { name, declaringType, type: setter ? params[0] : returns };
      (setter ? setters : getters).push({ property: methodToProperty(name), method });
    }
  }

  return { getters, setters };
};

const groupByProperty = (entries: Array<{ property: string; method: AccessorMethod }>) => {
  const grouped = new Map<string, AccessorMethod[]>();
  for (const { property, method } of entries) {
    const list = grouped.get(property) ?? [];
    list.push(method);
    grouped.set(property, list);
  }
  return grouped;
};

const ambiguousGetter = (property: string, first: AccessorMethod): MetadataConflictError =>
  new MetadataConflictError(
    `Illegal overloaded getter method with ambiguous type for property ${property} in class ${first.declaringType.name}. ` +
      'This breaks the accessor naming contract and can cause unpredictable results.',
    { details: { property, type: first.declaringType.name } }
  );

/**
 * Readable and writable properties of one type, resolved once from its accessor
 * methods and fields.
 */
export class PropertyMetadata {
  readonly type: Constructor<unknown>;

  private readonly getInvokers = new Map<string, Invoker>();
  private readonly setInvokers = new Map<string, Invoker>();
  private readonly getTypes = new Map<string, TypeRef>();
  private readonly setTypes = new Map<string, TypeRef>();
  private readonly caseInsensitivePropertyMap = new Map<string, string>();
  private readonly defaultConstructor?: () => unknown;
  private readonly readablePropertyNames: readonly string[];
  private readonly writablePropertyNames: readonly string[];

  constructor(type: Constructor<unknown>) {
    this.type = type;
    if (type.length === 0) {
      this.defaultConstructor = () => new type();
    }

    const { getters, setters } = collectAccessorMethods(type);
    this.resolveGetterConflicts(groupByProperty(getters));
    this.resolveSetterConflicts(groupByProperty(setters));
    this.addFields(this.collectFields());

    this.readablePropertyNames = Object.freeze([...this.getInvokers.keys()]);
    this.writablePropertyNames = Object.freeze([...this.setInvokers.keys()]);
    for (const name of [...this.readablePropertyNames, ...this.writablePropertyNames]) {
      this.caseInsensitivePropertyMap.set(name.toUpperCase(), name);
    }
  }

  get typeName(): string {
    return this.type.name || 'anonymous';
  }

  hasDefaultConstructor(): boolean {
    return this.defaultConstructor !== undefined;
  }

  getDefaultConstructor(): () => unknown {
    if (!this.defaultConstructor) {
      throw new ConstructionUnsupportedError(this.typeName);
    }
    return this.defaultConstructor;
  }

  getGetInvoker(propertyName: string): Invoker {
    const invoker = this.getInvokers.get(propertyName);
    if (!invoker) {
      throw new PropertyNotFoundError('getter', propertyName, this.typeName);
    }
    return invoker;
  }

  getSetInvoker(propertyName: string): Invoker {
    const invoker = this.setInvokers.get(propertyName);
    if (!invoker) {
      throw new PropertyNotFoundError('setter', propertyName, this.typeName);
    }
    return invoker;
  }

  getGetterType(propertyName: string): TypeRef {
    const type = this.getTypes.get(propertyName);
    if (!type) {
      throw new PropertyNotFoundError('getter', propertyName, this.typeName);
    }
    return type;
  }

  getSetterType(propertyName: string): TypeRef {
    const type = this.setTypes.get(propertyName);
    if (!type) {
      throw new PropertyNotFoundError('setter', propertyName, this.typeName);
    }
    return type;
  }

  getReadablePropertyNames(): readonly string[] {
    return this.readablePropertyNames;
  }

  getWritablePropertyNames(): readonly string[] {
    return this.writablePropertyNames;
  }

  hasGetter(propertyName: string): boolean {
    return this.getInvokers.has(propertyName);
  }

  hasSetter(propertyName: string): boolean {
    return this.setInvokers.has(propertyName);
  }

  /**
   * Canonical name of a property given any case variant of it.
   */
  findPropertyName(name: string): string | undefined {
    return this.caseInsensitivePropertyMap.get(name.toUpperCase());
  }

  private resolveGetterConflicts(conflicting: Map<string, AccessorMethod[]>): void {
    for (const [property, candidates] of conflicting) {
      const [first, ...rest] = candidates;
      let winner = first;
      for (const candidate of rest) {
        if (sameType(candidate.type, winner.type)) {
          throw ambiguousGetter(property, first);
        }
        if (isAssignableFrom(candidate.type, winner.type)) {
          // current winner is the narrower type
          continue;
        }
        if (isAssignableFrom(winner.type, candidate.type)) {
          winner = candidate;
          continue;
        }
        throw ambiguousGetter(property, first);
      }
      this.addGetMethod(property, winner);
    }
  }

  private resolveSetterConflicts(conflicting: Map<string, AccessorMethod[]>): void {
    for (const [property, candidates] of conflicting) {
      const getterType = this.getTypes.get(property);
      let match: AccessorMethod | undefined;
      let ambiguity: [AccessorMethod, AccessorMethod] | undefined;

      for (const setter of candidates) {
        if (getterType && sameType(setter.type, getterType)) {
          match = setter;
          break;
        }
        if (ambiguity) continue;
        if (!match) {
          match = setter;
        } else if (isAssignableFrom(match.type, setter.type)) {
          match = setter;
        } else if (!isAssignableFrom(setter.type, match.type)) {
          // an exact match on the getter type may still come
          ambiguity = [match, setter];
          match = undefined;
        }
      }

      if (!match) {
        const [a, b] = ambiguity ?? candidates;
        throw new MetadataConflictError(
          `Ambiguous setters defined for property '${property}' in class '${b.declaringType.name}' ` +
            `with types '${typeName(a.type)}' and '${typeName(b.type)}'.`,
          { details: { property, type: b.declaringType.name } }
        );
      }
      this.addSetMethod(property, match);
    }
  }

  private addGetMethod(property: string, method: AccessorMethod): void {
    if (isValidPropertyName(property)) {
      this.getInvokers.set(property, new MethodInvoker(method.name, method.type));
      this.getTypes.set(property, method.type);
    }
  }

  private addSetMethod(property: string, method: AccessorMethod): void {
    if (isValidPropertyName(property)) {
      this.setInvokers.set(property, new MethodInvoker(method.name, method.type));
      this.setTypes.set(property, method.type);
    }
  }

  private collectFields(): FieldCandidate[] {
    const fields: FieldCandidate[] = [];
    const seen = new Set<string>();
    const push = (field: FieldCandidate) => {
      if (seen.has(field.name)) return;
      seen.add(field.name);
      fields.push(field);
    };

    const ancestry = constructorChain(this.type);
    const declaredType = (name: string): TypeRef | undefined => {
      for (const ctor of ancestry) {
        const declared = getDeclaredFields(ctor).get(name);
        if (declared) return declared;
      }
      return undefined;
    };

    if (this.defaultConstructor) {
      const probe = this.instantiateProbe(this.defaultConstructor);
      if (typeof probe === 'object' && probe !== null) {
        for (const name of Object.keys(probe)) {
          push({ name, type: declaredType(name) ?? inferType(Reflect.get(probe, name)), readable: true, writable: true });
        }
      }
    }

    for (const ctor of ancestry) {
      for (const [name, type] of getDeclaredFields(ctor)) {
        push({ name, type, readable: true, writable: true });
      }
    }

    for (const proto of prototypeChain(this.type)) {
      const declaringType = ownConstructor(proto);
      for (const name of Object.getOwnPropertyNames(proto)) {
        const descriptor = Object.getOwnPropertyDescriptor(proto, name);
        if (!descriptor || (!descriptor.get && !descriptor.set)) continue;
        const signature = declaringType ? getMethodSignature(declaringType, name) : undefined;
        push({
          name,
          type: signature?.returns ?? signature?.params?.[0] ?? Types.any,
          readable: descriptor.get !== undefined,
          writable: descriptor.set !== undefined,
        });
      }
    }

    for (const ctor of ancestry) {
      for (const name of Object.getOwnPropertyNames(ctor)) {
        if (STATIC_BUILTINS.has(name)) continue;
        const descriptor = Object.getOwnPropertyDescriptor(ctor, name);
        if (!descriptor || typeof descriptor.value === 'function') continue;
        const immutable = descriptor.writable === false || (descriptor.get !== undefined && descriptor.set === undefined);
        push({
          name,
          type: inferType(Reflect.get(ctor, name)),
          readable: true,
          // shared and immutable: get-only
          writable: !immutable,
          owner: ctor,
        });
      }
    }

    return fields;
  }

  private instantiateProbe(create: () => unknown): unknown {
    try {
      return create();
    } catch (error) {
      throw new ReflectionError(`Could not instantiate ${this.typeName} to discover its fields`, {
        details: { type: this.typeName },
        cause: error,
      });
    }
  }

  private addFields(fields: FieldCandidate[]): void {
    for (const field of fields) {
      if (!isValidPropertyName(field.name)) continue;
      if (field.writable && !this.setInvokers.has(field.name)) {
        this.setInvokers.set(field.name, new SetFieldInvoker(field.name, field.type, field.owner));
        this.setTypes.set(field.name, field.type);
      }
      if (field.readable && !this.getInvokers.has(field.name)) {
        this.getInvokers.set(field.name, new GetFieldInvoker(field.name, field.type, field.owner));
        this.getTypes.set(field.name, field.type);
      }
    }
  }
}

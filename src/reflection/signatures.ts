import type { Constructor, TypeRef } from './types.js';

/**
 * Declared types of one accessor method. JavaScript keeps no type information at
 * run time, so getters and setters that need more than `Types.any` declare it here.
 */
export interface MethodSignature {
  returns?: TypeRef;
  params?: readonly TypeRef[];
}

export interface AccessorDescription {
  /** Keyed by method (or `get`/`set` accessor) name */
  methods?: Record<string, MethodSignature>;
  /** Declared fields and their types; fields also come from a probe instance */
  fields?: Record<string, TypeRef>;
}

interface DescribedType {
  methods: Map<string, MethodSignature>;
  fields: Map<string, TypeRef>;
}

const descriptions = new Map<Constructor<unknown>, DescribedType>();

const ensureDescribed = (target: Constructor<unknown>): DescribedType => {
  let described = descriptions.get(target);
  if (!described) {
    described = { methods: new Map(), fields: new Map() };
    descriptions.set(target, described);
  }
  return described;
};

/**
 * Registers accessor types for the class that declares them. Descriptions apply
 * to that class only; subclasses describe their own overrides.
 * Call before the type is first looked up in a `MetadataRegistry`.
 */
export const describeAccessors = (target: Constructor<unknown>, description: AccessorDescription): void => {
  const described = ensureDescribed(target);
  for (const [name, signature] of Object.entries(description.methods ?? {})) {
    const existing = described.methods.get(name);
    described.methods.set(name, { ...existing, ...signature });
  }
  for (const [name, type] of Object.entries(description.fields ?? {})) {
    described.fields.set(name, type);
  }
};

export const getMethodSignature = (target: Constructor<unknown>, name: string): MethodSignature | undefined =>
  descriptions.get(target)?.methods.get(name);

export const getDeclaredFields = (target: Constructor<unknown>): ReadonlyMap<string, TypeRef> =>
  descriptions.get(target)?.fields ?? new Map<string, TypeRef>();

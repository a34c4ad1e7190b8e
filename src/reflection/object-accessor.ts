import { ReflectionError } from '../core/errors.js';
import type { MetadataRegistry } from './metadata-registry.js';
import type { PropertyMetadata } from './property-metadata.js';
import { isConstructor } from './types.js';

type Bag = Record<string, unknown>;

const isPlainObject = (value: object): value is Bag => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Reads and writes properties of arbitrary value objects by (dotted) path.
 * Maps and plain records are accessed by key; class instances go through
 * their `PropertyMetadata`.
 */
export class ObjectAccessor {
  constructor(private readonly registry: MetadataRegistry) {}

  getValue(target: unknown, path: string): unknown {
    let current: unknown = target;
    for (const segment of path.split('.')) {
      if (current === null || current === undefined) {
        return null;
      }
      current = this.getProperty(current, segment);
    }
    return current;
  }

  setValue(target: unknown, path: string, value: unknown): void {
    const segments = path.split('.');
    const last = segments.pop() ?? path;
    let current: unknown = target;
    for (const segment of segments) {
      current = current === null || current === undefined ? current : this.getProperty(current, segment);
      if (current === null || current === undefined) {
        throw new ReflectionError(`Cannot set '${path}' because '${segment}' is null`, { details: { path } });
      }
    }
    if (typeof current !== 'object' || current === null) {
      throw new ReflectionError(`Cannot set '${path}' on a ${current === null ? 'null' : typeof current} value`, {
        details: { path },
      });
    }
    this.setProperty(current, last, value);
  }

  hasGetter(target: object, name: string): boolean {
    if (target instanceof Map || isPlainObject(target)) return true;
    return this.metadataOf(target)?.hasGetter(name) ?? false;
  }

  hasSetter(target: object, name: string): boolean {
    if (target instanceof Map || isPlainObject(target)) return true;
    return this.metadataOf(target)?.hasSetter(name) ?? false;
  }

  /**
   * Canonical property name of a class instance for a name in any case.
   */
  findPropertyName(target: object, name: string): string | undefined {
    if (target instanceof Map) return target.has(name) ? name : undefined;
    if (isPlainObject(target)) return Object.prototype.hasOwnProperty.call(target, name) ? name : undefined;
    return this.metadataOf(target)?.findPropertyName(name);
  }

  private getProperty(target: unknown, name: string): unknown {
    if (typeof target !== 'object' || target === null) {
      throw new ReflectionError(`Cannot read '${name}' of a ${typeof target} value`, { details: { property: name } });
    }
    if (target instanceof Map) {
      return target.get(name);
    }
    if (isPlainObject(target)) {
      return target[name];
    }
    return this.requireMetadata(target).getGetInvoker(name).invoke(target, []);
  }

  private setProperty(target: object, name: string, value: unknown): void {
    if (target instanceof Map) {
      target.set(name, value);
      return;
    }
    if (isPlainObject(target)) {
      target[name] = value;
      return;
    }
    this.requireMetadata(target).getSetInvoker(name).invoke(target, [value]);
  }

  private metadataOf(target: object): PropertyMetadata | undefined {
    const ctor: unknown = Object.getPrototypeOf(target)?.constructor;
    return isConstructor(ctor) ? this.registry.findForType(ctor) : undefined;
  }

  private requireMetadata(target: object): PropertyMetadata {
    const metadata = this.metadataOf(target);
    if (!metadata) {
      throw new ReflectionError('Cannot resolve the type of the given object', {});
    }
    return metadata;
  }
}

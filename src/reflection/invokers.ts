import { ReflectionError } from '../core/errors.js';
import type { TypeRef } from './types.js';

/**
 * Uniform handle on a property accessor, chosen once when metadata is built.
 */
export interface Invoker {
  readonly kind: 'method' | 'field';
  /** Getter return type, or setter parameter type */
  readonly type: TypeRef;
  invoke(target: object, args: readonly unknown[]): unknown;
}

/**
 * Calls an accessor method by name, so subclass overrides dispatch as usual.
 */
export class MethodInvoker implements Invoker {
  readonly kind = 'method';

  constructor(
    readonly methodName: string,
    readonly type: TypeRef
  ) {}

  invoke(target: object, args: readonly unknown[]): unknown {
    const method: unknown = Reflect.get(target, this.methodName);
    if (typeof method !== 'function') {
      throw new ReflectionError(`Method '${this.methodName}' is not callable on the given object`, {
        details: { method: this.methodName },
      });
    }
    return Reflect.apply(method, target, args);
  }
}

/**
 * Reads a field. Static fields are read from their owning constructor.
 */
export class GetFieldInvoker implements Invoker {
  readonly kind = 'field';

  constructor(
    readonly fieldName: string,
    readonly type: TypeRef,
    private readonly owner?: object
  ) {}

  invoke(target: object): unknown {
    return Reflect.get(this.owner ?? target, this.fieldName);
  }
}

export class SetFieldInvoker implements Invoker {
  readonly kind = 'field';

  constructor(
    readonly fieldName: string,
    readonly type: TypeRef,
    private readonly owner?: object
  ) {}

  invoke(target: object, args: readonly unknown[]): undefined {
    const receiver = this.owner ?? target;
    if (!Reflect.set(receiver, this.fieldName, args[0])) {
      throw new ReflectionError(`Field '${this.fieldName}' is not writable`, {
        details: { field: this.fieldName },
      });
    }
    return undefined;
  }
}

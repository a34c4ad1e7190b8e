import { describeAccessors, type MethodSignature } from '../reflection/signatures.js';
import type { Constructor, TypeRef } from '../reflection/types.js';
import { getOrCreateMetadataBag, readMetadataBag } from './decorator-metadata.js';

type AccessorMemberContext =
  | ClassMethodDecoratorContext
  | ClassGetterDecoratorContext
  | ClassSetterDecoratorContext;

const addMethodSignature = (context: AccessorMemberContext, signature: MethodSignature): void => {
  if (context.static || typeof context.name !== 'string') {
    return;
  }
  getOrCreateMetadataBag(context.metadata).methods.push({ propertyName: context.name, signature });
};

/**
 * Declares the return type of a getter method (`getX()`, `isX()` or `get x()`).
 */
export function Returns(type: TypeRef) {
  return (_value: unknown, context: AccessorMemberContext): void => {
    addMethodSignature(context, { returns: type });
  };
}

/**
 * Declares the parameter types of a setter method (`setX(value)` or `set x(value)`).
 */
export function Accepts(...params: TypeRef[]) {
  return (_value: unknown, context: AccessorMemberContext): void => {
    addMethodSignature(context, { params });
  };
}

/**
 * Declares the type of an instance field.
 */
export function FieldType(type: TypeRef) {
  return (_value: undefined, context: ClassFieldDecoratorContext): void => {
    if (context.static || typeof context.name !== 'string') {
      return;
    }
    getOrCreateMetadataBag(context.metadata).fields.push({ propertyName: context.name, type });
  };
}

/**
 * Class decorator that registers the declarations collected by `@Returns`,
 * `@Accepts` and `@FieldType` on the decorated class.
 */
export function Described() {
  return <TCtor extends Constructor<unknown>>(value: TCtor, context: ClassDecoratorContext<TCtor>): TCtor => {
    const bag = readMetadataBag(context.metadata);
    if (!bag) {
      return value;
    }
    const methods: Record<string, MethodSignature> = {};
    for (const entry of bag.methods) {
      methods[entry.propertyName] = { ...methods[entry.propertyName], ...entry.signature };
    }
    const fields: Record<string, TypeRef> = {};
    for (const entry of bag.fields) {
      fields[entry.propertyName] = entry.type;
    }
    describeAccessors(value, { methods, fields });
    return value;
  };
}

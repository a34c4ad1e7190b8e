import { ReflectionError } from '../core/errors.js';
import type { MethodSignature } from '../reflection/signatures.js';
import type { TypeRef } from '../reflection/types.js';

/**
 * Bag for storing accessor declarations while member decorators run. The class
 * decorator drains it into the signature registry.
 */
export interface DecoratorMetadataBag {
  methods: Array<{ propertyName: string; signature: MethodSignature }>;
  fields: Array<{ propertyName: string; type: TypeRef }>;
}

const METADATA_KEY = 'quarry:accessors';

// Compiled decorators only pass `context.metadata` when Symbol.metadata exists.
if (!Reflect.has(Symbol, 'metadata')) {
  Reflect.set(Symbol, 'metadata', Symbol.for('Symbol.metadata'));
}

const isMetadataBag = (value: unknown): value is DecoratorMetadataBag =>
  typeof value === 'object' &&
  value !== null &&
  Array.isArray(Reflect.get(value, 'methods')) &&
  Array.isArray(Reflect.get(value, 'fields'));

/**
 * Gets or creates the bag of the class being decorated. Subclass metadata
 * objects inherit from their parent's, so only an own bag counts.
 * @param metadata - The `context.metadata` object shared by one class's decorators.
 */
export const getOrCreateMetadataBag = (metadata: DecoratorMetadataObject | undefined): DecoratorMetadataBag => {
  if (!metadata) {
    throw new ReflectionError('Decorator metadata is not available; accessor decorators need standard decorators');
  }
  const existing = readMetadataBag(metadata);
  if (existing) {
    return existing;
  }
  const bag: DecoratorMetadataBag = { methods: [], fields: [] };
  metadata[METADATA_KEY] = bag;
  return bag;
};

export const readMetadataBag = (metadata: DecoratorMetadataObject | undefined): DecoratorMetadataBag | undefined => {
  if (!metadata || !Object.prototype.hasOwnProperty.call(metadata, METADATA_KEY)) {
    return undefined;
  }
  const bag = metadata[METADATA_KEY];
  return isMetadataBag(bag) ? bag : undefined;
};

import { ConstructionUnsupportedError } from '../core/errors.js';
import type { MetadataRegistry } from './metadata-registry.js';
import { type Constructor, isCollectionType, type TypeRef } from './types.js';

/**
 * Creates result containers and value objects.
 */
export interface ObjectFactory {
  create<T>(type: Constructor<T>): T;
  isCollection(type: TypeRef): boolean;
}

export class DefaultObjectFactory implements ObjectFactory {
  constructor(private readonly registry: MetadataRegistry) {}

  /**
   * Instantiates `type` through its default constructor.
   * @throws ConstructionUnsupportedError when the constructor takes arguments
   */
  create<T>(type: Constructor<T>): T {
    if (!this.registry.findForType(type).hasDefaultConstructor()) {
      throw new ConstructionUnsupportedError(type.name || 'anonymous');
    }
    return new type();
  }

  isCollection(type: TypeRef): boolean {
    return isCollectionType(type);
  }
}

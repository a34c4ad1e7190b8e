import type { ObjectFactory } from '../reflection/object-factory.js';
import { normalizeType, type TypeRef, Types, ValueType } from '../reflection/types.js';

/**
 * Shapes a cached row list into the value a property expects: the whole list
 * for collection types, otherwise the first row (or `null` when empty).
 */
export class ResultExtractor {
  constructor(private readonly objectFactory: ObjectFactory) {}

  extractObjectFromList(list: readonly unknown[], targetType: TypeRef): unknown {
    const type = normalizeType(targetType);
    if (!this.objectFactory.isCollection(type)) {
      return list.length === 0 ? null : list[0];
    }
    if (type instanceof ValueType) {
      return type === Types.set ? new Set(list) : [...list];
    }

    const collection = this.objectFactory.create(type);
    if (collection instanceof Set) {
      for (const item of list) collection.add(item);
    } else if (Array.isArray(collection)) {
      collection.push(...list);
    }
    return collection;
  }
}

import { DefaultObjectFactory } from '../../reflection/object-factory.js';
import type { MetadataRegistry } from '../../reflection/metadata-registry.js';
import { normalizeType, type TypeRef, Types, ValueType } from '../../reflection/types.js';

export type StoreRow = Record<string, unknown>;

export type RowMapper = (row: StoreRow) => unknown;

const identity: RowMapper = row => row;

/**
 * Maps a store row onto the statement's result type:
 * - no type, `any` or a collection type: the row record as is
 * - `map`: a `Map` of column to value
 * - any other value type: the first column
 * - a class: a default-constructed instance whose writable properties are
 *   matched to columns case-insensitively, underscores ignored
 */
export const createRowMapper = (registry: MetadataRegistry, resultType?: TypeRef): RowMapper => {
  if (resultType === undefined) {
    return identity;
  }
  const type = normalizeType(resultType);
  if (type instanceof ValueType) {
    if (type === Types.any || type.collection) return identity;
    if (type === Types.map) return row => new Map(Object.entries(row));
    return row => Object.values(row)[0] ?? null;
  }

  const factory = new DefaultObjectFactory(registry);
  const metadata = registry.findForType(type);
  return row => {
    const instance = factory.create(type);
    if (typeof instance !== 'object' || instance === null) {
      return instance;
    }
    for (const [column, value] of Object.entries(row)) {
      const property = metadata.findPropertyName(column) ?? metadata.findPropertyName(column.replace(/_/g, ''));
      if (property !== undefined && metadata.hasSetter(property)) {
        metadata.getSetInvoker(property).invoke(instance, [value]);
      }
    }
    return instance;
  };
};

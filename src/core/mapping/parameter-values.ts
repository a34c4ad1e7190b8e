import type { ObjectAccessor } from '../../reflection/object-accessor.js';
import type { BoundSql, ParameterMapping } from './mapped-statement.js';

/**
 * Values bound as a whole rather than read property by property.
 */
export const isScalarParameter = (value: unknown): boolean =>
  typeof value === 'string' ||
  typeof value === 'number' ||
  typeof value === 'bigint' ||
  typeof value === 'boolean' ||
  value instanceof Date;

/**
 * Value bound to one placeholder: an additional parameter of that name first,
 * then the parameter object itself when it is a scalar, then the property read
 * from the parameter object.
 */
export const resolveParameterValue = (
  boundSql: BoundSql,
  mapping: ParameterMapping,
  accessor: ObjectAccessor
): unknown => {
  const { property } = mapping;
  if (boundSql.additionalParameters.has(property)) {
    return boundSql.additionalParameters.get(property);
  }
  const parameter = boundSql.parameterObject;
  if (parameter === null || parameter === undefined) {
    return null;
  }
  if (isScalarParameter(parameter)) {
    return parameter;
  }
  return accessor.getValue(parameter, property);
};

/**
 * Bind values of every mapping that sends a value to the store (`IN` and `INOUT`).
 */
export const resolveInputValues = (boundSql: BoundSql, accessor: ObjectAccessor): unknown[] =>
  boundSql.parameterMappings
    .filter(mapping => mapping.mode !== 'OUT')
    .map(mapping => resolveParameterValue(boundSql, mapping, accessor));

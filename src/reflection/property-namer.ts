import { ReflectionError } from '../core/errors.js';

/**
 * Derives the property name of an accessor method: `getName` → `name`,
 * `isActive` → `active`, `getURL` → `URL` (a second capital keeps the case).
 */
export const methodToProperty = (methodName: string): string => {
  let name: string;
  if (methodName.startsWith('is')) {
    name = methodName.slice(2);
  } else if (methodName.startsWith('get') || methodName.startsWith('set')) {
    name = methodName.slice(3);
  } else {
    throw new ReflectionError(
      `Error parsing property name '${methodName}'. Didn't start with 'is', 'get' or 'set'.`,
      { details: { method: methodName } }
    );
  }

  if (name.length === 1 || (name.length > 1 && !isUpperCase(name.charAt(1)))) {
    name = name.charAt(0).toLowerCase() + name.slice(1);
  }
  return name;
};

export const isProperty = (name: string): boolean => isGetter(name) || isSetter(name);

export const isGetter = (name: string): boolean =>
  (name.startsWith('get') && name.length > 3) || (name.startsWith('is') && name.length > 2);

export const isSetter = (name: string): boolean => name.startsWith('set') && name.length > 3;

const isUpperCase = (char: string): boolean => char !== char.toLowerCase() && char === char.toUpperCase();

import { describe, expect, it } from 'vitest';

import { ReflectionError } from '../../src/core/errors.js';
import { isGetter, isProperty, isSetter, methodToProperty } from '../../src/reflection/property-namer.js';

describe('property naming', () => {
  it('should strip accessor prefixes', () => {
    expect(methodToProperty('getName')).toBe('name');
    expect(methodToProperty('setName')).toBe('name');
    expect(methodToProperty('isActive')).toBe('active');
    expect(methodToProperty('getX')).toBe('x');
  });

  it('should keep the case of names starting with two capitals', () => {
    expect(methodToProperty('getURL')).toBe('URL');
    expect(methodToProperty('getUrl')).toBe('url');
    expect(methodToProperty('getXCoordinate')).toBe('XCoordinate');
  });

  it('should reject other prefixes', () => {
    expect(() => methodToProperty('fetchName')).toThrow(ReflectionError);
    expect(() => methodToProperty('fetchName')).toThrow(
      "Error parsing property name 'fetchName'. Didn't start with 'is', 'get' or 'set'."
    );
  });

  it('should classify accessor names', () => {
    expect(isGetter('getName')).toBe(true);
    expect(isGetter('isOpen')).toBe(true);
    expect(isGetter('get')).toBe(false);
    expect(isGetter('is')).toBe(false);
    expect(isSetter('setName')).toBe(true);
    expect(isSetter('set')).toBe(false);
    expect(isProperty('toString')).toBe(false);
  });
});

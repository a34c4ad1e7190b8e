import { describe, expect, it } from 'vitest';

import { ReflectionError } from '../../src/core/errors.js';
import { MetadataRegistry } from '../../src/reflection/metadata-registry.js';
import { ObjectAccessor } from '../../src/reflection/object-accessor.js';

class Address {
  city = 'Lisbon';
}

class Customer {
  private displayName = 'ada';
  address: Address | null = new Address();

  getName(): string {
    return this.displayName;
  }

  setName(name: string): void {
    this.displayName = name.trim();
  }
}

describe('ObjectAccessor', () => {
  const accessor = new ObjectAccessor(new MetadataRegistry());

  it('should read and write class instances through their accessors', () => {
    const customer = new Customer();

    accessor.setValue(customer, 'name', '  grace ');

    expect(accessor.getValue(customer, 'name')).toBe('grace');
  });

  it('should follow dotted paths', () => {
    const customer = new Customer();

    accessor.setValue(customer, 'address.city', 'Porto');

    expect(accessor.getValue(customer, 'address.city')).toBe('Porto');
    expect(accessor.getValue({ order: { customer } }, 'order.customer.address.city')).toBe('Porto');
  });

  it('should read null through a null intermediate', () => {
    const customer = new Customer();
    customer.address = null;

    expect(accessor.getValue(customer, 'address.city')).toBeNull();
  });

  it('should refuse to write through a null intermediate', () => {
    const customer = new Customer();
    customer.address = null;

    expect(() => accessor.setValue(customer, 'address.city', 'Porto')).toThrow(ReflectionError);
    expect(() => accessor.setValue(customer, 'address.city', 'Porto')).toThrow(
      "Cannot set 'address.city' because 'address' is null"
    );
  });

  it('should access maps and plain records by key', () => {
    const settings = new Map<string, unknown>([['theme', 'dark']]);
    const record: Record<string, unknown> = {};

    accessor.setValue(record, 'theme', accessor.getValue(settings, 'theme'));
    accessor.setValue(settings, 'size', 3);

    expect(record).toEqual({ theme: 'dark' });
    expect(settings.get('size')).toBe(3);
  });

  it('should answer capability questions', () => {
    const customer = new Customer();

    expect(accessor.hasGetter(customer, 'name')).toBe(true);
    expect(accessor.hasSetter(customer, 'missing')).toBe(false);
    expect(accessor.findPropertyName(customer, 'NAME')).toBe('name');
    expect(accessor.findPropertyName({ theme: 'dark' }, 'theme')).toBe('theme');
    expect(accessor.findPropertyName(new Map(), 'theme')).toBeUndefined();
  });
});

import { describe, expect, it } from 'vitest';

import { Accepts, Described, FieldType, Returns } from '../../src/decorators/accessors.js';
import { PropertyMetadata } from '../../src/reflection/property-metadata.js';
import { getDeclaredFields, getMethodSignature } from '../../src/reflection/signatures.js';
import { Types } from '../../src/reflection/types.js';

@Described()
class Invoice {
  @FieldType(Types.integer)
  quantity = 1;

  private amount = 0;

  @Returns(Types.number)
  getAmount(): number {
    return this.amount;
  }

  @Accepts(Types.number)
  setAmount(value: number): void {
    this.amount = value;
  }

  @Returns(Types.number)
  get total(): number {
    return this.amount * this.quantity;
  }
}

@Described()
class DiscountedInvoice extends Invoice {
  @Returns(Types.integer)
  getAmount(): number {
    return Math.round(super.getAmount());
  }
}

class Plain {
  @Returns(Types.string)
  getCode(): string {
    return 'x';
  }
}

describe('accessor decorators', () => {
  it('should register declared method and field types', () => {
    expect(getMethodSignature(Invoice, 'getAmount')).toEqual({ returns: Types.number });
    expect(getMethodSignature(Invoice, 'setAmount')).toEqual({ params: [Types.number] });
    expect(getMethodSignature(Invoice, 'total')).toEqual({ returns: Types.number });
    expect(getDeclaredFields(Invoice).get('quantity')).toBe(Types.integer);
  });

  it('should feed the declarations into property metadata', () => {
    const metadata = new PropertyMetadata(Invoice);

    expect(metadata.getGetterType('amount')).toBe(Types.number);
    expect(metadata.getSetterType('amount')).toBe(Types.number);
    expect(metadata.getGetterType('quantity')).toBe(Types.integer);
    expect(metadata.getGetterType('total')).toBe(Types.number);
    expect(metadata.hasSetter('total')).toBe(false);
  });

  it('should keep subclass declarations apart from the parent', () => {
    expect(getMethodSignature(DiscountedInvoice, 'getAmount')).toEqual({ returns: Types.integer });
    expect(getMethodSignature(DiscountedInvoice, 'setAmount')).toBeUndefined();
    expect(new PropertyMetadata(DiscountedInvoice).getGetterType('amount')).toBe(Types.integer);
  });

  it('should register nothing without the class decorator', () => {
    expect(getMethodSignature(Plain, 'getCode')).toBeUndefined();
    expect(new PropertyMetadata(Plain).getGetterType('code')).toBe(Types.any);
  });
});

import { describe, it, expect } from 'vitest';
import { checkType, describeJsonType } from '../../src/core/type-check.js';
import type { PrimitiveType, PropertySpec } from '../../src/types/schema.js';

function typed(type: PrimitiveType): PropertySpec {
  return { kind: 'primitive', type };
}

describe('describeJsonType', () => {
  it('names JSON shapes', () => {
    expect(describeJsonType('a')).toBe('string');
    expect(describeJsonType(true)).toBe('boolean');
    expect(describeJsonType(3)).toBe('integer');
    expect(describeJsonType(3.5)).toBe('number');
    expect(describeJsonType([])).toBe('array');
    expect(describeJsonType({})).toBe('object');
    expect(describeJsonType(null)).toBe('null');
  });
});

describe('checkType', () => {
  it('never flags null', () => {
    for (const type of ['string', 'boolean', 'integer', 'number', 'array', 'object'] as const) {
      expect(checkType(null, typed(type), 'A')).toEqual([]);
    }
  });

  it('skips properties without a declared type', () => {
    expect(checkType(42, { kind: 'reference', ref: 'X' }, 'A')).toEqual([]);
    expect(checkType('x', { kind: 'primitive' }, 'A')).toEqual([]);
  });

  it('accepts matching values', () => {
    expect(checkType('x', typed('string'), 'A')).toEqual([]);
    expect(checkType(false, typed('boolean'), 'A')).toEqual([]);
    expect(checkType(7, typed('integer'), 'A')).toEqual([]);
    expect(checkType(7, typed('number'), 'A')).toEqual([]);
    expect(checkType(7.25, typed('number'), 'A')).toEqual([]);
    expect(checkType([1], typed('array'), 'A')).toEqual([]);
    expect(checkType({ a: 1 }, typed('object'), 'A')).toEqual([]);
  });

  it('flags booleans where integers are expected', () => {
    expect(checkType(true, typed('integer'), 'Item.Count')).toEqual([
      { category: 'TYPE_MISMATCH', path: 'Item.Count', message: 'expected integer, got boolean' },
    ]);
  });

  it('flags booleans where numbers are expected', () => {
    expect(checkType(false, typed('number'), 'Item.Weight')).toEqual([
      { category: 'TYPE_MISMATCH', path: 'Item.Weight', message: 'expected number, got boolean' },
    ]);
  });

  it('flags fractional values where integers are expected', () => {
    expect(checkType(1.5, typed('integer'), 'A')).toEqual([
      { category: 'TYPE_MISMATCH', path: 'A', message: 'expected integer, got number' },
    ]);
  });

  it('names the observed shape', () => {
    expect(checkType(5, typed('string'), 'A')[0].message).toBe('expected string, got integer');
    expect(checkType([], typed('object'), 'A')[0].message).toBe('expected object, got array');
    expect(checkType({}, typed('array'), 'A')[0].message).toBe('expected array, got object');
    expect(checkType('1', typed('integer'), 'A')[0].message).toBe('expected integer, got string');
  });
});

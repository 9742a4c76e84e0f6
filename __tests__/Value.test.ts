import {
  describe,
  expect,
  it
} from 'vitest';

import { ValueOutOfRangeError } from '../src/errors.ts';
import {
  isValue,
  toValue,
  VALUES
} from '../src/Value.ts';

describe('VALUES', () => {
  it('lists the digits 1-9 in order', () => {
    expect(VALUES).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });
});

describe('isValue', () => {
  it('accepts every digit 1-9', () => {
    for (const value of VALUES) {
      expect(isValue(value)).toBe(true);
    }
  });

  it('rejects 0, 10 and fractions', () => {
    expect(isValue(0)).toBe(false);
    expect(isValue(10)).toBe(false);
    expect(isValue(2.5)).toBe(false);
  });
});

describe('toValue', () => {
  it('returns the digit unchanged', () => {
    expect(toValue(7)).toBe(7);
  });

  it('throws ValueOutOfRangeError for 0', () => {
    expect(() => toValue(0)).toThrow(ValueOutOfRangeError);
    expect(() => toValue(0)).toThrow('Value out of range: 0');
  });

  it('includes the location in the message', () => {
    expect(() => toValue(10, 'C2')).toThrow('Value out of range at C2: 10');
  });

  it('exposes the rejected value', () => {
    try {
      toValue(-3);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValueOutOfRangeError);
      expect(error).toHaveProperty('value', -3);
    }
  });
});

import { ValueOutOfRangeError } from './errors.ts';

export type Value = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const MAX_VALUE = 9;

/* eslint-disable no-magic-numbers -- The digit alphabet itself. */
export const VALUES = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const satisfies readonly Value[];
/* eslint-enable no-magic-numbers -- End digit alphabet. */

export function isValue(value: number): value is Value {
  return Number.isInteger(value) && value >= 1 && value <= MAX_VALUE;
}

export function toValue(value: number, location?: string): Value {
  if (!isValue(value)) {
    throw new ValueOutOfRangeError(value, location);
  }
  return value;
}

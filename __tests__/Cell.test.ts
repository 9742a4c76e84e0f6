import {
  describe,
  expect,
  it
} from 'vitest';

import { Cell } from '../src/Cell.ts';
import { VALUES } from '../src/Value.ts';

describe('Cell', () => {
  describe('constructor', () => {
    it('starts with all nine candidates', () => {
      const cell = new Cell();
      for (const value of VALUES) {
        expect(cell.contains(value)).toBe(true);
      }
      expect(cell.candidateCount).toBe(9);
      expect(cell.mask).toBe(0x1ff);
    });

    it('is not final', () => {
      const cell = new Cell();
      expect(cell.isFinal).toBe(false);
      expect(cell.value).toBeNull();
    });
  });

  describe('remove', () => {
    it('eliminates a candidate from an open cell', () => {
      for (const value of VALUES) {
        const cell = new Cell();
        cell.remove(value);
        expect(cell.contains(value)).toBe(false);
        expect(cell.candidateCount).toBe(8);
      }
    });

    it('makes the cell final when one candidate is left', () => {
      const cell = new Cell();
      for (const value of [1, 2, 3, 4, 5, 6, 7, 9] as const) {
        cell.remove(value);
      }
      expect(cell.isFinal).toBe(true);
      expect(cell.value).toBe(8);
    });

    it('does not change a final cell', () => {
      for (const value of VALUES) {
        const cell = Cell.of(value);
        cell.remove(value);
        expect(cell.isFinal).toBe(true);
        expect(cell.value).toBe(value);
      }
    });

    it('never empties the cell', () => {
      const cell = new Cell();
      for (const value of VALUES) {
        cell.remove(value);
      }
      expect(cell.candidateCount).toBe(1);
      expect(cell.value).toBe(9);
    });

    it('ignores a candidate that is already gone', () => {
      const cell = new Cell();
      cell.remove(4);
      cell.remove(4);
      expect(cell.getCandidates()).toEqual([1, 2, 3, 5, 6, 7, 8, 9]);
    });
  });

  describe('set', () => {
    it('forces the cell to a single value', () => {
      for (const value of VALUES) {
        const cell = new Cell();
        cell.set(value);
        expect(cell.isFinal).toBe(true);
        expect(cell.value).toBe(value);
        expect(cell.getCandidates()).toEqual([value]);
      }
    });

    it('overrides a previous final value', () => {
      const cell = Cell.of(3);
      cell.set(6);
      expect(cell.value).toBe(6);
    });

    it('restores a candidate that had been removed', () => {
      const cell = new Cell();
      cell.remove(2);
      cell.set(2);
      expect(cell.value).toBe(2);
    });
  });

  describe('clone', () => {
    it('copies the candidates', () => {
      const cell = new Cell();
      cell.remove(5);
      expect(cell.clone().getCandidates()).toEqual([1, 2, 3, 4, 6, 7, 8, 9]);
    });

    it('is independent of the original', () => {
      const cell = new Cell();
      const copy = cell.clone();
      copy.set(1);
      expect(cell.isFinal).toBe(false);
      expect(copy.value).toBe(1);
    });
  });

  describe('toString', () => {
    it('shows the digit of a final cell', () => {
      expect(Cell.of(4).toString()).toBe('4');
    });

    it('shows a space for an open cell', () => {
      const cell = new Cell();
      cell.remove(1);
      expect(cell.toString()).toBe(' ');
    });
  });
});

/* eslint-disable no-bitwise -- Houses are checked by overlapping candidate masks. */

import type { House } from './House.ts';
import type { Value } from './Value.ts';

import { Cell } from './Cell.ts';
import {
  GRID_SIZE,
  HOUSES
} from './House.ts';

export type Validity = 'incomplete' | 'invalid' | 'valid';

export const CELL_COUNT = GRID_SIZE * GRID_SIZE;

/**
 * A 9x9 grid of candidate cells, stored row-major (`index = row * 9 + column`).
 */
export class Board {
  private readonly cells: readonly Cell[];

  public constructor(cells?: readonly Cell[]) {
    if (cells && cells.length !== CELL_COUNT) {
      throw new RangeError(`A board needs ${String(CELL_COUNT)} cells, got ${String(cells.length)}`);
    }
    this.cells = cells
      ? cells.map((cell) => cell.clone())
      : Array.from({ length: CELL_COUNT }, () => new Cell());
  }

  public clone(): Board {
    return new Board(this.cells);
  }

  public equals(other: Board): boolean {
    return this.cells.every((cell, index) => cell.mask === other.getAt(index).mask);
  }

  /**
   * First row-major index at or after `fromIndex` whose cell is not final.
   */
  public findOpenCell(fromIndex: number): null | number {
    for (let index = Math.max(fromIndex, 0); index < CELL_COUNT; index++) {
      if (!this.getAt(index).isFinal) {
        return index;
      }
    }
    return null;
  }

  /**
   * First house holding a repeated digit, in validation order.
   */
  public findInvalidHouse(): House | null {
    return HOUSES.find((house) => this.validateHouse(house) === 'invalid') ?? null;
  }

  public get(row: number, column: number): Cell {
    if (!isGridIndex(row) || !isGridIndex(column)) {
      throw new RangeError(`Cell (${String(row)}, ${String(column)}) is outside the grid`);
    }
    return this.getAt(row * GRID_SIZE + column);
  }

  public getAt(index: number): Cell {
    const cell = this.cells[index];
    if (!cell) {
      throw new RangeError(`Cell index out of range: ${String(index)}`);
    }
    return cell;
  }

  public isValid(): boolean {
    return this.validate() === 'valid';
  }

  public setValue(row: number, column: number, value: Value): void {
    this.get(row, column).set(value);
  }

  public toString(): string {
    let text = '';
    for (let row = 0; row < GRID_SIZE; row++) {
      for (let column = 0; column < GRID_SIZE; column++) {
        text += this.get(row, column).toString();
      }
      text += '\n';
    }
    return text;
  }

  public validate(): Validity {
    let incomplete = false;
    for (const house of HOUSES) {
      const validity = this.validateHouse(house);
      if (validity === 'invalid') {
        return 'invalid';
      }
      if (validity === 'incomplete') {
        incomplete = true;
      }
    }
    return incomplete ? 'incomplete' : 'valid';
  }

  public validateHouse(house: House): Validity {
    let seen = 0;
    let complete = true;
    for (const { column, row } of house.coords) {
      const cell = this.get(row, column);
      if (!cell.isFinal) {
        complete = false;
        continue;
      }
      if ((seen & cell.mask) !== 0) {
        return 'invalid';
      }
      seen |= cell.mask;
    }
    return complete ? 'valid' : 'incomplete';
  }
}

function isGridIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < GRID_SIZE;
}

/* eslint-enable no-bitwise -- End house mask block. */

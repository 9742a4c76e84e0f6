import { getColumnLabel } from './cellRefs.ts';

export interface CellCoord {
  readonly column: number;
  readonly row: number;
}

export type HouseType = 'block' | 'column' | 'row';

export const GRID_SIZE = 9;
export const BLOCK_SIZE = 3;

/**
 * One of the 27 groups of nine cells that must hold each digit once: a row, a
 * column or an aligned 3x3 block. Indices are 0-based.
 */
export class House {
  public readonly coords: readonly CellCoord[];
  public readonly label: string;

  public constructor(public readonly type: HouseType, public readonly index: number) {
    this.coords = buildCoords(type, index);
    this.label = type === 'column' ? getColumnLabel(index + 1) : String(index + 1);
  }

  public toString(): string {
    switch (this.type) {
      case 'block':
        return `Block ${this.label}`;
      case 'column':
        return `Column ${this.label}`;
      case 'row':
        return `Row ${this.label}`;
      default: {
        const exhaustive: never = this.type;
        throw new Error(`Unknown house type: ${String(exhaustive)}`);
      }
    }
  }
}

/**
 * All houses in validation order: row i, column i, block i for i = 0..8.
 */
export const HOUSES: readonly House[] = Array.from({ length: GRID_SIZE }, (_, i) => [
  new House('row', i),
  new House('column', i),
  new House('block', i)
]).flat();

function buildCoords(type: HouseType, index: number): CellCoord[] {
  if (!Number.isInteger(index) || index < 0 || index >= GRID_SIZE) {
    throw new RangeError(`House index out of range: ${String(index)}`);
  }
  switch (type) {
    case 'block': {
      const top = Math.floor(index / BLOCK_SIZE) * BLOCK_SIZE;
      const left = (index % BLOCK_SIZE) * BLOCK_SIZE;
      return Array.from({ length: GRID_SIZE }, (_, i) => ({
        column: left + (i % BLOCK_SIZE),
        row: top + Math.floor(i / BLOCK_SIZE)
      }));
    }
    case 'column':
      return Array.from({ length: GRID_SIZE }, (_, row) => ({ column: index, row }));
    case 'row':
      return Array.from({ length: GRID_SIZE }, (_, column) => ({ column, row: index }));
    default: {
      const exhaustive: never = type;
      throw new Error(`Unknown house type: ${String(exhaustive)}`);
    }
  }
}

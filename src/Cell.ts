/* eslint-disable no-bitwise -- Candidates are stored as a 9-bit mask. */

import type { Value } from './Value.ts';

import { ensureNonNullable } from './typeGuards.ts';
import { VALUES } from './Value.ts';

const ALL_CANDIDATES = 0x1ff;
const INT_BITS = 32;

function bitOf(value: Value): number {
  return 1 << (value - 1);
}

/**
 * The candidate digits still open for one grid position.
 *
 * Bit `v - 1` of the mask is set when `v` is a candidate. A cell with a single
 * candidate is final and stays fixed under {@link Cell.remove}; none of the
 * operations can empty the mask.
 */
export class Cell {
  public get candidateCount(): number {
    let count = 0;
    for (let bits = this.bits; bits !== 0; bits &= bits - 1) {
      count++;
    }
    return count;
  }

  public get isFinal(): boolean {
    return this.bits !== 0 && (this.bits & (this.bits - 1)) === 0;
  }

  public get mask(): number {
    return this.bits;
  }

  public get value(): null | Value {
    if (!this.isFinal) {
      return null;
    }
    return ensureNonNullable(VALUES[INT_BITS - 1 - Math.clz32(this.bits)]);
  }

  private bits = ALL_CANDIDATES;

  public static of(value: Value): Cell {
    const cell = new Cell();
    cell.set(value);
    return cell;
  }

  public clone(): Cell {
    const copy = new Cell();
    copy.bits = this.bits;
    return copy;
  }

  public contains(value: Value): boolean {
    return (this.bits & bitOf(value)) !== 0;
  }

  public getCandidates(): Value[] {
    return VALUES.filter((value) => this.contains(value));
  }

  public remove(value: Value): void {
    if (this.isFinal) {
      return;
    }
    this.bits &= ~bitOf(value);
  }

  public set(value: Value): void {
    this.bits = bitOf(value);
  }

  public toString(): string {
    return this.value === null ? ' ' : String(this.value);
  }
}

/* eslint-enable no-bitwise -- End candidate mask block. */

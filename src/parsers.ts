import type { Value } from './Value.ts';

import { Board } from './Board.ts';
import { getCellRef } from './cellRefs.ts';
import {
  ParseFailureError,
  ValueOutOfRangeError
} from './errors.ts';
import { GRID_SIZE } from './House.ts';
import { toValue } from './Value.ts';

const UNKNOWN_CELL = ' ';

/**
 * Reads one grid character: a digit forces the cell, a space leaves it open.
 */
export function parseValue(ch: string, location?: string): null | Value {
  if (ch === UNKNOWN_CELL) {
    return null;
  }
  const where = location === undefined ? '' : ` at ${location}`;
  if (!/^\d$/.test(ch)) {
    throw new ParseFailureError(`Expected a digit 1-9 or a space${where}: '${ch}'`);
  }
  const digit = parseInt(ch, 10);
  if (digit === 0) {
    throw new ValueOutOfRangeError(digit, location);
  }
  return toValue(digit, location);
}

/**
 * Parses up to nine newline-separated lines of up to nine characters each.
 * Missing lines and characters leave their cells open.
 */
export function parseBoard(text: string): Board {
  const lines = text.split(/\r?\n/);
  if (lines.length === GRID_SIZE + 1 && lines[GRID_SIZE] === '') {
    lines.pop();
  }
  if (lines.length > GRID_SIZE) {
    throw new ParseFailureError(`Expected at most ${String(GRID_SIZE)} lines, got ${String(lines.length)}`);
  }

  const board = new Board();
  lines.forEach((line, row) => {
    const chars = Array.from(line);
    if (chars.length > GRID_SIZE) {
      throw new ParseFailureError(`Line ${String(row + 1)} has ${String(chars.length)} characters, expected at most ${String(GRID_SIZE)}`);
    }
    chars.forEach((ch, column) => {
      const value = parseValue(ch, getCellRef(row + 1, column + 1));
      if (value !== null) {
        board.setValue(row, column, value);
      }
    });
  });
  return board;
}

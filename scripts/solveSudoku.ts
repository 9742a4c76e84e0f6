/**
 * Solve a Sudoku puzzle described by a YAML file.
 *
 * Usage:
 *     npm run solve -- fixtures/classic.yaml
 *
 * Prints the puzzle and its solution (or "No solution") and exits with code 1
 * when the puzzle cannot be solved or the file cannot be read.
 */

/* eslint-disable no-console -- CLI script output. */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Board } from '../src/Board.ts';

import { SudokuError } from '../src/errors.ts';
import { GRID_SIZE } from '../src/House.ts';
import { parsePuzzleYaml } from '../src/puzzleFile.ts';
import { solveWithStats } from '../src/solver.ts';

const FIRST_CLI_ARG_INDEX = 2;

function framed(board: Board): string {
  const border = `+${'-'.repeat(GRID_SIZE)}+`;
  const lines = board.toString().split('\n').slice(0, GRID_SIZE).map((line) => `|${line}|`);
  return [border, ...lines, border].join('\n');
}

function main(): void {
  const [path] = process.argv.slice(FIRST_CLI_ARG_INDEX);
  if (path === undefined) {
    console.error('Usage: npm run solve -- <puzzle.yaml>');
    process.exitCode = 1;
    return;
  }

  let text: string;
  try {
    text = readFileSync(resolve(path), 'utf-8');
  } catch (error) {
    console.error(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
    return;
  }

  try {
    const puzzle = parsePuzzleYaml(text);
    console.log(puzzle.title);
    console.log(framed(puzzle.board));

    const conflict = puzzle.board.findInvalidHouse();
    if (conflict) {
      console.error(`No solution: ${conflict.toString()} repeats a digit`);
      process.exitCode = 1;
      return;
    }

    const { solution, visitedNodes } = solveWithStats(puzzle.board);
    if (!solution) {
      console.error(`No solution (${String(visitedNodes)} nodes visited)`);
      process.exitCode = 1;
      return;
    }
    console.log(`Solved in ${String(visitedNodes)} nodes`);
    console.log(framed(solution));
  } catch (error) {
    if (error instanceof SudokuError) {
      console.error(`${error.name}: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

main();

/* eslint-enable no-console -- End CLI script output. */

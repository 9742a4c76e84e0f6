import type { Board } from './Board.ts';

export interface SolveOutcome {
  readonly solution: Board | null;
  readonly visitedNodes: number;
}

interface SearchStats {
  visitedNodes: number;
}

/**
 * Depth-first search over board copies. Each level fixes the next open cell
 * (row-major from `startIndex`) to each of its candidates in ascending order
 * and keeps the first branch whose board validates.
 */
function backtrack(board: Board, startIndex: number, stats: SearchStats): Board | null {
  stats.visitedNodes++;

  const validity = board.validate();
  if (validity === 'invalid') {
    return null;
  }
  if (validity === 'valid') {
    return board;
  }

  const index = board.findOpenCell(startIndex);
  if (index === null) {
    return null;
  }

  for (const value of board.getAt(index).getCandidates()) {
    const candidate = board.clone();
    candidate.getAt(index).set(value);
    const solution = backtrack(candidate, index + 1, stats);
    if (solution) {
      return solution;
    }
  }
  return null;
}

/**
 * Returns the first solution in digit-ascending search order, or `null` when
 * the puzzle has none. The input board is never modified.
 */
export function solve(board: Board): Board | null {
  return solveWithStats(board).solution;
}

export function solveWithStats(board: Board): SolveOutcome {
  const stats: SearchStats = { visitedNodes: 0 };
  const solution = backtrack(board, 0, stats);
  return { solution, visitedNodes: stats.visitedNodes };
}

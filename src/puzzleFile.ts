import yaml from 'js-yaml';

import type { Board } from './Board.ts';

import { ParseFailureError } from './errors.ts';
import { parseBoard } from './parsers.ts';
import {
  isPlainObject,
  isStringArray
} from './typeGuards.ts';

export interface PuzzleFile {
  readonly board: Board;
  readonly title: string;
}

const DEFAULT_TITLE = 'Untitled';

/**
 * Reads a YAML puzzle document:
 *
 * ```yaml
 * title: Classic
 * rows:
 *   - '53  7    '
 *   - '6  195   '
 * ```
 */
export function parsePuzzleYaml(text: string): PuzzleFile {
  const doc = loadYaml(text);
  if (!isPlainObject(doc)) {
    throw new ParseFailureError('Puzzle document must be a mapping');
  }

  const title = doc['title'] ?? DEFAULT_TITLE;
  if (typeof title !== 'string') {
    throw new ParseFailureError('Puzzle title must be a string');
  }

  const rows = doc['rows'];
  if (!isStringArray(rows)) {
    throw new ParseFailureError('Puzzle rows must be a list of strings');
  }

  return { board: parseBoard(rows.join('\n')), title };
}

function loadYaml(text: string): unknown {
  try {
    return yaml.load(text);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new ParseFailureError(`Invalid puzzle YAML: ${error.message}`);
    }
    throw error;
  }
}

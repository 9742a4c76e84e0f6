/**
 * Base class for recoverable errors raised while reading puzzles.
 */
export class SudokuError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'SudokuError';
  }
}

/**
 * Thrown when puzzle text or a puzzle document is malformed.
 */
export class ParseFailureError extends SudokuError {
  public constructor(message: string) {
    super(message);
    this.name = 'ParseFailureError';
  }
}

/**
 * Thrown when a digit lies outside 1-9.
 */
export class ValueOutOfRangeError extends SudokuError {
  public constructor(public readonly value: number, location?: string) {
    super(location === undefined
      ? `Value out of range: ${String(value)}`
      : `Value out of range at ${location}: ${String(value)}`);
    this.name = 'ValueOutOfRangeError';
  }
}

export * from './Board.ts';
export * from './Cell.ts';
export * from './cellRefs.ts';
export * from './errors.ts';
export * from './House.ts';
export * from './parsers.ts';
export * from './puzzleFile.ts';
export * from './solver.ts';
export * from './Value.ts';

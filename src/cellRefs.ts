const CHAR_CODE_A = 65;

/**
 * A1 notation for a 1-based row and column: column letter, then row number.
 */
export function getCellRef(rowId: number, columnId: number): string {
  return getColumnLabel(columnId) + String(rowId);
}

export function getColumnLabel(columnId: number): string {
  return String.fromCharCode(CHAR_CODE_A + columnId - 1);
}

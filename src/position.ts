// ============================================================
// SOURCE POSITION
// ============================================================

/**
 * A location in the scanned input.
 * A position is valid if line > 0.
 */
export interface Position {
  readonly filename: string;
  /** Byte offset, starting at 0 */
  readonly offset: number;
  /** Line number, starting at 1 */
  readonly line: number;
  /** Column number in runes, starting at 1 */
  readonly column: number;
}

export function isValidPosition(pos: Position): boolean {
  return pos.line > 0;
}

/**
 * Render a position as `file:line:column`.
 * An empty filename renders as `<input>`; an invalid position omits line and column.
 */
export function formatPosition(pos: Position): string {
  const name = pos.filename === '' ? '<input>' : pos.filename;
  if (!isValidPosition(pos)) {
    return name;
  }
  return `${name}:${pos.line}:${pos.column}`;
}

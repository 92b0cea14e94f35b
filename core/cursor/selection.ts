/**
 * Positions, half-open ranges and selection normalization.
 *
 * A selection is defined by an anchor and a cursor position.
 * The "start" is min(anchor, cursor), "end" is max(anchor, cursor).
 */

export interface Position {
  line: number;
  column: number;
}

/** Half-open document range [start, end). */
export interface PositionRange {
  start: Position;
  end: Position;
}

export interface SelectionRange {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

/**
 * Compare two positions. Returns negative if a < b, 0 if equal, positive if a > b.
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.column - b.column;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

export function minPosition(a: Position, b: Position): Position {
  return comparePositions(a, b) <= 0 ? a : b;
}

export function maxPosition(a: Position, b: Position): Position {
  return comparePositions(a, b) >= 0 ? a : b;
}

/** Build a range from two positions in either order. */
export function orderedRange(a: Position, b: Position): PositionRange {
  return comparePositions(a, b) <= 0
    ? { start: { ...a }, end: { ...b } }
    : { start: { ...b }, end: { ...a } };
}

/**
 * Normalize a selection so start <= end.
 */
export function normalizeSelection(
  anchor: Position,
  cursor: Position,
): SelectionRange {
  const { start, end } = orderedRange(anchor, cursor);
  return {
    startLine: start.line,
    startColumn: start.column,
    endLine: end.line,
    endColumn: end.column,
  };
}

export function selectionToRange(sel: SelectionRange): PositionRange {
  return {
    start: { line: sel.startLine, column: sel.startColumn },
    end: { line: sel.endLine, column: sel.endColumn },
  };
}

/**
 * Check if two selections overlap or are adjacent.
 */
export function selectionsOverlap(a: SelectionRange, b: SelectionRange): boolean {
  if (a.endLine < b.startLine) return false;
  if (a.endLine === b.startLine && a.endColumn < b.startColumn) return false;
  if (b.endLine < a.startLine) return false;
  if (b.endLine === a.startLine && b.endColumn < a.startColumn) return false;
  return true;
}

/**
 * Merge two overlapping/adjacent selections into one.
 */
export function mergeSelections(a: SelectionRange, b: SelectionRange): SelectionRange {
  const start = minPosition(
    { line: a.startLine, column: a.startColumn },
    { line: b.startLine, column: b.startColumn },
  );
  const end = maxPosition(
    { line: a.endLine, column: a.endColumn },
    { line: b.endLine, column: b.endColumn },
  );
  return {
    startLine: start.line,
    startColumn: start.column,
    endLine: end.line,
    endColumn: end.column,
  };
}

export function isSelectionEmpty(sel: SelectionRange): boolean {
  return sel.startLine === sel.endLine && sel.startColumn === sel.endColumn;
}

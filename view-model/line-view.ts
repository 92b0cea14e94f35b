/**
 * Per-line render data: text, cursors, selections and colored tokens.
 */

import type { TextBuffer } from '../core/buffer/text-buffer';
import type { Position, PositionRange } from '../core/cursor/selection';
import type { HighlightCategory, HighlightSpan } from '../core/tokenizer/categories';
import { resolveCategoryStyle, type EditorTheme, type FontStyle } from './theme';

export interface LineToken {
  startColumn: number;
  endColumn: number;
  category: HighlightCategory;
  color: string;
  fontStyle: FontStyle;
}

export interface LineSelection {
  startColumn: number;
  endColumn: number;
  /** The selection continues onto the next line. */
  includesLineBreak: boolean;
}

export interface LineView {
  lineNumber: number;
  text: string;
  /** Columns of every cursor on this line, primary first when present. */
  cursorColumns: number[];
  hasPrimaryCursor: boolean;
  selections: LineSelection[];
  tokens: LineToken[];
}

export interface LineViewInput {
  buffer: TextBuffer;
  lineNumber: number;
  /** Primary cursor first. */
  cursors: readonly Position[];
  selections: readonly PositionRange[];
  spans: readonly HighlightSpan[];
  theme: EditorTheme;
}

/** Index of the first span ending after `offset`. */
function firstSpanAfter(spans: readonly HighlightSpan[], offset: number): number {
  let lo = 0;
  let hi = spans.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (spans[mid].to <= offset) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Tokens for the columns [0, length) of a line starting at `lineStart`.
 * Spans may come from an older buffer version; they are clipped to the
 * line and any uncovered columns become `text`.
 */
export function clipSpansToLine(
  spans: readonly HighlightSpan[],
  lineStart: number,
  length: number,
  theme: EditorTheme,
): LineToken[] {
  const tokens: LineToken[] = [];
  const lineEnd = lineStart + length;
  const push = (start: number, end: number, category: HighlightCategory) => {
    if (end <= start) return;
    tokens.push({ startColumn: start, endColumn: end, category, ...resolveCategoryStyle(category, theme) });
  };

  let column = 0;
  for (let i = firstSpanAfter(spans, lineStart); i < spans.length && spans[i].from < lineEnd; i++) {
    const span = spans[i];
    const start = Math.max(span.from, lineStart) - lineStart;
    const end = Math.min(span.to, lineEnd) - lineStart;
    if (start > column) push(column, start, 'text');
    push(Math.max(start, column), end, span.category);
    column = Math.max(column, end);
  }
  push(column, length, 'text');
  return tokens;
}

function selectionOnLine(range: PositionRange, line: number, length: number): LineSelection | null {
  const { start, end } = range;
  if (line < start.line || line > end.line) return null;
  if (start.line === end.line && start.column === end.column) return null;
  const startColumn = line === start.line ? start.column : 0;
  const includesLineBreak = line < end.line;
  const endColumn = includesLineBreak ? length : end.column;
  if (!includesLineBreak && endColumn <= startColumn) return null;
  return { startColumn, endColumn, includesLineBreak };
}

/** Render data for one line, or null when the line does not exist. */
export function computeLineView(input: LineViewInput): LineView | null {
  const { buffer, lineNumber, theme } = input;
  if (lineNumber < 0 || lineNumber >= buffer.getLineCount()) return null;

  const text = buffer.getLine(lineNumber);
  const cursorColumns: number[] = [];
  input.cursors.forEach((c) => {
    if (c.line === lineNumber) cursorColumns.push(c.column);
  });

  const selections: LineSelection[] = [];
  for (const range of input.selections) {
    const selection = selectionOnLine(range, lineNumber, text.length);
    if (selection) selections.push(selection);
  }

  return {
    lineNumber,
    text,
    cursorColumns,
    hasPrimaryCursor: input.cursors.length > 0 && input.cursors[0].line === lineNumber,
    selections,
    tokens: clipSpansToLine(input.spans, buffer.getLineOffset(lineNumber), text.length, theme),
  };
}

/**
 * Multi-cursor management: primary cursor, secondary cursors, cursor merging.
 *
 * The primary cursor is always index 0; secondaries follow in document
 * order. Coincident cursors and overlapping selections are merged. The
 * manager subscribes to its buffer so every position is shifted inside the
 * mutation path and stays valid after each edit.
 */

import type { BufferChange, TextBuffer } from '../buffer/text-buffer';
import {
  type Position,
  type SelectionRange,
  comparePositions,
  normalizeSelection,
  selectionsOverlap,
  mergeSelections,
} from './selection';
import { resolveMotion, type MotionDirection, type MotionUnit } from './motions';

export interface CursorState {
  line: number;
  column: number;
  selectionAnchor: Position | null;
  desiredColumn: number;
}

export interface MoveOptions {
  /** Extend the selection instead of clearing it. */
  extend?: boolean;
  /** Repeat the motion this many times. */
  count?: number;
}

/** Sticky desired column set by `$`: vertical motion keeps to the line end. */
const LINE_END_COLUMN = Number.MAX_SAFE_INTEGER;

export function cloneCursorState(c: CursorState): CursorState {
  return {
    line: c.line,
    column: c.column,
    selectionAnchor: c.selectionAnchor ? { ...c.selectionAnchor } : null,
    desiredColumn: c.desiredColumn,
  };
}

/**
 * Shift a pre-mutation position across a buffer change. Positions inside
 * the removed range collapse to its start; positions at or after its end
 * move with the text that follows.
 */
export function shiftPosition(p: Position, change: BufferChange): Position {
  const { start, oldEnd, insertedText } = change;
  if (comparePositions(p, start) < 0) return { ...p };
  if (comparePositions(p, oldEnd) < 0) return { line: start.line, column: start.column };

  const parts = insertedText.split('\n');
  const newEnd = parts.length === 1
    ? { line: start.line, column: start.column + parts[0].length }
    : { line: start.line + parts.length - 1, column: parts[parts.length - 1].length };

  if (p.line === oldEnd.line) {
    return { line: newEnd.line, column: newEnd.column + (p.column - oldEnd.column) };
  }
  return { line: p.line + (newEnd.line - oldEnd.line), column: p.column };
}

export class CursorManager {
  private _cursors: CursorState[];
  private buffer: TextBuffer;
  private pastEndAllowed = true;
  private unsubscribe: () => void;

  constructor(buffer: TextBuffer) {
    this.buffer = buffer;
    this._cursors = [{
      line: 0,
      column: 0,
      selectionAnchor: null,
      desiredColumn: 0,
    }];
    this.unsubscribe = buffer.onDidChange((change) => this.onBufferMutated(change));
  }

  get primary(): CursorState {
    return this._cursors[0];
  }

  get cursors(): readonly CursorState[] {
    return this._cursors;
  }

  get position(): Position {
    return { line: this.primary.line, column: this.primary.column };
  }

  /**
   * Normal and Visual mode keep the cursor on a character: the end
   * position is only reachable on empty lines. Turning this off clamps
   * existing cursors.
   */
  setPastEndAllowed(allowed: boolean): void {
    if (this.pastEndAllowed === allowed) return;
    this.pastEndAllowed = allowed;
    if (!allowed) {
      for (const cursor of this._cursors) {
        cursor.column = this.clampColumn(cursor.line, cursor.column);
      }
      this.mergeCursors();
    }
  }

  get isPastEndAllowed(): boolean {
    return this.pastEndAllowed;
  }

  /** Move all cursors by a motion unit. */
  move(direction: MotionDirection, unit: MotionUnit, options: MoveOptions = {}): void {
    const extend = options.extend ?? false;
    const count = Math.max(1, options.count ?? 1);
    for (const cursor of this._cursors) {
      this.setAnchor(cursor, extend);
      let pos: Position = { line: cursor.line, column: cursor.column };
      for (let i = 0; i < count; i++) {
        const next = resolveMotion(this.buffer, pos, direction, unit, cursor.desiredColumn);
        if (comparePositions(next, pos) === 0) break;
        pos = next;
      }
      cursor.line = pos.line;
      cursor.column = this.clampColumn(pos.line, pos.column);
      if (unit === 'lineBoundary' && direction === 'forward') {
        cursor.desiredColumn = LINE_END_COLUMN;
      } else if (unit !== 'line') {
        cursor.desiredColumn = cursor.column;
      }
    }
    this.mergeCursors();
  }

  /** Move the primary cursor to an exact position (clamped). */
  moveToPosition(line: number, column: number, extend: boolean = false): void {
    const cursor = this._cursors[0];
    this.setAnchor(cursor, extend);
    cursor.line = this.clampLine(line);
    cursor.column = this.clampColumn(cursor.line, column);
    cursor.desiredColumn = cursor.column;
    this.mergeCursors();
  }

  /** Reset to a single cursor at the given position. */
  reset(line: number, column: number): void {
    line = this.clampLine(line);
    column = this.clampColumn(line, column);
    this._cursors = [{
      line,
      column,
      selectionAnchor: null,
      desiredColumn: column,
    }];
  }

  /** Anchor a selection at every cursor that has none. */
  startSelection(): void {
    for (const cursor of this._cursors) this.setAnchor(cursor, true);
  }

  clearSelection(): void {
    for (const cursor of this._cursors) cursor.selectionAnchor = null;
    this.mergeCursors();
  }

  /** Add a new cursor at a specific position. */
  addCursorAt(line: number, column: number): void {
    line = this.clampLine(line);
    column = this.clampColumn(line, column);
    this._cursors.push({
      line,
      column,
      selectionAnchor: null,
      desiredColumn: column,
    });
    this.mergeCursors();
  }

  /** Add a cursor one line above each existing cursor. */
  addCursorAbove(): void {
    this.addVertical(-1);
  }

  /** Add a cursor one line below each existing cursor. */
  addCursorBelow(): void {
    this.addVertical(1);
  }

  /** Drop every secondary cursor. */
  collapseToPrimary(): void {
    this._cursors = [this._cursors[0]];
  }

  /** Get all selections (for rendering). */
  getSelections(): SelectionRange[] {
    const selections: SelectionRange[] = [];
    for (const cursor of this._cursors) {
      if (cursor.selectionAnchor) {
        selections.push(normalizeSelection(
          cursor.selectionAnchor,
          { line: cursor.line, column: cursor.column },
        ));
      }
    }
    return selections;
  }

  /** Deep copy of every cursor, primary first. */
  snapshot(): CursorState[] {
    return this._cursors.map(cloneCursorState);
  }

  /** Replace all cursors with copies of `states`, clamped to the document. */
  restore(states: readonly CursorState[]): void {
    if (states.length === 0) {
      this.reset(0, 0);
      return;
    }
    this._cursors = states.map((s) => {
      const c = cloneCursorState(s);
      c.line = this.clampLine(c.line);
      c.column = this.clampColumn(c.line, c.column);
      if (c.selectionAnchor) c.selectionAnchor = this.buffer.clampPosition(c.selectionAnchor);
      return c;
    });
    this.mergeCursors();
  }

  /** Shift every cursor and anchor across a buffer change. */
  onBufferMutated(change: BufferChange): void {
    for (const cursor of this._cursors) {
      const pos = shiftPosition({ line: cursor.line, column: cursor.column }, change);
      cursor.line = this.clampLine(pos.line);
      cursor.column = this.clampColumn(cursor.line, pos.column);
      cursor.desiredColumn = cursor.column;
      if (cursor.selectionAnchor) {
        cursor.selectionAnchor = this.buffer.clampPosition(
          shiftPosition(cursor.selectionAnchor, change),
        );
      }
    }
    this.mergeCursors();
  }

  /** Stop following buffer changes. */
  dispose(): void {
    this.unsubscribe();
  }

  private setAnchor(cursor: CursorState, extend: boolean): void {
    if (extend && !cursor.selectionAnchor) {
      cursor.selectionAnchor = { line: cursor.line, column: cursor.column };
    }
    if (!extend) cursor.selectionAnchor = null;
  }

  private addVertical(delta: number): void {
    const added: CursorState[] = [];
    const maxLine = this.buffer.getLineCount() - 1;
    for (const cursor of this._cursors) {
      const newLine = cursor.line + delta;
      if (newLine < 0 || newLine > maxLine) continue;
      added.push({
        line: newLine,
        column: this.clampColumn(newLine, cursor.desiredColumn),
        selectionAnchor: null,
        desiredColumn: cursor.desiredColumn,
      });
    }
    this._cursors.push(...added);
    this.mergeCursors();
  }

  private clampLine(line: number): number {
    return Math.max(0, Math.min(line, this.buffer.getLineCount() - 1));
  }

  private clampColumn(line: number, column: number): number {
    const lineLen = this.buffer.getLineLength(line);
    const max = this.pastEndAllowed ? lineLen : Math.max(0, lineLen - 1);
    return Math.max(0, Math.min(column, max));
  }

  /** Merge overlapping or coincident cursors, keeping the primary first. */
  private mergeCursors(): void {
    if (this._cursors.length <= 1) return;
    let primary = this._cursors[0];
    const sorted = [...this._cursors].sort((a, b) => comparePositions(a, b));

    const merged: CursorState[] = [sorted[0]];
    for (let i = 1; i < sorted.length; i++) {
      const prev = merged[merged.length - 1];
      const curr = sorted[i];

      // Check if cursors are at the same position
      if (prev.line === curr.line && prev.column === curr.column) {
        // Merge: keep the one with a selection if any
        if (curr.selectionAnchor && !prev.selectionAnchor) {
          merged[merged.length - 1] = curr;
          if (prev === primary) primary = curr;
        } else if (curr === primary) {
          primary = prev;
        }
        continue;
      }

      // Check if selections overlap
      if (prev.selectionAnchor && curr.selectionAnchor) {
        const prevSel = normalizeSelection(prev.selectionAnchor, prev);
        const currSel = normalizeSelection(curr.selectionAnchor, curr);
        if (selectionsOverlap(prevSel, currSel)) {
          const mergedSel = mergeSelections(prevSel, currSel);
          // Keep the later cursor position, use merged selection as anchor
          prev.line = curr.line;
          prev.column = curr.column;
          prev.desiredColumn = curr.desiredColumn;
          prev.selectionAnchor = { line: mergedSel.startLine, column: mergedSel.startColumn };
          if (curr === primary) primary = prev;
          continue;
        }
      }

      merged.push(curr);
    }

    this._cursors = [primary, ...merged.filter((c) => c !== primary)];
  }
}

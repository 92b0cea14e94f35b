/**
 * High-level TextBuffer API over the line tree.
 *
 * This is the public interface for all text operations: position-addressed
 * editing, offset/position conversion, snapshots and change notification.
 * Offsets and columns count UTF-16 code units.
 */

import { LineTree } from './line-tree';
import { OutOfBoundsError } from '../errors';
import {
  comparePositions,
  type Position,
  type PositionRange,
} from '../cursor/selection';

/** An applied edit. Deletions carry the removed text so each op can be inverted. */
export interface EditOperation {
  readonly kind: 'insert' | 'delete';
  /** Character offset where the edit starts. */
  readonly offset: number;
  readonly text: string;
  /** Position of `offset` in the document the edit was applied to. */
  readonly position: Readonly<Position>;
}

export interface DeleteResult {
  removed: string;
  operation: EditOperation;
  inverse: EditOperation;
}

export interface DeleteOptions {
  /** Clamp an end past the document end instead of throwing. */
  clamp?: boolean;
}

/**
 * Notification sent to listeners after every mutation. Positions refer to
 * the document before the mutation.
 */
export interface BufferChange {
  readonly version: number;
  readonly offset: number;
  readonly start: Readonly<Position>;
  readonly oldEnd: Readonly<Position>;
  readonly removedText: string;
  readonly insertedText: string;
}

export type BufferChangeListener = (change: BufferChange) => void;

export interface BufferSnapshot {
  readonly version: number;
  readonly length: number;
  readonly lineCount: number;
  getText(): string;
  getLine(lineNumber: number): string;
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export function createOperation(
  kind: EditOperation['kind'],
  offset: number,
  text: string,
  position: Position,
): EditOperation {
  return Object.freeze({
    kind,
    offset,
    text,
    position: Object.freeze({ line: position.line, column: position.column }),
  });
}

export class TextBuffer {
  private tree: LineTree;
  private _version = 0;
  private listeners = new Set<BufferChangeListener>();

  constructor(initialContent: string = '') {
    this.tree = new LineTree(normalizeLineEndings(initialContent).split('\n'));
  }

  /** Incremented on every successful mutation. */
  get version(): number {
    return this._version;
  }

  /**
   * Insert text at a position.
   * @throws OutOfBoundsError if the position is not valid.
   */
  insert(position: Position, text: string): EditOperation {
    if (!this.isValidPosition(position)) throw OutOfBoundsError.position(position);
    const normalized = normalizeLineEndings(text);
    const offset = this.offsetAt(position);
    const op = createOperation('insert', offset, normalized, position);
    if (normalized.length > 0) this.replace(position, position, normalized);
    return op;
  }

  /**
   * Delete the half-open range [start, end).
   * @throws OutOfBoundsError if either end is invalid or start > end.
   */
  delete(range: PositionRange, options: DeleteOptions = {}): DeleteResult {
    const { start } = range;
    const end = options.clamp ? this.clampPosition(range.end) : range.end;
    if (!this.isValidPosition(start)) throw OutOfBoundsError.position(start);
    if (!this.isValidPosition(end)) throw OutOfBoundsError.position(end);
    if (comparePositions(start, end) > 0) {
      throw new OutOfBoundsError(
        `Range start ${start.line}:${start.column} is after end ${end.line}:${end.column}`,
        start,
      );
    }

    const offset = this.offsetAt(start);
    const removed = this.textBetween(start, end);
    if (removed.length > 0) this.replace(start, end, '');

    return {
      removed,
      operation: createOperation('delete', offset, removed, start),
      inverse: createOperation('insert', offset, removed, start),
    };
  }

  /**
   * Apply an offset-addressed operation, as history replay does.
   * A delete must find exactly `op.text` at its offset.
   */
  applyOperation(op: EditOperation): void {
    const length = this.getLength();
    if (op.offset < 0 || op.offset > length) throw OutOfBoundsError.offset(op.offset, length);
    const start = this.positionAt(op.offset);

    if (op.kind === 'insert') {
      if (op.text.length > 0) this.replace(start, start, op.text);
      return;
    }

    const endOffset = op.offset + op.text.length;
    if (endOffset > length) throw OutOfBoundsError.offset(endOffset, length);
    const end = this.positionAt(endOffset);
    if (this.textBetween(start, end) !== op.text) {
      throw new OutOfBoundsError(
        `Text at offset ${op.offset} does not match the operation`,
        op.offset,
      );
    }
    if (op.text.length > 0) this.replace(start, end, '');
  }

  /** Replace the whole document; notifies as a single change. */
  setText(text: string): void {
    const start = { line: 0, column: 0 };
    const last = this.getLineCount() - 1;
    this.replace(start, { line: last, column: this.getLineLength(last) }, normalizeLineEndings(text));
  }

  /** Subscribe to mutations. Returns an unsubscribe function. */
  onDidChange(listener: BufferChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Get the full text content of the buffer. */
  getText(): string {
    return this.tree.toArray().join('\n');
  }

  /** Get text within a character offset range [start, end). */
  getTextRange(start: number, end: number): string {
    const length = this.getLength();
    const from = Math.max(0, Math.min(start, length));
    const to = Math.max(0, Math.min(end, length));
    if (from >= to) return '';
    return this.textBetween(this.positionAt(from), this.positionAt(to));
  }

  /** Get the content of a single line (without line ending). */
  getLine(lineNumber: number): string {
    if (lineNumber < 0 || lineNumber >= this.getLineCount()) return '';
    return this.tree.getLine(lineNumber);
  }

  getLineLength(lineNumber: number): number {
    return this.getLine(lineNumber).length;
  }

  /** Total number of lines in the buffer. */
  getLineCount(): number {
    return this.tree.lineCount;
  }

  /** Total number of characters in the buffer. */
  getLength(): number {
    return this.tree.length;
  }

  /** Get the character offset of the start of a line (clamped). */
  getLineOffset(lineNumber: number): number {
    const line = Math.max(0, Math.min(lineNumber, this.getLineCount() - 1));
    return this.tree.offsetOfLine(line);
  }

  /** Get the line number for a given character offset (clamped). */
  getOffsetLine(offset: number): number {
    const clamped = Math.max(0, Math.min(offset, this.getLength()));
    return this.tree.lineAtOffset(clamped).line;
  }

  /** @throws OutOfBoundsError for an invalid position */
  offsetAt(position: Position): number {
    if (!this.isValidPosition(position)) throw OutOfBoundsError.position(position);
    return this.tree.offsetOfLine(position.line) + position.column;
  }

  /** @throws OutOfBoundsError for an offset outside [0, length] */
  positionAt(offset: number): Position {
    const length = this.getLength();
    if (!Number.isInteger(offset) || offset < 0 || offset > length) {
      throw OutOfBoundsError.offset(offset, length);
    }
    return this.tree.lineAtOffset(offset);
  }

  isValidPosition(position: Position): boolean {
    const { line, column } = position;
    return (
      Number.isInteger(line) &&
      Number.isInteger(column) &&
      line >= 0 &&
      line < this.getLineCount() &&
      column >= 0 &&
      column <= this.getLineLength(line)
    );
  }

  clampPosition(position: Position): Position {
    const lastLine = this.getLineCount() - 1;
    if (position.line > lastLine) return { line: lastLine, column: this.getLineLength(lastLine) };
    const line = Math.max(0, position.line);
    const column = Math.max(0, Math.min(position.column, this.getLineLength(line)));
    return { line, column };
  }

  /**
   * Create an immutable snapshot of the current buffer state.
   */
  snapshot(): BufferSnapshot {
    const text = this.getText();
    let lines: string[] | null = null;
    return {
      version: this._version,
      length: text.length,
      lineCount: this.getLineCount(),
      getText: () => text,
      getLine(lineNumber: number): string {
        lines ??= text.split('\n');
        return lines[lineNumber] ?? '';
      },
    };
  }

  private textBetween(start: Position, end: Position): string {
    if (start.line === end.line) {
      return this.getLine(start.line).slice(start.column, end.column);
    }
    const parts: string[] = [];
    this.tree.walkLines(start.line, end.line + 1, (line, n) => {
      if (n === start.line) parts.push(line.slice(start.column));
      else if (n === end.line) parts.push(line.slice(0, end.column));
      else parts.push(line);
    });
    return parts.join('\n');
  }

  /** Core mutation: replace [start, oldEnd) with text, then notify. */
  private replace(start: Position, oldEnd: Position, text: string): void {
    const offset = this.offsetAt(start);
    const removedText = this.textBetween(start, oldEnd);
    const prefix = this.getLine(start.line).slice(0, start.column);
    const suffix = this.getLine(oldEnd.line).slice(oldEnd.column);

    const parts = text.split('\n');
    parts[0] = prefix + parts[0];
    parts[parts.length - 1] += suffix;
    this.tree.splice(start.line, oldEnd.line - start.line + 1, parts);
    this._version++;

    const change: BufferChange = Object.freeze({
      version: this._version,
      offset,
      start: Object.freeze({ ...start }),
      oldEnd: Object.freeze({ ...oldEnd }),
      removedText,
      insertedText: text,
    });
    for (const listener of this.listeners) listener(change);
  }
}

/**
 * Pure motion functions: compute a target position from a start position.
 *
 * The document is walked as a character stream where every line except the
 * last ends in a virtual '\n' at column === lineLength. Targets may land on
 * a line's end position; callers clamp for Normal mode.
 */

import type { Position } from './selection';
import { CharClass, charClass, firstNonBlankColumn } from './word-boundary';

/** Read-only line access, as TextBuffer provides. */
export interface LineSource {
  getLineCount(): number;
  getLine(lineNumber: number): string;
}

export type MotionDirection = 'backward' | 'forward';

export type MotionUnit =
  | 'character'
  | 'word'
  | 'bigWord'
  | 'wordEnd'
  | 'bigWordEnd'
  | 'line'
  | 'lineBoundary'
  | 'firstNonBlank'
  | 'paragraph'
  | 'document';

class CharWalker {
  line: number;
  column: number;

  constructor(private readonly source: LineSource, pos: Position) {
    this.line = pos.line;
    this.column = pos.column;
  }

  get char(): string | undefined {
    const text = this.source.getLine(this.line);
    if (this.column < text.length) return text[this.column];
    return this.line < this.source.getLineCount() - 1 ? '\n' : undefined;
  }

  /** True on an empty line, which vi treats as a word of its own. */
  get onEmptyLine(): boolean {
    return this.column === 0 && this.source.getLine(this.line).length === 0;
  }

  classOf(big: boolean): CharClass {
    return charClass(this.char, big);
  }

  forward(): boolean {
    const len = this.source.getLine(this.line).length;
    if (this.column < len) {
      this.column++;
      return true;
    }
    if (this.line < this.source.getLineCount() - 1) {
      this.line++;
      this.column = 0;
      return true;
    }
    return false;
  }

  backward(): boolean {
    if (this.column > 0) {
      this.column--;
      return true;
    }
    if (this.line > 0) {
      this.line--;
      this.column = this.source.getLine(this.line).length;
      return true;
    }
    return false;
  }

  get position(): Position {
    return { line: this.line, column: this.column };
  }
}

function documentEnd(source: LineSource): Position {
  const line = source.getLineCount() - 1;
  return { line, column: source.getLine(line).length };
}

/** `w` / `W`: start of the next word. */
export function nextWordStart(source: LineSource, pos: Position, big: boolean): Position {
  const w = new CharWalker(source, pos);
  const cls = w.classOf(big);
  if (cls !== CharClass.Blank) {
    while (w.classOf(big) === cls) {
      if (!w.forward()) return documentEnd(source);
    }
  }
  while (w.classOf(big) === CharClass.Blank) {
    if (w.onEmptyLine && w.line !== pos.line) return w.position;
    if (!w.forward()) return documentEnd(source);
  }
  return w.position;
}

/** `b` / `B`: start of the current or previous word. */
export function prevWordStart(source: LineSource, pos: Position, big: boolean): Position {
  const w = new CharWalker(source, pos);
  if (!w.backward()) return { line: 0, column: 0 };
  while (w.classOf(big) === CharClass.Blank) {
    if (w.onEmptyLine) return w.position;
    if (!w.backward()) return { line: 0, column: 0 };
  }
  const cls = w.classOf(big);
  while (true) {
    const here = w.position;
    if (!w.backward()) return here;
    if (w.classOf(big) !== cls) return here;
  }
}

/** `e` / `E`: end of the current or next word (inclusive column). */
export function nextWordEnd(source: LineSource, pos: Position, big: boolean): Position {
  const w = new CharWalker(source, pos);
  if (!w.forward()) return pos;
  while (w.classOf(big) === CharClass.Blank) {
    if (!w.forward()) return documentEnd(source);
  }
  const cls = w.classOf(big);
  while (true) {
    const here = w.position;
    if (!w.forward()) return here;
    if (w.classOf(big) !== cls) return here;
  }
}

/** `ge` / `gE`: end of the previous word. */
export function prevWordEnd(source: LineSource, pos: Position, big: boolean): Position {
  const w = new CharWalker(source, pos);
  const cls = w.classOf(big);
  if (cls !== CharClass.Blank) {
    while (w.classOf(big) === cls) {
      if (!w.backward()) return { line: 0, column: 0 };
    }
  }
  while (w.classOf(big) === CharClass.Blank) {
    if (!w.backward()) return { line: 0, column: 0 };
  }
  return w.position;
}

function isBlankLine(source: LineSource, line: number): boolean {
  return source.getLine(line).trim().length === 0;
}

/** `}`: next blank line after the current paragraph, or document end. */
export function nextParagraph(source: LineSource, pos: Position): Position {
  const last = source.getLineCount() - 1;
  let line = pos.line;
  while (line < last && isBlankLine(source, line)) line++;
  while (line < last && !isBlankLine(source, line)) line++;
  if (line === last && !isBlankLine(source, line)) return documentEnd(source);
  return { line, column: 0 };
}

/** `{`: previous blank line before the current paragraph, or document start. */
export function prevParagraph(source: LineSource, pos: Position): Position {
  let line = pos.line;
  while (line > 0 && isBlankLine(source, line)) line--;
  while (line > 0 && !isBlankLine(source, line)) line--;
  return { line, column: 0 };
}

/**
 * `f` / `F` / `t` / `T`: find a character on the current line.
 * Returns the target column, or null when the character is not found.
 */
export function findCharInLine(
  line: string,
  column: number,
  ch: string,
  direction: MotionDirection,
  till: boolean,
): number | null {
  if (direction === 'forward') {
    const idx = line.indexOf(ch, column + 1);
    if (idx === -1) return null;
    return till ? idx - 1 : idx;
  }
  if (column === 0) return null;
  const idx = line.lastIndexOf(ch, column - 1);
  if (idx === -1) return null;
  return till ? idx + 1 : idx;
}

/**
 * Resolve a single-step motion. `line` motions use `desiredColumn`; every
 * other unit ignores it.
 */
export function resolveMotion(
  source: LineSource,
  pos: Position,
  direction: MotionDirection,
  unit: MotionUnit,
  desiredColumn: number = pos.column,
): Position {
  const forward = direction === 'forward';
  const lastLine = source.getLineCount() - 1;

  switch (unit) {
    case 'character': {
      const len = source.getLine(pos.line).length;
      const column = forward ? Math.min(len, pos.column + 1) : Math.max(0, pos.column - 1);
      return { line: pos.line, column };
    }
    case 'word':
    case 'bigWord':
      return forward
        ? nextWordStart(source, pos, unit === 'bigWord')
        : prevWordStart(source, pos, unit === 'bigWord');
    case 'wordEnd':
    case 'bigWordEnd':
      return forward
        ? nextWordEnd(source, pos, unit === 'bigWordEnd')
        : prevWordEnd(source, pos, unit === 'bigWordEnd');
    case 'line': {
      const line = forward ? Math.min(lastLine, pos.line + 1) : Math.max(0, pos.line - 1);
      return { line, column: Math.min(desiredColumn, source.getLine(line).length) };
    }
    case 'lineBoundary':
      return { line: pos.line, column: forward ? source.getLine(pos.line).length : 0 };
    case 'firstNonBlank':
      return { line: pos.line, column: firstNonBlankColumn(source.getLine(pos.line)) };
    case 'paragraph':
      return forward ? nextParagraph(source, pos) : prevParagraph(source, pos);
    case 'document':
      return forward ? documentEnd(source) : { line: 0, column: 0 };
  }
}

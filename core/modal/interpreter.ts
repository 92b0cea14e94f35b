/**
 * Modal command interpreter: Normal, Insert, Visual and Command modes.
 *
 * Dispatch goes through a transition table keyed by (mode, key category).
 * A missing entry means the event is ignored; nothing here throws for
 * unexpected input. Edits go through the buffer and are recorded in the
 * history; the cursor manager follows every edit on its own.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import type { CursorManager } from '../cursor/cursor-manager';
import { resolveMotion, findCharInLine } from '../cursor/motions';
import { comparePositions, orderedRange, type Position, type PositionRange } from '../cursor/selection';
import { firstNonBlankColumn, isBlank, leadingIndent } from '../cursor/word-boundary';
import type { Settings } from '../config/settings';
import type { UndoManager } from '../history/undo-manager';
import { debugLog } from '../debug';
import { OutOfBoundsError } from '../errors';
import { categorizeKey, isArrowKey, type ArrowKey, type KeyCategory, type KeyEvent } from './keys';
import type { Register } from './register';
import { VimParser, type Action, type Motion, type NormalCommand, type Operator } from './vim-parser';

export type Mode = 'normal' | 'insert' | 'visual' | 'command';

export interface InputResult {
  handled: boolean;
  mode: Mode;
  /** A multi-key sequence is in progress. */
  pending?: boolean;
  status?: string;
  reason?: 'ignored' | 'invalid';
}

export interface InterpreterContext {
  readonly buffer: TextBuffer;
  readonly cursors: CursorManager;
  readonly history: UndoManager;
  readonly register: Register;
  readonly settings: Settings;
  /** Run an ex command line; returns an immediate status, if any. */
  runCommand(line: string): string | undefined;
}

export type ModeChangeListener = (mode: Mode, previous: Mode) => void;

type KeyHandler = (event: KeyEvent) => InputResult;
type TransitionTable = Record<Mode, Partial<Record<KeyCategory, KeyHandler>>>;

interface OperatorRange extends PositionRange {
  /** Whole lines [first, last] for linewise ranges. */
  lines: { first: number; last: number } | null;
  /** Text the register receives. */
  text: string;
}

const ARROW_MOTIONS: Readonly<Record<ArrowKey, string>> = {
  ArrowLeft: 'h',
  ArrowRight: 'l',
  ArrowUp: 'k',
  ArrowDown: 'j',
};

export class ModalInterpreter {
  private _mode: Mode = 'normal';
  private _commandLine = '';
  private readonly parser = new VimParser();
  private readonly table: TransitionTable;
  private readonly modeListeners = new Set<ModeChangeListener>();

  constructor(private readonly ctx: InterpreterContext) {
    ctx.cursors.setPastEndAllowed(false);

    this.table = {
      normal: {
        escape: () => {
          this.parser.reset();
          return this.result();
        },
        character: (e) => this.normalKey(e.key),
        arrow: (e) => this.arrowAsMotion(e, (key) => this.normalKey(key)),
        backspace: () => this.normalKey('h'),
        enter: () => this.normalKey('j'),
        delete: () => this.normalKey('x'),
        control: (e) => this.normalControl(e),
      },
      insert: {
        escape: () => {
          this.setMode('normal');
          return this.result();
        },
        character: (e) => this.insertAtCursors(() => e.key),
        enter: () => this.insertAtCursors((pos) => {
          const line = this.ctx.buffer.getLine(pos.line);
          return '\n' + leadingIndent(line.slice(0, pos.column));
        }),
        tab: () => this.insertAtCursors(() => this.tabText()),
        backspace: () => this.editAtCursors((pos) => this.backspaceAt(pos)),
        delete: () => this.editAtCursors((pos) => this.forwardDeleteAt(pos)),
        arrow: (e) => this.insertArrow(e),
      },
      visual: {
        escape: () => {
          this.setMode('normal');
          return this.result();
        },
        character: (e) => this.visualKey(e.key),
        arrow: (e) => this.arrowAsMotion(e, (key) => this.visualKey(key)),
        backspace: () => this.visualKey('h'),
        enter: () => this.visualKey('j'),
        delete: () => this.visualKey('x'),
      },
      command: {
        escape: () => {
          this._commandLine = '';
          this.setMode('normal');
          return this.result();
        },
        character: (e) => {
          this._commandLine += e.key;
          return this.result();
        },
        backspace: () => {
          if (this._commandLine.length === 0) {
            this.setMode('normal');
          } else {
            this._commandLine = [...this._commandLine].slice(0, -1).join('');
          }
          return this.result();
        },
        enter: () => {
          const line = this._commandLine;
          this._commandLine = '';
          this.setMode('normal');
          return this.result({ status: this.ctx.runCommand(line) });
        },
      },
    };
  }

  get mode(): Mode {
    return this._mode;
  }

  /** Text typed after ':' in Command mode. */
  get commandLine(): string {
    return this._commandLine;
  }

  /** Keys of an incomplete Normal or Visual mode sequence. */
  get pendingKeys(): string {
    return this.parser.pendingKeys;
  }

  onModeChange(listener: ModeChangeListener): () => void {
    this.modeListeners.add(listener);
    return () => {
      this.modeListeners.delete(listener);
    };
  }

  handleKey(event: KeyEvent): InputResult {
    const category = categorizeKey(event);
    const handler = this.table[this._mode][category];
    if (!handler) return { handled: false, mode: this._mode, reason: 'ignored' };
    try {
      return handler(event);
    } catch (err) {
      if (err instanceof OutOfBoundsError) {
        this.parser.reset();
        debugLog(`out of bounds in ${this._mode} mode: ${err.message}`);
        return this.result({ status: err.message });
      }
      throw err;
    }
  }

  /**
   * Inclusive range of the Visual selection: the character under the
   * cursor is part of it, and so is the line break of an empty line.
   */
  visualRange(): PositionRange {
    const { buffer, cursors } = this.ctx;
    const pos = cursors.position;
    const { start, end } = orderedRange(cursors.primary.selectionAnchor ?? pos, pos);
    const len = buffer.getLineLength(end.line);
    if (end.column < len) return { start, end: { line: end.line, column: end.column + 1 } };
    if (end.line < buffer.getLineCount() - 1) return { start, end: { line: end.line + 1, column: 0 } };
    return { start, end };
  }

  // -- Mode transitions ----------------------------------------------------

  private setMode(next: Mode): void {
    if (this._mode === next) return;
    const previous = this._mode;
    this.ctx.history.closeGroup();
    this.parser.reset();
    if (previous === 'visual') this.ctx.cursors.clearSelection();
    this._mode = next;
    this.ctx.cursors.setPastEndAllowed(next === 'insert');
    debugLog(`mode: ${previous} -> ${next}`);
    for (const listener of this.modeListeners) listener(next, previous);
  }

  private enterInsert(at: Position): void {
    this.setMode('insert');
    this.ctx.cursors.moveToPosition(at.line, at.column);
  }

  private result(extra: Partial<InputResult> = {}): InputResult {
    return { handled: true, mode: this._mode, ...extra };
  }

  private arrowAsMotion(event: KeyEvent, feed: (key: string) => InputResult): InputResult {
    if (!isArrowKey(event.key)) return { handled: false, mode: this._mode, reason: 'ignored' };
    return feed(ARROW_MOTIONS[event.key]);
  }

  // -- Normal mode ---------------------------------------------------------

  private normalKey(key: string): InputResult {
    const step = this.parser.feed(key);
    switch (step.status) {
      case 'pending':
        return this.result({ pending: true });
      case 'invalid':
        return { handled: false, mode: this._mode, reason: 'invalid' };
      case 'complete':
        return this.runNormal(step.command);
    }
  }

  private normalControl(event: KeyEvent): InputResult {
    if (event.key.toLowerCase() !== 'r' || !event.ctrlKey) {
      return { handled: false, mode: this._mode, reason: 'ignored' };
    }
    this.parser.reset();
    this.ctx.history.closeGroup();
    const result = this.ctx.history.redo();
    return this.result({ status: result.applied ? undefined : result.error.message });
  }

  private runNormal(command: NormalCommand): InputResult {
    const { history, cursors } = this.ctx;
    history.closeGroup();
    return history.transact(cursors.snapshot(), () => {
      switch (command.kind) {
        case 'move':
          this.applyMove(command.motion, command.count, command.hasCount, false);
          return this.result();
        case 'operator':
          return this.applyOperator(command.operator, command.motion, command.count, command.hasCount);
        case 'action':
          return this.applyAction(command.action, command.count);
      }
    });
  }

  private applyMove(motion: Motion, count: number, hasCount: boolean, extend: boolean): void {
    const { cursors } = this.ctx;
    if (motion.kind === 'unit') {
      cursors.move(motion.direction, motion.unit, { extend, count });
      return;
    }
    const target = this.motionTarget(motion, count, hasCount, cursors.position);
    if (target) cursors.moveToPosition(target.line, target.column, extend);
  }

  /** Where a motion lands from `from`, or null when it fails (f without a match). */
  private motionTarget(motion: Motion, count: number, hasCount: boolean, from: Position): Position | null {
    const { buffer, cursors } = this.ctx;
    switch (motion.kind) {
      case 'unit': {
        let pos = from;
        for (let i = 0; i < count; i++) {
          const next = resolveMotion(buffer, pos, motion.direction, motion.unit, cursors.primary.desiredColumn);
          if (comparePositions(next, pos) === 0) break;
          pos = next;
        }
        return pos;
      }
      case 'find': {
        const text = buffer.getLine(from.line);
        let column = from.column;
        for (let i = 0; i < count; i++) {
          // Repeated t/T must step over the character it stopped before
          const start = motion.till && i > 0
            ? column + (motion.direction === 'forward' ? 1 : -1)
            : column;
          const next = findCharInLine(text, start, motion.char, motion.direction, motion.till);
          if (next === null) return null;
          column = next;
        }
        return { line: from.line, column };
      }
      case 'goto': {
        const last = buffer.getLineCount() - 1;
        const line = hasCount
          ? Math.min(Math.max(count, 1), last + 1) - 1
          : motion.target === 'first' ? 0 : last;
        return { line, column: firstNonBlankColumn(buffer.getLine(line)) };
      }
    }
  }

  private operatorRange(
    operator: Operator,
    motion: Motion | 'line',
    count: number,
    hasCount: boolean,
  ): OperatorRange | null {
    const { buffer } = this.ctx;
    const pos = this.ctx.cursors.position;

    if (motion === 'line') {
      const lastLine = Math.min(pos.line + count - 1, buffer.getLineCount() - 1);
      return this.linewiseRange(pos.line, lastLine);
    }

    let m = motion;
    const line = buffer.getLine(pos.line);
    const isWordMotion = m.kind === 'unit' && m.direction === 'forward' &&
      (m.unit === 'word' || m.unit === 'bigWord');

    // cw on a non-blank changes to the end of the word, like ce
    if (operator === 'change' && m.kind === 'unit' && isWordMotion && !isBlank(line[pos.column])) {
      m = { ...m, unit: m.unit === 'bigWord' ? 'bigWordEnd' : 'wordEnd', inclusive: true };
    }

    const target = this.motionTarget(m, count, hasCount, pos);
    if (!target) return null;

    if (m.kind === 'goto' || (m.kind === 'unit' && m.linewise)) {
      return this.linewiseRange(Math.min(pos.line, target.line), Math.max(pos.line, target.line));
    }

    const ordered = orderedRange(pos, target);
    let { end } = ordered;
    const inclusive = m.kind === 'find' ? m.direction === 'forward' : m.inclusive;
    if (inclusive) {
      end = { line: end.line, column: Math.min(end.column + 1, buffer.getLineLength(end.line)) };
    }
    // dw on the last word of a line stops at the line end
    if (isWordMotion && !inclusive && end.line > ordered.start.line) {
      end = { line: end.line - 1, column: buffer.getLineLength(end.line - 1) };
    }
    const start = ordered.start;
    const text = buffer.getTextRange(buffer.offsetAt(start), buffer.offsetAt(end));
    return { start, end, lines: null, text };
  }

  /** Range covering whole lines [first, last], line break included. */
  private linewiseRange(first: number, last: number): OperatorRange {
    const { buffer } = this.ctx;
    const lines: string[] = [];
    for (let i = first; i <= last; i++) lines.push(buffer.getLine(i));
    const text = lines.join('\n');
    const range = { lines: { first, last }, text };

    if (last < buffer.getLineCount() - 1) {
      return { ...range, start: { line: first, column: 0 }, end: { line: last + 1, column: 0 } };
    }
    if (first > 0) {
      return {
        ...range,
        start: { line: first - 1, column: buffer.getLineLength(first - 1) },
        end: { line: last, column: buffer.getLineLength(last) },
      };
    }
    return { ...range, start: { line: 0, column: 0 }, end: { line: last, column: buffer.getLineLength(last) } };
  }

  private applyOperator(
    operator: Operator,
    motion: Motion | 'line',
    count: number,
    hasCount: boolean,
  ): InputResult {
    const range = this.operatorRange(operator, motion, count, hasCount);
    if (!range) return this.result();
    const { buffer, cursors, register } = this.ctx;
    const origin = cursors.position;

    if (operator === 'yank') {
      register.set(range.text, range.lines !== null);
      if (range.lines) {
        if (range.lines.first < origin.line) cursors.moveToPosition(range.lines.first, origin.column);
      } else {
        cursors.moveToPosition(range.start.line, range.start.column);
      }
      return this.result();
    }

    if (operator === 'change' && range.lines) {
      const { first, last } = range.lines;
      const indent = leadingIndent(buffer.getLine(first));
      register.set(range.text, true);
      this.deleteRange(
        { line: first, column: indent.length },
        { line: last, column: buffer.getLineLength(last) },
      );
      this.enterInsert({ line: first, column: indent.length });
      return this.result();
    }

    register.set(range.text, range.lines !== null);
    this.deleteRange(range.start, range.end);

    if (operator === 'change') {
      this.enterInsert(range.start);
    } else if (range.lines) {
      const line = Math.min(range.lines.first, buffer.getLineCount() - 1);
      cursors.moveToPosition(line, firstNonBlankColumn(buffer.getLine(line)));
    } else {
      cursors.moveToPosition(range.start.line, range.start.column);
    }
    return this.result();
  }

  private applyAction(action: Action, count: number): InputResult {
    const { buffer, cursors, history, register } = this.ctx;
    const pos = cursors.position;
    const lineLength = buffer.getLineLength(pos.line);

    switch (action) {
      case 'deleteChar': {
        if (lineLength === 0) return this.result();
        const end = { line: pos.line, column: Math.min(pos.column + count, lineLength) };
        register.set(this.deleteRange(pos, end), false);
        return this.result();
      }
      case 'deleteCharBefore': {
        if (pos.column === 0) return this.result();
        const start = { line: pos.line, column: Math.max(0, pos.column - count) };
        register.set(this.deleteRange(start, pos), false);
        return this.result();
      }
      case 'deleteToLineEnd':
      case 'changeToLineEnd': {
        const lastLine = Math.min(pos.line + count - 1, buffer.getLineCount() - 1);
        const removed = this.deleteRange(pos, { line: lastLine, column: buffer.getLineLength(lastLine) });
        if (removed.length > 0) register.set(removed, false);
        if (action === 'changeToLineEnd') this.enterInsert(pos);
        return this.result();
      }
      case 'putAfter':
      case 'putBefore':
        this.put(action === 'putAfter', count);
        return this.result();
      case 'joinLines':
        this.joinLines(Math.max(2, count));
        return this.result();
      case 'undo': {
        for (let i = 0; i < count; i++) {
          const result = history.undo();
          if (!result.applied) return this.result({ status: result.error.message });
        }
        return this.result();
      }
      case 'insert':
        this.enterInsert(pos);
        return this.result();
      case 'append':
        this.enterInsert({ line: pos.line, column: Math.min(pos.column + 1, lineLength) });
        return this.result();
      case 'insertAtLineStart':
        this.enterInsert({ line: pos.line, column: firstNonBlankColumn(buffer.getLine(pos.line)) });
        return this.result();
      case 'appendAtLineEnd':
        this.enterInsert({ line: pos.line, column: lineLength });
        return this.result();
      case 'openBelow': {
        const indent = leadingIndent(buffer.getLine(pos.line));
        this.insertText({ line: pos.line, column: lineLength }, '\n' + indent);
        this.enterInsert({ line: pos.line + 1, column: indent.length });
        return this.result();
      }
      case 'openAbove': {
        const indent = leadingIndent(buffer.getLine(pos.line));
        this.insertText({ line: pos.line, column: 0 }, indent + '\n');
        this.enterInsert({ line: pos.line, column: indent.length });
        return this.result();
      }
      case 'visual':
        this.setMode('visual');
        cursors.startSelection();
        return this.result();
      case 'commandLine':
        this._commandLine = '';
        this.setMode('command');
        return this.result();
    }
  }

  private put(after: boolean, count: number): void {
    const { buffer, cursors, register } = this.ctx;
    if (register.isEmpty) return;
    const { text, linewise } = register.get();
    const pos = cursors.position;

    if (linewise) {
      const body = Array<string>(count).fill(text).join('\n');
      const lineLength = buffer.getLineLength(pos.line);
      if (after) {
        this.insertText({ line: pos.line, column: lineLength }, '\n' + body);
      } else {
        this.insertText({ line: pos.line, column: 0 }, body + '\n');
      }
      const target = after ? pos.line + 1 : pos.line;
      cursors.moveToPosition(target, firstNonBlankColumn(buffer.getLine(target)));
      return;
    }

    const body = text.repeat(count);
    const lineLength = buffer.getLineLength(pos.line);
    const at = after && lineLength > 0
      ? { line: pos.line, column: Math.min(pos.column + 1, lineLength) }
      : pos;
    this.insertText(at, body);
    const last = buffer.positionAt(buffer.offsetAt(at) + body.length - 1);
    cursors.moveToPosition(last.line, last.column);
  }

  private joinLines(lineCount: number): void {
    const { buffer, cursors } = this.ctx;
    const line = cursors.position.line;
    let joinColumn = cursors.position.column;

    for (let i = 1; i < lineCount && line < buffer.getLineCount() - 1; i++) {
      const current = buffer.getLine(line);
      const next = buffer.getLine(line + 1);
      const indent = leadingIndent(next).length;
      const rest = next.slice(indent);
      const separator = current.length > 0 && !/\s$/.test(current) && rest.length > 0 && !rest.startsWith(')')
        ? ' '
        : '';
      this.deleteRange({ line, column: current.length }, { line: line + 1, column: indent });
      if (separator) this.insertText({ line, column: current.length }, separator);
      joinColumn = current.length;
    }
    cursors.moveToPosition(line, joinColumn);
  }

  // -- Visual mode ---------------------------------------------------------

  private visualKey(key: string): InputResult {
    if (!this.parser.isPending) {
      switch (key) {
        case 'v':
          this.setMode('normal');
          return this.result();
        case 'd':
        case 'x':
          return this.visualOperator('delete');
        case 'c':
          return this.visualOperator('change');
        case 'y':
          return this.visualOperator('yank');
      }
    }

    const step = this.parser.feed(key);
    switch (step.status) {
      case 'pending':
        return this.result({ pending: true });
      case 'invalid':
        return { handled: false, mode: this._mode, reason: 'invalid' };
      case 'complete': {
        const { command } = step;
        if (command.kind !== 'move') return { handled: false, mode: this._mode, reason: 'invalid' };
        this.applyMove(command.motion, command.count, command.hasCount, true);
        return this.result();
      }
    }
  }

  private visualOperator(operator: Operator): InputResult {
    const { buffer, cursors, history, register } = this.ctx;
    const { start, end } = this.visualRange();

    if (operator === 'yank') {
      register.set(buffer.getTextRange(buffer.offsetAt(start), buffer.offsetAt(end)), false);
      this.setMode('normal');
      cursors.moveToPosition(start.line, start.column);
      return this.result();
    }

    history.closeGroup();
    history.transact(cursors.snapshot(), () => {
      register.set(this.deleteRange(start, end), false);
    });
    if (operator === 'change') {
      this.enterInsert(start);
    } else {
      this.setMode('normal');
      cursors.moveToPosition(start.line, start.column);
    }
    return this.result();
  }

  // -- Insert mode ---------------------------------------------------------

  private tabText(): string {
    const { settings } = this.ctx;
    return settings.get('editor.insertSpaces') ? ' '.repeat(settings.get('editor.tabSize')) : '\t';
  }

  /**
   * Run `edit` at every cursor. With several cursors the edits form one
   * history group per keystroke and run from the last offset to the first,
   * so the offsets still to be edited never move.
   */
  private editAtCursors(edit: (pos: Position) => void): InputResult {
    const { buffer, cursors, history } = this.ctx;
    if (cursors.cursors.length === 1) {
      edit(cursors.position);
      return this.result();
    }
    const before = cursors.snapshot();
    const offsets = [...new Set(before.map((c) => buffer.offsetAt(c)))].sort((a, b) => b - a);
    history.transact(before, () => {
      for (const offset of offsets) edit(buffer.positionAt(offset));
    });
    return this.result();
  }

  private insertAtCursors(text: (pos: Position) => string): InputResult {
    return this.editAtCursors((pos) => this.insertText(pos, text(pos)));
  }

  private backspaceAt(pos: Position): void {
    if (pos.column > 0) {
      this.deleteRange({ line: pos.line, column: pos.column - 1 }, pos);
    } else if (pos.line > 0) {
      const above = pos.line - 1;
      this.deleteRange({ line: above, column: this.ctx.buffer.getLineLength(above) }, pos);
    }
  }

  private forwardDeleteAt(pos: Position): void {
    const { buffer } = this.ctx;
    const len = buffer.getLineLength(pos.line);
    if (pos.column < len) {
      this.deleteRange(pos, { line: pos.line, column: pos.column + 1 });
    } else if (pos.line < buffer.getLineCount() - 1) {
      this.deleteRange(pos, { line: pos.line + 1, column: 0 });
    }
  }

  private insertArrow(event: KeyEvent): InputResult {
    const { cursors, history } = this.ctx;
    history.closeGroup();
    switch (event.key) {
      case 'ArrowLeft':
        cursors.move('backward', 'character');
        break;
      case 'ArrowRight':
        cursors.move('forward', 'character');
        break;
      case 'ArrowUp':
        cursors.move('backward', 'line');
        break;
      case 'ArrowDown':
        cursors.move('forward', 'line');
        break;
      default:
        return { handled: false, mode: this._mode, reason: 'ignored' };
    }
    return this.result();
  }

  // -- Recorded edits ------------------------------------------------------

  private insertText(position: Position, text: string): void {
    const { buffer, cursors, history } = this.ctx;
    const before = cursors.snapshot();
    const op = buffer.insert(position, text);
    history.record(op, before);
  }

  /** Delete [start, end) and return the removed text. */
  private deleteRange(start: Position, end: Position): string {
    const { buffer, cursors, history } = this.ctx;
    const before = cursors.snapshot();
    const { removed, operation } = buffer.delete({ start, end });
    history.record(operation, before);
    return removed;
  }
}

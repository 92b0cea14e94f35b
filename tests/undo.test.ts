import { describe, expect, test } from 'vitest';
import { TextBuffer } from '../core/buffer/text-buffer';
import { CursorManager, type CursorState } from '../core/cursor/cursor-manager';
import { computeInverseOperations, isContiguous, isWordText } from '../core/history/operation';
import { UndoManager } from '../core/history/undo-manager';

function makeCursorState(line: number, col: number): CursorState {
  return { line, column: col, selectionAnchor: null, desiredColumn: col };
}

function setup(text: string) {
  const buf = new TextBuffer(text);
  const cursors = new CursorManager(buf);
  const history = new UndoManager(buf, cursors);

  /** Type characters at the primary cursor, one recorded insert each. */
  const type = (chars: string) => {
    for (const ch of chars) {
      const before = cursors.snapshot();
      history.record(buf.insert(cursors.position, ch), before);
    }
  };

  /** Delete the character before the primary cursor. */
  const backspace = () => {
    const before = cursors.snapshot();
    const pos = cursors.position;
    const { operation } = buf.delete({ start: { line: pos.line, column: pos.column - 1 }, end: pos });
    history.record(operation, before);
  };

  return { buf, cursors, history, type, backspace };
}

describe('operation helpers', () => {
  test('inverse operations run in reverse order', () => {
    const ops = [
      { kind: 'insert' as const, offset: 0, text: 'a', position: { line: 0, column: 0 } },
      { kind: 'delete' as const, offset: 3, text: 'b', position: { line: 0, column: 3 } },
    ];
    const inverse = computeInverseOperations({ operations: ops, cursorsBefore: [], cursorsAfter: [] });
    expect(inverse.map((op) => [op.kind, op.offset, op.text])).toEqual([
      ['insert', 3, 'b'],
      ['delete', 0, 'a'],
    ]);
  });

  test('word text and contiguity', () => {
    expect(isWordText('abc')).toBe(true);
    expect(isWordText('a b')).toBe(false);
    expect(isWordText('\n')).toBe(false);
    const at = (kind: 'insert' | 'delete', offset: number, text: string) =>
      ({ kind, offset, text, position: { line: 0, column: offset } });
    expect(isContiguous(at('insert', 2, 'ab'), at('insert', 4, 'c'))).toBe(true);
    expect(isContiguous(at('insert', 2, 'ab'), at('insert', 3, 'c'))).toBe(false);
    expect(isContiguous(at('delete', 5, 'x'), at('delete', 4, 'y'))).toBe(true);
    expect(isContiguous(at('delete', 5, 'x'), at('delete', 5, 'y'))).toBe(true);
    expect(isContiguous(at('insert', 5, 'x'), at('delete', 5, 'x'))).toBe(false);
  });
});

describe('UndoManager', () => {
  test('typing a word is one group; undo restores text and cursor', () => {
    const { buf, cursors, history, type } = setup('hello');
    cursors.moveToPosition(0, 5);
    type('abc');
    expect(buf.getText()).toBe('helloabc');
    expect(history.undoDepth).toBe(1);

    const result = history.undo();
    expect(buf.getText()).toBe('hello');
    expect(result).toEqual({ applied: true, cursors: [makeCursorState(0, 5)] });
  });

  test('round trip: N groups undone N times restore content and cursors', () => {
    const { buf, cursors, history, type, backspace } = setup('one\ntwo');
    const initialCursors = cursors.snapshot();

    cursors.moveToPosition(1, 3);
    type('s');
    history.closeGroup();
    cursors.moveToPosition(0, 0);
    type('>\n');
    history.closeGroup();
    cursors.moveToPosition(2, 4);
    backspace();
    backspace();
    expect(buf.getText()).toBe('>\none\ntw');
    expect(history.undoDepth).toBe(4);

    for (let i = 0; i < 4; i++) expect(history.undo().applied).toBe(true);
    expect(buf.getText()).toBe('one\ntwo');
    cursors.restore(initialCursors);
    expect(cursors.position).toEqual({ line: 0, column: 0 });
    expect(history.canUndo).toBe(false);
  });

  test('typing "abc def" then undo removes "def"', () => {
    const { buf, history, type } = setup('');
    type('abc def');
    expect(history.undoDepth).toBe(3);
    history.undo();
    expect(buf.getText()).toBe('abc ');
    history.undo();
    expect(buf.getText()).toBe('abc');
    history.undo();
    expect(buf.getText()).toBe('');
  });

  test('consecutive backspaces form one group', () => {
    const { buf, cursors, history, type, backspace } = setup('');
    type('abc');
    history.closeGroup();
    backspace();
    backspace();
    expect(buf.getText()).toBe('a');
    expect(history.undoDepth).toBe(2);
    history.undo();
    expect(buf.getText()).toBe('abc');
    expect(cursors.position).toEqual({ line: 0, column: 3 });
  });

  test('a jump of the cursor starts a new group', () => {
    const { buf, cursors, history, type } = setup('xy');
    type('a');
    cursors.moveToPosition(0, 3);
    type('b');
    expect(buf.getText()).toBe('axyb');
    expect(history.undoDepth).toBe(2);
  });

  test('redo(undo(G)) reproduces the state after G', () => {
    const { buf, cursors, history, type } = setup('base');
    cursors.moveToPosition(0, 4);
    type('line');
    const after = cursors.snapshot();

    history.undo();
    expect(buf.getText()).toBe('base');
    const redo = history.redo();
    expect(buf.getText()).toBe('baseline');
    expect(redo).toEqual({ applied: true, cursors: after });
  });

  test('a new edit after undo clears redo', () => {
    const { buf, history, type } = setup('');
    type('one');
    history.undo();
    type('x');
    const result = history.redo();
    expect(result.applied).toBe(false);
    if (!result.applied) {
      expect(result.reason).toBe('EmptyHistory');
      expect(result.error.message).toBe('Already at newest change');
      expect(result.error.code).toBe('EmptyHistory');
    }
    expect(buf.getText()).toBe('x');
  });

  test('undo on empty history reports instead of throwing', () => {
    const { history } = setup('abc');
    const result = history.undo();
    expect(result.applied).toBe(false);
    if (!result.applied) expect(result.error.message).toBe('Already at oldest change');
  });

  test('transact groups everything and restores the cursors from before it', () => {
    const { buf, cursors, history } = setup('aaa\nbbb');
    cursors.moveToPosition(1, 1);
    const before = cursors.snapshot();
    history.transact(before, () => {
      for (const line of [0, 1]) {
        const snapshot = cursors.snapshot();
        history.record(buf.insert({ line, column: 0 }, '# '), snapshot);
      }
    });
    expect(buf.getText()).toBe('# aaa\n# bbb');
    expect(history.undoDepth).toBe(1);

    const result = history.undo();
    expect(buf.getText()).toBe('aaa\nbbb');
    expect(result).toEqual({ applied: true, cursors: [makeCursorState(1, 1)] });
  });

  test('closeGroup inside a transaction has no effect', () => {
    const { buf, history } = setup('');
    history.transact([makeCursorState(0, 0)], () => {
      history.record(buf.insert({ line: 0, column: 0 }, 'a'), [makeCursorState(0, 0)]);
      history.closeGroup();
      history.record(buf.insert({ line: 0, column: 1 }, ' b'), [makeCursorState(0, 1)]);
    });
    expect(history.undoDepth).toBe(1);
  });

  test('max depth drops the oldest groups', () => {
    const { history, type } = setup('');
    for (const word of ['a', ' ', 'b', ' ', 'c']) type(word);
    expect(history.undoDepth).toBe(5);
    history.setMaxDepth(2);
    expect(history.undoDepth).toBe(2);
  });

  test('clear empties both stacks', () => {
    const { history, type } = setup('');
    type('ab');
    history.undo();
    history.clear();
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
  });
});

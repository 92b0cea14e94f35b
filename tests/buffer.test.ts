import { describe, expect, test } from 'vitest';
import { LineTree } from '../core/buffer/line-tree';
import { TextBuffer, type BufferChange } from '../core/buffer/text-buffer';
import { OutOfBoundsError } from '../core/errors';

function numberedLines(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `line ${i}`);
}

describe('LineTree', () => {
  test('small documents live in one leaf', () => {
    const tree = new LineTree(['ab', 'c']);
    expect(tree.lineCount).toBe(2);
    expect(tree.length).toBe(4);
    expect(tree.depth).toBe(1);
  });

  test('large documents are balanced', () => {
    const tree = new LineTree(numberedLines(1000));
    expect(tree.lineCount).toBe(1000);
    expect(tree.depth).toBe(2);
    expect(tree.getLine(0)).toBe('line 0');
    expect(tree.getLine(999)).toBe('line 999');
    expect(new LineTree(numberedLines(5000)).depth).toBe(3);
  });

  test('offsetOfLine and lineAtOffset agree across leaves', () => {
    const lines = numberedLines(300);
    const tree = new LineTree(lines);
    let offset = 0;
    for (let i = 0; i < lines.length; i++) {
      expect(tree.offsetOfLine(i)).toBe(offset);
      expect(tree.lineAtOffset(offset)).toEqual({ line: i, column: 0 });
      offset += lines[i].length + 1;
    }
    expect(tree.lineAtOffset(tree.length)).toEqual({ line: 299, column: 8 });
  });

  test('splice inserts enough lines to split leaves', () => {
    const tree = new LineTree(['first', 'last']);
    tree.splice(1, 0, numberedLines(200));
    expect(tree.lineCount).toBe(202);
    expect(tree.depth).toBe(2);
    expect(tree.getLine(0)).toBe('first');
    expect(tree.getLine(1)).toBe('line 0');
    expect(tree.getLine(200)).toBe('line 199');
    expect(tree.getLine(201)).toBe('last');
  });

  test('splice deletes across leaves', () => {
    const tree = new LineTree(numberedLines(500));
    tree.splice(10, 480, ['joined']);
    expect(tree.lineCount).toBe(21);
    expect(tree.getLine(9)).toBe('line 9');
    expect(tree.getLine(10)).toBe('joined');
    expect(tree.getLine(11)).toBe('line 490');
    expect(tree.toArray().join('\n')).toBe(
      [...numberedLines(10), 'joined', ...numberedLines(500).slice(490)].join('\n'),
    );
  });

  test('replacing every line collapses the tree', () => {
    const tree = new LineTree(numberedLines(500));
    tree.splice(0, 500, ['only']);
    expect(tree.toArray()).toEqual(['only']);
    expect(tree.depth).toBe(1);
    expect(tree.length).toBe(4);
  });

  test('rejects splices outside the document', () => {
    const tree = new LineTree(['a']);
    expect(() => tree.splice(1, 1, [])).toThrow(RangeError);
  });
});

describe('TextBuffer', () => {
  describe('construction', () => {
    test('empty buffer', () => {
      const buf = new TextBuffer();
      expect(buf.getText()).toBe('');
      expect(buf.getLength()).toBe(0);
      expect(buf.getLineCount()).toBe(1); // always at least 1 line
    });

    test('multiple lines', () => {
      const buf = new TextBuffer('line1\nline2\nline3');
      expect(buf.getText()).toBe('line1\nline2\nline3');
      expect(buf.getLineCount()).toBe(3);
      expect(buf.getLength()).toBe(17);
    });

    test('normalizes \\r\\n and \\r to \\n', () => {
      const buf = new TextBuffer('a\r\nb\rc');
      expect(buf.getText()).toBe('a\nb\nc');
      expect(buf.getLineCount()).toBe(3);
    });

    test('trailing newline', () => {
      const buf = new TextBuffer('hello\n');
      expect(buf.getLineCount()).toBe(2);
      expect(buf.getLine(0)).toBe('hello');
      expect(buf.getLine(1)).toBe('');
    });
  });

  describe('insert', () => {
    test('insert into the middle of a line', () => {
      const buf = new TextBuffer('hello world');
      const op = buf.insert({ line: 0, column: 5 }, ',');
      expect(buf.getText()).toBe('hello, world');
      expect(op).toEqual({ kind: 'insert', offset: 5, text: ',', position: { line: 0, column: 5 } });
    });

    test('multi-line insert', () => {
      const buf = new TextBuffer('ad');
      buf.insert({ line: 0, column: 1 }, 'b\nc');
      expect(buf.getText()).toBe('ab\ncd');
      expect(buf.getLineCount()).toBe(2);
    });

    test('insert normalizes line endings', () => {
      const buf = new TextBuffer('');
      const op = buf.insert({ line: 0, column: 0 }, 'x\r\ny');
      expect(op.text).toBe('x\ny');
      expect(buf.getLine(1)).toBe('y');
    });

    test('empty insert is a no-op', () => {
      const buf = new TextBuffer('abc');
      buf.insert({ line: 0, column: 1 }, '');
      expect(buf.version).toBe(0);
    });

    test('invalid position throws OutOfBoundsError', () => {
      const buf = new TextBuffer('abc');
      expect(() => buf.insert({ line: 0, column: 4 }, 'x')).toThrow(OutOfBoundsError);
      expect(() => buf.insert({ line: 1, column: 0 }, 'x')).toThrow(
        'Position 1:0 is outside the document',
      );
      expect(buf.getText()).toBe('abc');
    });
  });

  describe('delete', () => {
    test('delete within a line', () => {
      const buf = new TextBuffer('hello world');
      const result = buf.delete({ start: { line: 0, column: 5 }, end: { line: 0, column: 11 } });
      expect(buf.getText()).toBe('hello');
      expect(result.removed).toBe(' world');
      expect(result.operation).toEqual({
        kind: 'delete', offset: 5, text: ' world', position: { line: 0, column: 5 },
      });
      expect(result.inverse.kind).toBe('insert');
    });

    test('delete across lines', () => {
      const buf = new TextBuffer('one\ntwo\nthree');
      const { removed } = buf.delete({ start: { line: 0, column: 2 }, end: { line: 2, column: 1 } });
      expect(removed).toBe('e\ntwo\nt');
      expect(buf.getText()).toBe('onhree');
    });

    test('reversed range throws', () => {
      const buf = new TextBuffer('abc');
      expect(() =>
        buf.delete({ start: { line: 0, column: 2 }, end: { line: 0, column: 1 } }),
      ).toThrow('Range start 0:2 is after end 0:1');
    });

    test('clamp option limits the end to the document', () => {
      const buf = new TextBuffer('abc\nde');
      const { removed } = buf.delete(
        { start: { line: 1, column: 0 }, end: { line: 5, column: 0 } },
        { clamp: true },
      );
      expect(removed).toBe('de');
      expect(buf.getText()).toBe('abc\n');
    });
  });

  describe('applyOperation', () => {
    test('replays inserts and deletes by offset', () => {
      const buf = new TextBuffer('abc\ndef');
      const { operation } = buf.delete({ start: { line: 0, column: 2 }, end: { line: 1, column: 1 } });
      expect(buf.getText()).toBe('abef');
      buf.applyOperation({ ...operation, kind: 'insert' });
      expect(buf.getText()).toBe('abc\ndef');
      buf.applyOperation(operation);
      expect(buf.getText()).toBe('abef');
    });

    test('a delete whose text does not match throws', () => {
      const buf = new TextBuffer('abc');
      expect(() =>
        buf.applyOperation({ kind: 'delete', offset: 0, text: 'x', position: { line: 0, column: 0 } }),
      ).toThrow('Text at offset 0 does not match the operation');
    });
  });

  describe('positions and offsets', () => {
    const buf = new TextBuffer('ab\ncde\n\nf');

    test('offsetAt / positionAt', () => {
      expect(buf.offsetAt({ line: 1, column: 2 })).toBe(5);
      expect(buf.positionAt(5)).toEqual({ line: 1, column: 2 });
      expect(buf.positionAt(2)).toEqual({ line: 0, column: 2 });
      expect(buf.positionAt(3)).toEqual({ line: 1, column: 0 });
      expect(buf.positionAt(7)).toEqual({ line: 2, column: 0 });
      expect(buf.positionAt(9)).toEqual({ line: 3, column: 1 });
    });

    test('out of range offsets throw', () => {
      expect(() => buf.positionAt(10)).toThrow('Offset 10 is outside [0, 9]');
      expect(() => buf.positionAt(-1)).toThrow(OutOfBoundsError);
    });

    test('getTextRange clamps', () => {
      expect(buf.getTextRange(1, 4)).toBe('b\nc');
      expect(buf.getTextRange(-5, 2)).toBe('ab');
      expect(buf.getTextRange(8, 100)).toBe('f');
    });

    test('clampPosition', () => {
      expect(buf.clampPosition({ line: 1, column: 10 })).toEqual({ line: 1, column: 3 });
      expect(buf.clampPosition({ line: 9, column: 0 })).toEqual({ line: 3, column: 1 });
      expect(buf.clampPosition({ line: -1, column: -1 })).toEqual({ line: 0, column: 0 });
    });

    test('line offsets', () => {
      expect(buf.getLineOffset(2)).toBe(7);
      expect(buf.getOffsetLine(8)).toBe(3);
      expect(buf.getLine(7)).toBe('');
    });
  });

  describe('change notification', () => {
    test('listeners see pre-mutation coordinates and a bumped version', () => {
      const buf = new TextBuffer('abc\ndef');
      const changes: BufferChange[] = [];
      const off = buf.onDidChange((c) => changes.push(c));

      buf.delete({ start: { line: 0, column: 1 }, end: { line: 1, column: 1 } });
      expect(changes).toEqual([{
        version: 1,
        offset: 1,
        start: { line: 0, column: 1 },
        oldEnd: { line: 1, column: 1 },
        removedText: 'bc\nd',
        insertedText: '',
      }]);

      off();
      buf.insert({ line: 0, column: 0 }, 'x');
      expect(changes).toHaveLength(1);
      expect(buf.version).toBe(2);
    });

    test('setText is a single change', () => {
      const buf = new TextBuffer('one\ntwo');
      const changes: BufferChange[] = [];
      buf.onDidChange((c) => changes.push(c));
      buf.setText('three');
      expect(changes).toHaveLength(1);
      expect(changes[0].removedText).toBe('one\ntwo');
      expect(changes[0].insertedText).toBe('three');
      expect(buf.getText()).toBe('three');
    });
  });

  test('snapshots are immutable', () => {
    const buf = new TextBuffer('hello\nworld');
    const snap = buf.snapshot();
    buf.insert({ line: 0, column: 0 }, 'x');
    expect(snap.getText()).toBe('hello\nworld');
    expect(snap.version).toBe(0);
    expect(snap.length).toBe(11);
    expect(snap.getLine(1)).toBe('world');
    expect(buf.snapshot().version).toBe(1);
  });
});

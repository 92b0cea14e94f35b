import { describe, expect, test } from 'vitest';
import { MAX_COUNT, VimParser, type ParseStep } from '../core/modal/vim-parser';
import { categorizeKey, keysFromText } from '../core/modal/keys';

function feedAll(parser: VimParser, keys: string): ParseStep[] {
  return [...keys].map((k) => parser.feed(k));
}

function lastStep(keys: string): ParseStep {
  const steps = feedAll(new VimParser(), keys);
  return steps[steps.length - 1];
}

describe('VimParser', () => {
  test('a bare motion completes immediately', () => {
    expect(lastStep('w')).toEqual({
      status: 'complete',
      command: {
        kind: 'move',
        motion: { kind: 'unit', direction: 'forward', unit: 'word', linewise: false, inclusive: false },
        count: 1,
        hasCount: false,
      },
    });
  });

  test('counts multiply across the operator', () => {
    const parser = new VimParser();
    const steps = feedAll(parser, '2d2fe');
    expect(steps.slice(0, 4)).toEqual([
      { status: 'pending' },
      { status: 'pending' },
      { status: 'pending' },
      { status: 'pending' },
    ]);
    expect(steps[4]).toEqual({
      status: 'complete',
      command: {
        kind: 'operator',
        operator: 'delete',
        motion: { kind: 'find', char: 'e', direction: 'forward', till: false },
        count: 4,
        hasCount: true,
      },
    });
    expect(parser.isPending).toBe(false);
  });

  test('a doubled operator is linewise', () => {
    expect(lastStep('3dd')).toEqual({
      status: 'complete',
      command: { kind: 'operator', operator: 'delete', motion: 'line', count: 3, hasCount: true },
    });
    expect(lastStep('yy')).toEqual({
      status: 'complete',
      command: { kind: 'operator', operator: 'yank', motion: 'line', count: 1, hasCount: false },
    });
  });

  test('0 is a motion unless it continues a count', () => {
    const zero = lastStep('0');
    expect(zero.status === 'complete' && zero.command.kind === 'move' && zero.command.motion).toEqual({
      kind: 'unit', direction: 'backward', unit: 'lineBoundary', linewise: false, inclusive: false,
    });
    const ten = lastStep('10x');
    expect(ten).toEqual({ status: 'complete', command: { kind: 'action', action: 'deleteChar', count: 10 } });
  });

  test('counts are capped', () => {
    expect(lastStep('99999999999x')).toEqual({
      status: 'complete',
      command: { kind: 'action', action: 'deleteChar', count: MAX_COUNT },
    });
    const step = lastStep('200d300w');
    expect(step.status === 'complete' && step.command.kind === 'operator' && step.command.count).toBe(10000);
  });

  test('g prefixes', () => {
    expect(lastStep('gg')).toEqual({
      status: 'complete',
      command: { kind: 'move', motion: { kind: 'goto', target: 'first' }, count: 1, hasCount: false },
    });
    expect(lastStep('5G')).toEqual({
      status: 'complete',
      command: { kind: 'move', motion: { kind: 'goto', target: 'last' }, count: 5, hasCount: true },
    });
    expect(lastStep('gq')).toEqual({ status: 'invalid', keys: 'gq' });
  });

  test('invalid sequences reset the parser', () => {
    const parser = new VimParser();
    feedAll(parser, 'd');
    expect(parser.pendingKeys).toBe('d');
    expect(parser.hasOperator).toBe(true);
    expect(parser.feed('y')).toEqual({ status: 'invalid', keys: 'dy' });
    expect(parser.isPending).toBe(false);
    expect(lastStep('dx')).toEqual({ status: 'invalid', keys: 'dx' });
    expect(lastStep('Q')).toEqual({ status: 'invalid', keys: 'Q' });
  });

  test('the key after f is taken literally', () => {
    expect(lastStep('tw')).toEqual({
      status: 'complete',
      command: {
        kind: 'move',
        motion: { kind: 'find', char: 'w', direction: 'forward', till: true },
        count: 1,
        hasCount: false,
      },
    });
  });
});

describe('keys', () => {
  test('categorizeKey', () => {
    expect(categorizeKey({ key: 'a' })).toBe('character');
    expect(categorizeKey({ key: ' ' })).toBe('character');
    expect(categorizeKey({ key: 'Escape' })).toBe('escape');
    expect(categorizeKey({ key: '[', ctrlKey: true })).toBe('escape');
    expect(categorizeKey({ key: 'r', ctrlKey: true })).toBe('control');
    expect(categorizeKey({ key: 'ArrowUp' })).toBe('arrow');
    expect(categorizeKey({ key: 'F1' })).toBe('other');
    expect(categorizeKey({ key: 'constructor' })).toBe('other');
    expect(categorizeKey({ key: 'x', altKey: true })).toBe('other');
  });

  test('keysFromText maps newlines and tabs', () => {
    expect(keysFromText('a\n\t')).toEqual([{ key: 'a' }, { key: 'Enter' }, { key: 'Tab' }]);
  });
});

/**
 * Normal-mode key sequence parser.
 *
 * Grammar: [count] motion | [count] operator [count] (motion | operator)
 * | [count] action. A doubled operator (dd, cc, yy) is linewise over
 * `count` lines. Keys are fed one at a time; the parser reports whether the
 * sequence is still pending, complete or invalid. Invalid sequences reset.
 */

import type { MotionDirection, MotionUnit } from '../cursor/motions';

export type Operator = 'delete' | 'change' | 'yank';

export type Motion =
  | {
      kind: 'unit';
      direction: MotionDirection;
      unit: MotionUnit;
      /** Operators act on whole lines (j, k). */
      linewise: boolean;
      /** The target character is part of an operator's range (e, $). */
      inclusive: boolean;
    }
  | { kind: 'find'; char: string; direction: MotionDirection; till: boolean }
  /** gg / G: with a count, go to that line. */
  | { kind: 'goto'; target: 'first' | 'last' };

export type Action =
  | 'deleteChar'
  | 'deleteCharBefore'
  | 'deleteToLineEnd'
  | 'changeToLineEnd'
  | 'putAfter'
  | 'putBefore'
  | 'joinLines'
  | 'undo'
  | 'insert'
  | 'append'
  | 'insertAtLineStart'
  | 'appendAtLineEnd'
  | 'openBelow'
  | 'openAbove'
  | 'visual'
  | 'commandLine';

export type NormalCommand =
  | { kind: 'move'; motion: Motion; count: number; hasCount: boolean }
  | { kind: 'operator'; operator: Operator; motion: Motion | 'line'; count: number; hasCount: boolean }
  | { kind: 'action'; action: Action; count: number };

export type ParseStep =
  | { status: 'pending' }
  | { status: 'complete'; command: NormalCommand }
  | { status: 'invalid'; keys: string };

function unit(
  direction: MotionDirection,
  u: MotionUnit,
  flags: { linewise?: boolean; inclusive?: boolean } = {},
): Motion {
  return {
    kind: 'unit',
    direction,
    unit: u,
    linewise: flags.linewise ?? false,
    inclusive: flags.inclusive ?? false,
  };
}

const MOTIONS: ReadonlyMap<string, Motion> = new Map<string, Motion>([
  ['h', unit('backward', 'character')],
  ['l', unit('forward', 'character')],
  [' ', unit('forward', 'character')],
  ['j', unit('forward', 'line', { linewise: true })],
  ['k', unit('backward', 'line', { linewise: true })],
  ['w', unit('forward', 'word')],
  ['W', unit('forward', 'bigWord')],
  ['b', unit('backward', 'word')],
  ['B', unit('backward', 'bigWord')],
  ['e', unit('forward', 'wordEnd', { inclusive: true })],
  ['E', unit('forward', 'bigWordEnd', { inclusive: true })],
  ['0', unit('backward', 'lineBoundary')],
  ['^', unit('backward', 'firstNonBlank')],
  ['$', unit('forward', 'lineBoundary', { inclusive: true })],
  ['{', unit('backward', 'paragraph')],
  ['}', unit('forward', 'paragraph')],
  ['G', { kind: 'goto', target: 'last' }],
]);

/** Second key after `g`. */
const G_MOTIONS: ReadonlyMap<string, Motion> = new Map<string, Motion>([
  ['g', { kind: 'goto', target: 'first' }],
  ['e', unit('backward', 'wordEnd', { inclusive: true })],
  ['E', unit('backward', 'bigWordEnd', { inclusive: true })],
]);

interface FindSpec {
  direction: MotionDirection;
  till: boolean;
}

const FINDS: ReadonlyMap<string, FindSpec> = new Map<string, FindSpec>([
  ['f', { direction: 'forward', till: false }],
  ['F', { direction: 'backward', till: false }],
  ['t', { direction: 'forward', till: true }],
  ['T', { direction: 'backward', till: true }],
]);

const OPERATORS: ReadonlyMap<string, Operator> = new Map<string, Operator>([
  ['d', 'delete'],
  ['c', 'change'],
  ['y', 'yank'],
]);

const ACTIONS: ReadonlyMap<string, Action> = new Map<string, Action>([
  ['x', 'deleteChar'],
  ['X', 'deleteCharBefore'],
  ['D', 'deleteToLineEnd'],
  ['C', 'changeToLineEnd'],
  ['p', 'putAfter'],
  ['P', 'putBefore'],
  ['J', 'joinLines'],
  ['u', 'undo'],
  ['i', 'insert'],
  ['a', 'append'],
  ['I', 'insertAtLineStart'],
  ['A', 'appendAtLineEnd'],
  ['o', 'openBelow'],
  ['O', 'openAbove'],
  ['v', 'visual'],
  [':', 'commandLine'],
]);

/** Largest count a command takes; longer digit runs are clamped to it. */
export const MAX_COUNT = 10000;

export class VimParser {
  private keys = '';
  private countDigits = '';
  private operatorCountDigits = '';
  private operator: { key: string; op: Operator } | null = null;
  private prefix: 'g' | FindSpec | null = null;

  /** Keys typed so far in the current sequence. */
  get pendingKeys(): string {
    return this.keys;
  }

  get isPending(): boolean {
    return this.keys.length > 0;
  }

  /** True when the next key completes a motion rather than a command. */
  get hasOperator(): boolean {
    return this.operator !== null;
  }

  reset(): void {
    this.keys = '';
    this.countDigits = '';
    this.operatorCountDigits = '';
    this.operator = null;
    this.prefix = null;
  }

  feed(key: string): ParseStep {
    this.keys += key;

    if (this.prefix === 'g') {
      this.prefix = null;
      const motion = G_MOTIONS.get(key);
      return motion ? this.completeMotion(motion) : this.invalid();
    }
    if (this.prefix) {
      const { direction, till } = this.prefix;
      this.prefix = null;
      return this.completeMotion({ kind: 'find', char: key, direction, till });
    }

    if (/^[0-9]$/.test(key) && (key !== '0' || this.currentDigits().length > 0)) {
      if (this.operator) this.operatorCountDigits += key;
      else this.countDigits += key;
      return { status: 'pending' };
    }

    const operator = OPERATORS.get(key);
    if (operator) {
      if (!this.operator) {
        this.operator = { key, op: operator };
        return { status: 'pending' };
      }
      if (this.operator.key === key) {
        const { count, hasCount } = this.count();
        return this.complete({ kind: 'operator', operator, motion: 'line', count, hasCount });
      }
      return this.invalid();
    }

    if (key === 'g') {
      this.prefix = 'g';
      return { status: 'pending' };
    }

    const find = FINDS.get(key);
    if (find) {
      this.prefix = find;
      return { status: 'pending' };
    }

    const motion = MOTIONS.get(key);
    if (motion) return this.completeMotion(motion);

    const action = ACTIONS.get(key);
    if (action && !this.operator) {
      return this.complete({ kind: 'action', action, count: this.count().count });
    }

    return this.invalid();
  }

  private currentDigits(): string {
    return this.operator ? this.operatorCountDigits : this.countDigits;
  }

  private count(): { count: number; hasCount: boolean } {
    const hasCount = this.countDigits.length > 0 || this.operatorCountDigits.length > 0;
    const outer = this.countDigits.length > 0 ? parseInt(this.countDigits, 10) : 1;
    const inner = this.operatorCountDigits.length > 0 ? parseInt(this.operatorCountDigits, 10) : 1;
    return { count: Math.min(outer * inner, MAX_COUNT), hasCount };
  }

  private completeMotion(motion: Motion): ParseStep {
    const { count, hasCount } = this.count();
    if (this.operator) {
      return this.complete({ kind: 'operator', operator: this.operator.op, motion, count, hasCount });
    }
    return this.complete({ kind: 'move', motion, count, hasCount });
  }

  private complete(command: NormalCommand): ParseStep {
    this.reset();
    return { status: 'complete', command };
  }

  private invalid(): ParseStep {
    const keys = this.keys;
    this.reset();
    return { status: 'invalid', keys };
  }
}

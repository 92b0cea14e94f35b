/**
 * Operation group: ordered edit operations + cursor state before/after.
 */

import { createOperation, type EditOperation } from '../buffer/text-buffer';
import type { CursorState } from '../cursor/cursor-manager';

export interface OperationGroup {
  /** Operations in the order they were applied. */
  operations: EditOperation[];
  /** Cursor state before the first operation (restored on undo). */
  cursorsBefore: CursorState[];
  /** Cursor state after the last operation (restored on redo). */
  cursorsAfter: CursorState[];
}

/** The operation that undoes `op`: an insert becomes a delete and vice versa. */
export function invertOperation(op: EditOperation): EditOperation {
  return createOperation(op.kind === 'insert' ? 'delete' : 'insert', op.offset, op.text, op.position);
}

/** Inverse operations of a group, in the order they must be applied. */
export function computeInverseOperations(group: OperationGroup): EditOperation[] {
  const inverse: EditOperation[] = [];
  for (let i = group.operations.length - 1; i >= 0; i--) {
    inverse.push(invertOperation(group.operations[i]));
  }
  return inverse;
}

/** A maximal run of non-whitespace characters, the unit that typing groups by. */
export function isWordText(text: string): boolean {
  return text.length > 0 && !/\s/.test(text);
}

/**
 * Whether `next` continues `last` without a gap: typing forward, or
 * deleting backward (Backspace) or in place (x, Delete).
 */
export function isContiguous(last: EditOperation, next: EditOperation): boolean {
  if (last.kind !== next.kind) return false;
  if (next.kind === 'insert') return next.offset === last.offset + last.text.length;
  return next.offset + next.text.length === last.offset || next.offset === last.offset;
}

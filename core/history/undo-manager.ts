/**
 * Undo/redo stack management with word-based grouping.
 *
 * Record behavior:
 * 1. An applied EditOperation is appended to the open group when it has
 *    the same kind, is contiguous with the group's last operation, is part
 *    of a non-whitespace run and the cursors have not moved in between.
 * 2. Whitespace and newline edits form groups of their own.
 * 3. closeGroup() (mode changes, cursor jumps) forces a new group;
 *    transact() puts a compound command into a single group.
 * 4. Clear redo stack on new edit.
 * 5. Drop oldest group if stack exceeds maxDepth.
 */

import type { EditOperation, TextBuffer } from '../buffer/text-buffer';
import { cloneCursorState, type CursorManager, type CursorState } from '../cursor/cursor-manager';
import { positionsEqual } from '../cursor/selection';
import { EmptyHistoryError } from '../errors';
import {
  type OperationGroup,
  computeInverseOperations,
  isContiguous,
  isWordText,
} from './operation';

export type HistoryResult =
  | { applied: true; cursors: CursorState[] }
  | { applied: false; reason: 'EmptyHistory'; error: EmptyHistoryError };

export interface UndoManagerOptions {
  maxDepth?: number;
}

function sameCursors(a: readonly CursorState[], b: readonly CursorState[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((c, i) => {
    const d = b[i];
    if (c.line !== d.line || c.column !== d.column) return false;
    if (c.selectionAnchor === null || d.selectionAnchor === null) {
      return c.selectionAnchor === d.selectionAnchor;
    }
    return positionsEqual(c.selectionAnchor, d.selectionAnchor);
  });
}

export class UndoManager {
  private undoStack: OperationGroup[] = [];
  private redoStack: OperationGroup[] = [];
  private maxDepth: number;
  private groupOpen = false;
  private transactionDepth = 0;
  private transactionBefore: CursorState[] | null = null;
  private replaying = false;

  constructor(
    private readonly buffer: TextBuffer,
    private readonly cursors: CursorManager,
    options: UndoManagerOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? 10000;
  }

  /**
   * Record an applied operation for undo.
   *
   * @param cursorsBefore - Cursor state before the operation was applied.
   */
  record(op: EditOperation, cursorsBefore: readonly CursorState[]): void {
    if (this.replaying || op.text.length === 0) return;
    const cursorsAfter = this.cursors.snapshot();
    this.redoStack = [];

    const top = this.undoStack[this.undoStack.length - 1];
    if (top && this.shouldMerge(top, op, cursorsBefore)) {
      top.operations.push(op);
      top.cursorsAfter = cursorsAfter;
    } else {
      const before = this.transactionDepth > 0 && this.transactionBefore
        ? this.transactionBefore
        : cursorsBefore;
      this.undoStack.push({
        operations: [op],
        cursorsBefore: before.map(cloneCursorState),
        cursorsAfter,
      });
      this.enforceDepth();
    }

    this.groupOpen = this.transactionDepth > 0 || isWordText(op.text);
  }

  /** The next record() starts a new group. */
  closeGroup(): void {
    if (this.transactionDepth === 0) this.groupOpen = false;
  }

  /**
   * Run `fn` with every operation it records placed in one fresh group.
   */
  transact<T>(cursorsBefore: readonly CursorState[], fn: () => T): T {
    if (this.transactionDepth === 0) {
      this.groupOpen = false;
      this.transactionBefore = cursorsBefore.map(cloneCursorState);
    }
    this.transactionDepth++;
    try {
      return fn();
    } finally {
      this.transactionDepth--;
      if (this.transactionDepth === 0) {
        this.transactionBefore = null;
        this.groupOpen = false;
      }
    }
  }

  /**
   * Undo the last group: apply inverses in reverse order and restore the
   * cursors from before the group.
   */
  undo(): HistoryResult {
    const group = this.undoStack.pop();
    if (!group) return { applied: false, reason: 'EmptyHistory', error: new EmptyHistoryError('undo') };

    this.replay(computeInverseOperations(group));
    this.cursors.restore(group.cursorsBefore);
    this.redoStack.push(group);
    this.groupOpen = false;
    return { applied: true, cursors: this.cursors.snapshot() };
  }

  /**
   * Redo the last undone group and restore the cursors from after it.
   */
  redo(): HistoryResult {
    const group = this.redoStack.pop();
    if (!group) return { applied: false, reason: 'EmptyHistory', error: new EmptyHistoryError('redo') };

    this.replay(group.operations);
    this.cursors.restore(group.cursorsAfter);
    this.undoStack.push(group);
    this.groupOpen = false;
    return { applied: true, cursors: this.cursors.snapshot() };
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  setMaxDepth(depth: number): void {
    this.maxDepth = depth;
    this.enforceDepth();
  }

  /** Clear all history. */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.groupOpen = false;
  }

  private replay(operations: readonly EditOperation[]): void {
    this.replaying = true;
    try {
      for (const op of operations) this.buffer.applyOperation(op);
    } finally {
      this.replaying = false;
    }
  }

  private shouldMerge(
    top: OperationGroup,
    op: EditOperation,
    cursorsBefore: readonly CursorState[],
  ): boolean {
    if (!this.groupOpen) return false;
    if (this.transactionDepth > 0) return true;
    const last = top.operations[top.operations.length - 1];
    if (!last || !isWordText(op.text)) return false;
    if (!isContiguous(last, op)) return false;
    return sameCursors(cursorsBefore, top.cursorsAfter);
  }

  private enforceDepth(): void {
    while (this.undoStack.length > this.maxDepth) {
      this.undoStack.shift();
    }
  }
}

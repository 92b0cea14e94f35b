/**
 * Error taxonomy for the editing core.
 *
 * None of these are fatal. Buffer and cursor code throw OutOfBoundsError
 * synchronously; EmptyHistory is only ever surfaced as a status code; the
 * highlighting pipeline stores ParseFailureError in its published state.
 */

import type { Position } from './cursor/selection';

export type EditorErrorCode = 'OutOfBounds' | 'EmptyHistory' | 'ParseFailure';

export abstract class EditorError extends Error {
  abstract readonly code: EditorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class OutOfBoundsError extends EditorError {
  readonly code = 'OutOfBounds';

  constructor(message: string, readonly target?: Position | number) {
    super(message);
  }

  static position(position: Position): OutOfBoundsError {
    return new OutOfBoundsError(
      `Position ${position.line}:${position.column} is outside the document`,
      position,
    );
  }

  static offset(offset: number, length: number): OutOfBoundsError {
    return new OutOfBoundsError(`Offset ${offset} is outside [0, ${length}]`, offset);
  }
}

export class EmptyHistoryError extends EditorError {
  readonly code = 'EmptyHistory';

  constructor(readonly direction: 'undo' | 'redo') {
    super(direction === 'undo' ? 'Already at oldest change' : 'Already at newest change');
  }
}

export class ParseFailureError extends EditorError {
  readonly code = 'ParseFailure';

  constructor(readonly languageId: string, readonly version: number, cause: unknown) {
    super(
      `Failed to parse ${languageId} document (version ${version}): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
  }
}

export function isEditorError(value: unknown): value is EditorError {
  return value instanceof EditorError;
}

/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Errors / logging / settings
export {
  EditorError, OutOfBoundsError, EmptyHistoryError, ParseFailureError,
  isEditorError, type EditorErrorCode,
} from './errors';
export { debugLog, isDebugEnabled, setDebugEnabled, setDebugSink, type DebugSink } from './debug';
export { Settings, defaultSettings, type EditorSettings } from './config/settings';

// Buffer
export {
  TextBuffer, createOperation, normalizeLineEndings,
  type EditOperation, type DeleteResult, type DeleteOptions,
  type BufferChange, type BufferChangeListener, type BufferSnapshot,
} from './buffer/text-buffer';
export { LineTree } from './buffer/line-tree';

// Document
export { EditorDocument, detectLanguage, type FileStats } from './document/document';
export { NodeFileIO, MemoryFileIO, type FileIO } from './document/file-io';
export { detectLineEnding, applyLineEnding, type LineEnding } from './document/line-endings';

// Cursor
export {
  CursorManager, cloneCursorState, shiftPosition,
  type CursorState, type MoveOptions,
} from './cursor/cursor-manager';
export {
  type Position, type PositionRange, type SelectionRange,
  comparePositions, positionsEqual, orderedRange, normalizeSelection,
  selectionsOverlap, mergeSelections, isSelectionEmpty,
} from './cursor/selection';
export { resolveMotion, findCharInLine, type LineSource, type MotionDirection, type MotionUnit } from './cursor/motions';
export { CharClass, charClass, getWordAtColumn, firstNonBlankColumn } from './cursor/word-boundary';

// History
export { UndoManager, type HistoryResult, type UndoManagerOptions } from './history/undo-manager';
export { type OperationGroup, invertOperation, computeInverseOperations } from './history/operation';

// Modal input
export {
  ModalInterpreter,
  type Mode, type InputResult, type InterpreterContext, type ModeChangeListener,
} from './modal/interpreter';
export { VimParser, type Operator, type Motion, type Action, type NormalCommand, type ParseStep } from './modal/vim-parser';
export { categorizeKey, keysFromText, type KeyEvent, type KeyCategory } from './modal/keys';
export { Register, type RegisterContent } from './modal/register';

// Commands
export {
  CommandRegistry, parseCommandLine,
  type CommandContext, type CommandHandler, type CommandResult, type ExCommand, type ExecuteResult,
} from './commands/registry';
export { registerExCommands } from './commands/ex-commands';

// Tokenizer / Syntax
export { SyntaxEngine, computeSpans, PLAIN_TEXT } from './tokenizer/syntax-engine';
export { HighlightPipeline, type HighlightState, type HighlightListener } from './tokenizer/highlight-pipeline';
export {
  HIGHLIGHT_CATEGORIES, categoryHighlighter, isHighlightCategory,
  type HighlightCategory, type HighlightSpan,
} from './tokenizer/categories';

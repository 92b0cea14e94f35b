/**
 * Editor session: owns one document and every subsystem that works on it.
 *
 * The session is the context object handed to the interpreter and to ex
 * command handlers. The renderer talks to it through `handleKey`,
 * `getLineView` and the status/quit notifications; the core never draws.
 */

import type { TextBuffer } from '../core/buffer/text-buffer';
import { CommandRegistry, type CommandContext } from '../core/commands/registry';
import { registerExCommands } from '../core/commands/ex-commands';
import { Settings, type EditorSettings } from '../core/config/settings';
import { CursorManager } from '../core/cursor/cursor-manager';
import type { PositionRange } from '../core/cursor/selection';
import { EditorDocument, type FileStats } from '../core/document/document';
import { NodeFileIO, type FileIO } from '../core/document/file-io';
import { UndoManager, type HistoryResult } from '../core/history/undo-manager';
import { keysFromText, type KeyEvent } from '../core/modal/keys';
import { ModalInterpreter, type InputResult, type InterpreterContext, type Mode } from '../core/modal/interpreter';
import { Register } from '../core/modal/register';
import { HighlightPipeline, type HighlightState } from '../core/tokenizer/highlight-pipeline';
import { SyntaxEngine } from '../core/tokenizer/syntax-engine';
import { computeLineView, type LineView } from './line-view';
import { getTheme } from './theme';

export interface EditorSessionOptions {
  content?: string;
  uri?: string;
  languageId?: string;
  settings?: Settings | Partial<EditorSettings>;
  /** Defaults to the local file system. */
  fileIO?: FileIO;
  engine?: SyntaxEngine;
}

export type StatusListener = (status: string) => void;

function describeFile(stats: FileStats): string {
  return `"${stats.path}" ${stats.lines}L, ${stats.characters}C`;
}

export class EditorSession implements CommandContext, InterpreterContext {
  readonly document: EditorDocument;
  readonly cursors: CursorManager;
  readonly history: UndoManager;
  readonly register = new Register();
  readonly settings: Settings;
  readonly registry = new CommandRegistry();
  readonly engine: SyntaxEngine;
  readonly pipeline: HighlightPipeline;
  readonly interpreter: ModalInterpreter;

  private readonly io: FileIO;
  private readonly statusListeners = new Set<StatusListener>();
  private readonly quitListeners = new Set<() => void>();
  private readonly disposers: (() => void)[] = [];
  private _status = '';
  private _quitRequested = false;
  private disposed = false;

  constructor(options: EditorSessionOptions = {}) {
    this.settings = options.settings instanceof Settings
      ? options.settings
      : new Settings(options.settings);
    this.io = options.fileIO ?? new NodeFileIO();
    this.engine = options.engine ?? new SyntaxEngine();

    this.document = new EditorDocument(options.content ?? '', {
      uri: options.uri,
      languageId: options.languageId,
    });
    this.cursors = new CursorManager(this.document.buffer);
    this.history = new UndoManager(this.document.buffer, this.cursors, {
      maxDepth: this.settings.get('history.maxDepth'),
    });
    this.pipeline = new HighlightPipeline(
      this.document.buffer,
      this.engine,
      this.document.languageId,
      this.settings,
    );
    this.interpreter = new ModalInterpreter(this);
    registerExCommands(this.registry);

    this.disposers.push(
      this.document.buffer.onDidChange((change) => this.pipeline.notify(change)),
      this.settings.onChange('history.maxDepth', (depth) => this.history.setMaxDepth(depth)),
    );
  }

  /** Open a session on an existing file. */
  static async open(path: string, options: EditorSessionOptions = {}): Promise<EditorSession> {
    const session = new EditorSession(options);
    await session.open(path);
    return session;
  }

  get buffer(): TextBuffer {
    return this.document.buffer;
  }

  get mode(): Mode {
    return this.interpreter.mode;
  }

  /** The last status message. */
  get status(): string {
    return this._status;
  }

  get quitRequested(): boolean {
    return this._quitRequested;
  }

  handleKey(event: KeyEvent): InputResult {
    const result = this.interpreter.handleKey(event);
    if (result.status !== undefined) this.setStatus(result.status);
    return result;
  }

  /** Feed each character of `text` as a key press. Returns the last result. */
  typeText(text: string): InputResult {
    let result: InputResult = { handled: false, mode: this.mode, reason: 'ignored' };
    for (const event of keysFromText(text)) result = this.handleKey(event);
    return result;
  }

  getLineView(lineNumber: number): LineView | null {
    return computeLineView({
      buffer: this.buffer,
      lineNumber,
      cursors: this.cursors.cursors,
      selections: this.selectionRanges(),
      spans: this.pipeline.getState().spans,
      theme: getTheme(),
    });
  }

  getHighlightState(): HighlightState {
    return this.pipeline.getState();
  }

  onStatus(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  onQuit(listener: () => void): () => void {
    this.quitListeners.add(listener);
    return () => {
      this.quitListeners.delete(listener);
    };
  }

  /** Resolves when pending ex commands have settled and highlighting is current. */
  async whenIdle(): Promise<void> {
    await this.registry.whenSettled();
    await this.pipeline.whenIdle();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const dispose of this.disposers) dispose();
    this.pipeline.dispose();
    this.cursors.dispose();
    this.statusListeners.clear();
    this.quitListeners.clear();
  }

  // -- CommandContext / InterpreterContext -----------------------------------

  undo(): HistoryResult {
    this.history.closeGroup();
    return this.history.undo();
  }

  redo(): HistoryResult {
    this.history.closeGroup();
    return this.history.redo();
  }

  async save(path?: string): Promise<string> {
    const stats = await this.document.save(this.io, path);
    return `${describeFile(stats)} written`;
  }

  /** Load `path` as a new initial document: history is cleared and the cursor reset. */
  async open(path: string): Promise<string> {
    const stats = await this.document.load(this.io, path);
    this.history.clear();
    this.cursors.reset(0, 0);
    this.pipeline.setLanguage(this.document.languageId);
    return describeFile(stats);
  }

  quit(): void {
    this._quitRequested = true;
    for (const listener of this.quitListeners) listener();
  }

  setLanguage(languageId: string): boolean {
    if (!this.engine.isKnownLanguage(languageId)) return false;
    this.document.languageId = languageId;
    this.pipeline.setLanguage(languageId);
    return true;
  }

  runCommand(line: string): string | undefined {
    return this.registry.execute(line, this, (status) => this.setStatus(status)).status;
  }

  private selectionRanges(): PositionRange[] {
    if (this.interpreter.mode === 'visual') return [this.interpreter.visualRange()];
    return [];
  }

  private setStatus(status: string): void {
    if (this.disposed) return;
    this._status = status;
    for (const listener of this.statusListeners) listener(status);
  }
}

/**
 * EditorDocument: uri, buffer, languageId, version, isDirty, line ending.
 *
 * Wraps a TextBuffer with file metadata and reads/writes it through a
 * FileIO collaborator.
 */

import { TextBuffer } from '../buffer/text-buffer';
import type { FileIO } from './file-io';
import { applyLineEnding, detectLineEnding, type LineEnding } from './line-endings';

export interface FileStats {
  path: string;
  lines: number;
  characters: number;
}

const LANGUAGE_BY_EXTENSION: Readonly<Record<string, string>> = {
  ts: 'typescript', tsx: 'typescript', mts: 'typescript', cts: 'typescript',
  js: 'javascript', jsx: 'javascript', mjs: 'javascript', cjs: 'javascript',
  json: 'json', jsonc: 'json',
  py: 'python', pyw: 'python',
  rs: 'rust',
  txt: 'plaintext',
};

/** Language id for a path, from its extension; 'plaintext' when unknown. */
export function detectLanguage(path: string): string {
  const name = path.split(/[\\/]/).pop() ?? '';
  const dot = name.lastIndexOf('.');
  if (dot <= 0) return 'plaintext';
  const ext = name.slice(dot + 1).toLowerCase();
  return Object.prototype.hasOwnProperty.call(LANGUAGE_BY_EXTENSION, ext)
    ? LANGUAGE_BY_EXTENSION[ext]
    : 'plaintext';
}

export class EditorDocument {
  uri: string | null;
  readonly buffer: TextBuffer;
  languageId: string;
  lineEnding: LineEnding;

  private savedVersion: number;

  constructor(content: string = '', options: { uri?: string; languageId?: string } = {}) {
    this.uri = options.uri ?? null;
    this.lineEnding = detectLineEnding(content);
    this.buffer = new TextBuffer(content);
    this.languageId = options.languageId ?? (this.uri ? detectLanguage(this.uri) : 'plaintext');
    this.savedVersion = this.buffer.version;
  }

  /** The buffer's version; increments on every mutation. */
  get version(): number {
    return this.buffer.version;
  }

  get isDirty(): boolean {
    return this.buffer.version !== this.savedVersion;
  }

  /** Mark `version` (default: the current one) as the saved state. */
  markSaved(version: number = this.buffer.version): void {
    this.savedVersion = version;
  }

  /**
   * Write the full document to `path` (default: the document's uri) and
   * mark it clean. Saving under a new path adopts that path.
   */
  async save(io: FileIO, path: string | null = this.uri): Promise<FileStats> {
    if (!path) throw new Error('No file name');
    const text = this.buffer.getText();
    const version = this.buffer.version;
    const lines = this.buffer.getLineCount();
    await io.write(path, applyLineEnding(text, this.lineEnding));
    if (!this.uri) this.uri = path;
    // Edits made while the write was pending stay dirty
    this.markSaved(version);
    return { path, lines, characters: text.length };
  }

  /**
   * Replace the document with the contents of `path`. The caller resets
   * history and cursors: a loaded file is a new initial document.
   */
  async load(io: FileIO, path: string): Promise<FileStats> {
    const content = await io.read(path);
    this.uri = path;
    this.lineEnding = detectLineEnding(content);
    this.languageId = detectLanguage(path);
    this.buffer.setText(content);
    this.markSaved();
    return { path, lines: this.buffer.getLineCount(), characters: this.buffer.getLength() };
  }
}

/**
 * File I/O collaborator. The core never touches the filesystem directly:
 * documents read and write through a FileIO.
 */

import { readFile, writeFile } from 'node:fs/promises';

export interface FileIO {
  read(path: string): Promise<string>;
  write(path: string, text: string): Promise<void>;
}

/** Reads and writes UTF-8 files with fs/promises. */
export class NodeFileIO implements FileIO {
  async read(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async write(path: string, text: string): Promise<void> {
    await writeFile(path, text, 'utf8');
  }
}

/** In-memory file store, for tests and embedding hosts without a disk. */
export class MemoryFileIO implements FileIO {
  private files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(initial)) this.files.set(path, text);
  }

  async read(path: string): Promise<string> {
    const text = this.files.get(path);
    if (text === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    return text;
  }

  async write(path: string, text: string): Promise<void> {
    this.files.set(path, text);
  }

  has(path: string): boolean {
    return this.files.has(path);
  }

  /** Current contents of a file, or undefined. */
  get(path: string): string | undefined {
    return this.files.get(path);
  }
}

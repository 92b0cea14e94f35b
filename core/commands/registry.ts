/**
 * Command registry: maps ex command names (and aliases) to handlers.
 *
 * A command line such as `w notes.txt` or `q!` is parsed into a name, a
 * bang flag and whitespace-separated arguments. A bare number is the
 * `goto` command. Handlers may be async; their failures are reported as
 * status messages instead of being thrown into the editing path.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import type { CursorManager } from '../cursor/cursor-manager';
import type { EditorDocument } from '../document/document';
import type { HistoryResult } from '../history/undo-manager';
import { debugLog } from '../debug';

/**
 * Context passed to command handlers. Provides access to the editor
 * subsystems; implemented by the editor session.
 */
export interface CommandContext {
  readonly document: EditorDocument;
  readonly buffer: TextBuffer;
  readonly cursors: CursorManager;
  undo(): HistoryResult;
  redo(): HistoryResult;
  /** Write the document; resolves to a status line. */
  save(path?: string): Promise<string>;
  /** Load a file as a new document; resolves to a status line. */
  open(path: string): Promise<string>;
  quit(): void;
  /** Switch the highlighting language. Returns false for an unknown id. */
  setLanguage(languageId: string): boolean;
}

export interface ExCommand {
  name: string;
  bang: boolean;
  args: string[];
  /** The command line as typed, without the leading ':'. */
  raw: string;
}

/** A status line, or nothing. */
export type CommandResult = string | undefined;

export type CommandHandler = (
  ctx: CommandContext,
  command: ExCommand,
) => CommandResult | Promise<CommandResult>;

export interface ExecuteResult {
  handled: boolean;
  /** Status for synchronous handlers; async ones report through the callback. */
  status?: string;
}

export type StatusReporter = (status: string) => void;

/** Parse a command line. Returns null for an empty line. */
export function parseCommandLine(line: string): ExCommand | null {
  const raw = line.trim().replace(/^:+/, '').trim();
  if (raw.length === 0) return null;
  if (/^\d+$/.test(raw)) return { name: 'goto', bang: false, args: [raw], raw };

  const match = /^([A-Za-z]+)(!?)\s*(.*)$/.exec(raw);
  if (!match) return { name: raw, bang: false, args: [], raw };
  const [, name, bang, rest] = match;
  return {
    name,
    bang: bang === '!',
    args: rest.length > 0 ? rest.split(/\s+/) : [],
    raw,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class CommandRegistry {
  private commands: Map<string, CommandHandler> = new Map();
  private pending = new Set<Promise<void>>();

  register(names: string | readonly string[], handler: CommandHandler): void {
    for (const name of typeof names === 'string' ? [names] : names) {
      this.commands.set(name, handler);
    }
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  getAll(): string[] {
    return [...this.commands.keys()];
  }

  /**
   * Parse and run a command line. Statuses of async handlers are delivered
   * to `report` when they settle.
   */
  execute(line: string, ctx: CommandContext, report: StatusReporter): ExecuteResult {
    const command = parseCommandLine(line);
    if (!command) return { handled: false };

    const handler = this.commands.get(command.name);
    if (!handler) {
      return { handled: false, status: `Not an editor command: ${command.raw}` };
    }

    debugLog(`ex command: ${command.raw}`);
    let result: CommandResult | Promise<CommandResult>;
    try {
      result = handler(ctx, command);
    } catch (err) {
      return { handled: true, status: `Error: ${errorMessage(err)}` };
    }

    if (result instanceof Promise) {
      const tracked = result.then(
        (status) => {
          if (status) report(status);
        },
        (err: unknown) => {
          debugLog(`ex command failed: ${command.raw}: ${errorMessage(err)}`);
          report(`Error: ${errorMessage(err)}`);
        },
      );
      this.pending.add(tracked);
      void tracked.finally(() => this.pending.delete(tracked));
      return { handled: true };
    }
    return { handled: true, status: result };
  }

  /** Resolves once every async command started so far has settled. */
  async whenSettled(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}

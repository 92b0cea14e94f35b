/**
 * Background highlighting.
 *
 * The pipeline is told about every buffer change and re-parses later, on a
 * timer, from an immutable snapshot. Parsing proceeds in short slices with
 * a yield to the event loop between them, so key handling is never blocked
 * by a parse. The previous tree is reused through Lezer's tree fragments.
 *
 * Results are published as frozen `HighlightState` objects. A change that
 * arrives while a parse is running is picked up by another parse once the
 * current one has published; the newest publication always wins.
 */

import { TreeFragment, type ChangedRange, type Tree } from '@lezer/common';
import type { BufferChange, BufferSnapshot } from '../buffer/text-buffer';
import type { Settings } from '../config/settings';
import { debugLog } from '../debug';
import { ParseFailureError } from '../errors';
import type { HighlightSpan } from './categories';
import { computeSpans, plainSpans, type SyntaxEngine } from './syntax-engine';

export interface HighlightState {
  /** Buffer version the spans were computed from; -1 before the first parse. */
  readonly version: number;
  readonly languageId: string;
  readonly spans: readonly HighlightSpan[];
  /** Set when the latest parse failed; `spans` then still holds the previous result. */
  readonly error: ParseFailureError | null;
}

export type HighlightListener = (state: HighlightState) => void;

export interface SnapshotSource {
  snapshot(): BufferSnapshot;
}

function freezeState(state: HighlightState): HighlightState {
  return Object.freeze({ ...state, spans: Object.freeze(state.spans.map((s) => Object.freeze({ ...s }))) });
}

function toChangedRange(change: BufferChange): ChangedRange {
  return {
    fromA: change.offset,
    toA: change.offset + change.removedText.length,
    fromB: change.offset,
    toB: change.offset + change.insertedText.length,
  };
}

const yieldToEventLoop = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

export class HighlightPipeline {
  private state: HighlightState;
  private listeners = new Set<HighlightListener>();
  private idleWaiters: (() => void)[] = [];

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private dirty = false;
  private disposed = false;

  /** Changes not yet reflected in `tree`, oldest first. */
  private changes: BufferChange[] = [];
  private tree: Tree | null = null;
  private treeVersion = -1;

  constructor(
    private readonly source: SnapshotSource,
    private readonly engine: SyntaxEngine,
    private languageId: string,
    private readonly settings: Settings,
  ) {
    this.state = freezeState({ version: -1, languageId, spans: [], error: null });
    this.schedule();
  }

  getState(): HighlightState {
    return this.state;
  }

  get language(): string {
    return this.languageId;
  }

  /** Buffer changes recorded but not yet covered by a parse. */
  get pendingChanges(): number {
    return this.changes.length;
  }

  /** Record a buffer change and schedule a re-parse. */
  notify(change: BufferChange): void {
    if (this.disposed) return;
    this.changes.push(change);
    this.schedule();
  }

  /** Switch grammars. The next parse starts from scratch. */
  setLanguage(languageId: string): void {
    if (this.disposed) return;
    this.languageId = languageId;
    this.tree = null;
    this.treeVersion = -1;
    this.changes = [];
    this.schedule();
  }

  onPublish(listener: HighlightListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once no parse is scheduled or running. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  dispose(): void {
    this.disposed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.listeners.clear();
    this.changes = [];
    this.tree = null;
    this.settleIdle();
  }

  private isIdle(): boolean {
    return this.disposed || (!this.running && !this.dirty && this.timer === null);
  }

  private schedule(): void {
    if (this.disposed) return;
    this.dirty = true;
    if (this.running || this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.run();
    }, this.settings.get('highlight.debounceMs'));
  }

  private async run(): Promise<void> {
    this.running = true;
    try {
      while (this.dirty && !this.disposed) {
        this.dirty = false;
        await this.parseOnce();
      }
    } finally {
      this.running = false;
      this.settleIdle();
    }
  }

  private settleIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async parseOnce(): Promise<void> {
    const snapshot = this.source.snapshot();
    const languageId = this.languageId;
    const parser = this.engine.getParser(languageId);
    const started = performance.now();

    if (!parser) {
      this.tree = null;
      this.pruneChanges(snapshot.version);
      this.publish({ version: snapshot.version, languageId, spans: plainSpans(snapshot.length), error: null });
      return;
    }

    try {
      const parse = parser.startParse(snapshot.getText(), this.reusableFragments(snapshot.version));
      const sliceMs = this.settings.get('highlight.sliceMs');
      let tree: Tree | null = null;
      for (;;) {
        const deadline = performance.now() + sliceMs;
        do {
          tree = parse.advance();
        } while (!tree && performance.now() < deadline);
        if (tree) break;
        await yieldToEventLoop();
        if (this.disposed || languageId !== this.languageId) return;
      }

      this.tree = tree;
      this.treeVersion = snapshot.version;
      this.pruneChanges(snapshot.version);
      const spans = computeSpans(tree, snapshot.length);
      this.publish({ version: snapshot.version, languageId, spans, error: null });
      debugLog(
        `highlight: ${languageId} v${snapshot.version} ${spans.length} spans in ${(performance.now() - started).toFixed(1)}ms`,
      );
    } catch (err) {
      const error = new ParseFailureError(languageId, snapshot.version, err);
      debugLog(error.message);
      this.tree = null;
      this.treeVersion = -1;
      this.pruneChanges(snapshot.version);
      this.publish({ ...this.state, error });
    }
  }

  /**
   * Fragments of the previous tree, shifted through every change made since
   * it was parsed. Undefined when there is nothing safe to reuse.
   */
  private reusableFragments(version: number): readonly TreeFragment[] | undefined {
    if (!this.tree) return undefined;
    const pending = this.changes.filter((c) => c.version > this.treeVersion && c.version <= version);
    if (pending.length !== version - this.treeVersion) return undefined;

    let fragments = TreeFragment.addTree(this.tree);
    for (const change of pending) {
      fragments = TreeFragment.applyChanges(fragments, [toChangedRange(change)]);
    }
    return fragments;
  }

  private pruneChanges(version: number): void {
    this.changes = this.changes.filter((c) => c.version > version);
  }

  private publish(state: HighlightState): void {
    if (this.disposed) return;
    this.state = freezeState(state);
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (err) {
        debugLog(`highlight listener failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}

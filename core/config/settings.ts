/**
 * Settings manager: typed editor configuration with defaults and change
 * listeners.
 */

import { setDebugEnabled } from '../debug';

export interface EditorSettings {
  'editor.tabSize': number;
  'editor.insertSpaces': boolean;
  'history.maxDepth': number;
  /** Delay between a buffer change and the re-parse it schedules. */
  'highlight.debounceMs': number;
  /** Parse work done before yielding back to the event loop. */
  'highlight.sliceMs': number;
  'debug.enabled': boolean;
}

export const defaultSettings: Readonly<EditorSettings> = {
  'editor.tabSize': 2,
  'editor.insertSpaces': true,
  'history.maxDepth': 10000,
  'highlight.debounceMs': 0,
  'highlight.sliceMs': 8,
  'debug.enabled': false,
};

const SETTING_KEYS = [
  'editor.tabSize',
  'editor.insertSpaces',
  'history.maxDepth',
  'highlight.debounceMs',
  'highlight.sliceMs',
  'debug.enabled',
] as const satisfies readonly (keyof EditorSettings)[];

export class Settings {
  private settings: EditorSettings;
  private listeners: Map<keyof EditorSettings, Set<() => void>> = new Map();

  constructor(overrides: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings };
    this.update(overrides);
    if (overrides['debug.enabled'] !== undefined) setDebugEnabled(overrides['debug.enabled']);
  }

  get<K extends keyof EditorSettings>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  set<K extends keyof EditorSettings>(key: K, value: EditorSettings[K]): void {
    validate(key, value);
    if (this.settings[key] === value) return;
    this.settings[key] = value;
    if (key === 'debug.enabled') setDebugEnabled(value === true);
    const listeners = this.listeners.get(key);
    if (listeners) {
      for (const listener of listeners) listener();
    }
  }

  /** Apply several settings at once. */
  update(partial: Partial<EditorSettings>): void {
    for (const key of SETTING_KEYS) {
      const value = partial[key];
      if (value !== undefined) this.set(key, value);
    }
  }

  /** Subscribe to one key. Returns an unsubscribe function. */
  onChange<K extends keyof EditorSettings>(
    key: K,
    listener: (value: EditorSettings[K]) => void,
  ): () => void {
    let set = this.listeners.get(key);
    if (!set) {
      set = new Set();
      this.listeners.set(key, set);
    }
    const notify = () => listener(this.settings[key]);
    set.add(notify);
    return () => {
      set?.delete(notify);
    };
  }

  getAll(): Readonly<EditorSettings> {
    return { ...this.settings };
  }
}

function validate<K extends keyof EditorSettings>(key: K, value: EditorSettings[K]): void {
  if (typeof value !== 'number') return;
  const min = key === 'editor.tabSize' || key === 'history.maxDepth' ? 1 : 0;
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${key} must be an integer >= ${min}, got ${value}`);
  }
}

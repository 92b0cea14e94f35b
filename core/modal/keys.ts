/**
 * Key events and their categories. The interpreter's transition table is
 * keyed by category, so every event maps to exactly one.
 */

export interface KeyEvent {
  /** DOM-style key name: 'a', 'A', 'Escape', 'Enter', 'ArrowLeft', ... */
  key: string;
  ctrlKey?: boolean;
  altKey?: boolean;
  shiftKey?: boolean;
  metaKey?: boolean;
}

export type KeyCategory =
  | 'escape'
  | 'enter'
  | 'backspace'
  | 'tab'
  | 'delete'
  | 'arrow'
  | 'control'
  | 'character'
  | 'other';

export type ArrowKey = 'ArrowLeft' | 'ArrowRight' | 'ArrowUp' | 'ArrowDown';

const NAMED: ReadonlyMap<string, KeyCategory> = new Map<string, KeyCategory>([
  ['Escape', 'escape'],
  ['Esc', 'escape'],
  ['Enter', 'enter'],
  ['Backspace', 'backspace'],
  ['Tab', 'tab'],
  ['Delete', 'delete'],
  ['ArrowLeft', 'arrow'],
  ['ArrowRight', 'arrow'],
  ['ArrowUp', 'arrow'],
  ['ArrowDown', 'arrow'],
]);

export function isArrowKey(key: string): key is ArrowKey {
  return key === 'ArrowLeft' || key === 'ArrowRight' || key === 'ArrowUp' || key === 'ArrowDown';
}

/** True for a single printable character (one code point). */
export function isPrintable(key: string): boolean {
  const chars = [...key];
  return chars.length === 1 && key >= ' ' && key !== '\x7f';
}

export function categorizeKey(event: KeyEvent): KeyCategory {
  const named = NAMED.get(event.key);
  if (named) return named;
  if (event.ctrlKey || event.metaKey) {
    // Ctrl-[ is the terminal spelling of Escape
    if (event.ctrlKey && event.key === '[') return 'escape';
    return isPrintable(event.key) ? 'control' : 'other';
  }
  if (event.altKey) return 'other';
  return isPrintable(event.key) ? 'character' : 'other';
}

/** Split typed text into key events, mapping '\n' and '\t' to Enter and Tab. */
export function keysFromText(text: string): KeyEvent[] {
  return [...text].map((ch) => {
    if (ch === '\n') return { key: 'Enter' };
    if (ch === '\t') return { key: 'Tab' };
    return { key: ch };
  });
}

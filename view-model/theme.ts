/**
 * Theme system: colors for editor chrome and highlight categories.
 *
 * The active theme is process-wide; sessions resolve span colors against
 * it when building line views.
 */

import type { HighlightCategory } from '../core/tokenizer/categories';

export type FontStyle = 'normal' | 'italic' | 'bold' | 'bold-italic';

export type CategoryColors = Readonly<Record<HighlightCategory, string>>;

export interface EditorTheme {
  name: string;

  // Editor chrome
  background: string;
  foreground: string;
  selectionBackground: string;
  cursorColor: string;
  statusForeground: string;

  // Syntax colors
  tokens: CategoryColors;
  /** Categories drawn in something other than the normal style. */
  fontStyles: Readonly<Partial<Record<HighlightCategory, FontStyle>>>;
}

/** Dark theme (default). */
export const DARK_THEME: EditorTheme = {
  name: 'dark',
  background: '#1e1e1e',
  foreground: '#d4d4d4',
  selectionBackground: '#264f78',
  cursorColor: '#aeafad',
  statusForeground: '#cccccc',

  tokens: {
    attribute: '#9cdcfe',
    comment: '#6a9955',
    constant: '#b5cea8',
    constructor: '#4ec9b0',
    'function.builtin': '#dcdcaa',
    function: '#dcdcaa',
    keyword: '#569cd6',
    label: '#c586c0',
    operator: '#d4d4d4',
    property: '#9cdcfe',
    punctuation: '#d4d4d4',
    'punctuation.bracket': '#ffd700',
    'punctuation.delimiter': '#d4d4d4',
    'punctuation.special': '#569cd6',
    string: '#ce9178',
    'string.special': '#d16969',
    tag: '#569cd6',
    type: '#4ec9b0',
    'type.builtin': '#4ec9b0',
    variable: '#9cdcfe',
    'variable.builtin': '#569cd6',
    'variable.parameter': '#9cdcfe',
    text: '#d4d4d4',
  },
  fontStyles: {
    comment: 'italic',
  },
};

/** Light theme. */
export const LIGHT_THEME: EditorTheme = {
  name: 'light',
  background: '#ffffff',
  foreground: '#24292e',
  selectionBackground: '#0366d625',
  cursorColor: '#24292e',
  statusForeground: '#586069',

  tokens: {
    attribute: '#6f42c1',
    comment: '#6a737d',
    constant: '#005cc5',
    constructor: '#6f42c1',
    'function.builtin': '#005cc5',
    function: '#6f42c1',
    keyword: '#d73a49',
    label: '#d73a49',
    operator: '#24292e',
    property: '#005cc5',
    punctuation: '#24292e',
    'punctuation.bracket': '#24292e',
    'punctuation.delimiter': '#24292e',
    'punctuation.special': '#d73a49',
    string: '#032f62',
    'string.special': '#e36209',
    tag: '#22863a',
    type: '#6f42c1',
    'type.builtin': '#005cc5',
    variable: '#24292e',
    'variable.builtin': '#005cc5',
    'variable.parameter': '#e36209',
    text: '#24292e',
  },
  fontStyles: {
    comment: 'italic',
    keyword: 'bold',
  },
};

let activeTheme: EditorTheme = DARK_THEME;
const themeListeners = new Set<(theme: EditorTheme) => void>();

export function getTheme(): EditorTheme {
  return activeTheme;
}

export function setTheme(theme: EditorTheme): void {
  if (theme === activeTheme) return;
  activeTheme = theme;
  for (const listener of themeListeners) listener(theme);
}

export function onThemeChange(listener: (theme: EditorTheme) => void): () => void {
  themeListeners.add(listener);
  return () => {
    themeListeners.delete(listener);
  };
}

export function resolveCategoryStyle(
  category: HighlightCategory,
  theme: EditorTheme = activeTheme,
): { color: string; fontStyle: FontStyle } {
  return {
    color: theme.tokens[category],
    fontStyle: theme.fontStyles[category] ?? 'normal',
  };
}

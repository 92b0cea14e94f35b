/**
 * Highlight categories and the mapping from Lezer style tags to them.
 */

import { tags, tagHighlighter, type Highlighter } from '@lezer/highlight';

export const HIGHLIGHT_CATEGORIES = [
  'attribute',
  'comment',
  'constant',
  'constructor',
  'function.builtin',
  'function',
  'keyword',
  'label',
  'operator',
  'property',
  'punctuation',
  'punctuation.bracket',
  'punctuation.delimiter',
  'punctuation.special',
  'string',
  'string.special',
  'tag',
  'type',
  'type.builtin',
  'variable',
  'variable.builtin',
  'variable.parameter',
  'text',
] as const;

export type HighlightCategory = (typeof HIGHLIGHT_CATEGORIES)[number];

/** A categorized half-open range of document offsets. */
export interface HighlightSpan {
  readonly from: number;
  readonly to: number;
  readonly category: HighlightCategory;
}

const CATEGORY_SET: ReadonlySet<string> = new Set<string>(HIGHLIGHT_CATEGORIES);

export function isHighlightCategory(value: string): value is HighlightCategory {
  return CATEGORY_SET.has(value);
}

export const categoryHighlighter: Highlighter = tagHighlighter([
  { tag: tags.comment, class: 'comment' },
  { tag: tags.keyword, class: 'keyword' },
  { tag: [tags.string, tags.character, tags.attributeValue], class: 'string' },
  { tag: [tags.special(tags.string), tags.regexp, tags.escape, tags.url], class: 'string.special' },
  {
    tag: [tags.number, tags.bool, tags.null, tags.atom, tags.unit, tags.constant(tags.variableName)],
    class: 'constant',
  },
  { tag: tags.operator, class: 'operator' },
  { tag: tags.punctuation, class: 'punctuation' },
  { tag: tags.bracket, class: 'punctuation.bracket' },
  { tag: [tags.separator, tags.derefOperator], class: 'punctuation.delimiter' },
  { tag: [tags.special(tags.brace), tags.special(tags.punctuation)], class: 'punctuation.special' },
  { tag: tags.propertyName, class: 'property' },
  { tag: [tags.function(tags.variableName), tags.function(tags.propertyName)], class: 'function' },
  { tag: [tags.standard(tags.function(tags.variableName)), tags.macroName], class: 'function.builtin' },
  { tag: tags.className, class: 'constructor' },
  { tag: [tags.typeName, tags.namespace], class: 'type' },
  { tag: tags.standard(tags.typeName), class: 'type.builtin' },
  { tag: tags.variableName, class: 'variable' },
  {
    tag: [tags.self, tags.special(tags.variableName), tags.standard(tags.variableName)],
    class: 'variable.builtin',
  },
  { tag: tags.local(tags.variableName), class: 'variable.parameter' },
  { tag: tags.labelName, class: 'label' },
  { tag: tags.tagName, class: 'tag' },
  { tag: [tags.attributeName, tags.meta], class: 'attribute' },
]);

/**
 * Category for a highlighter class string. Nested highlighted nodes yield
 * several space-separated classes; the innermost (last) one wins.
 */
export function categoryFromClasses(classes: string): HighlightCategory {
  const parts = classes.split(' ').filter((c) => c.length > 0);
  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    if (isHighlightCategory(part)) return part;
  }
  return 'text';
}

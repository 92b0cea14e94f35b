/**
 * Lezer parser integration: grammar registry and span extraction.
 *
 * Spans produced here cover the whole document: ranges the highlighter
 * leaves unstyled become `text`, and neighbouring ranges of the same
 * category are merged.
 */

import type { Parser, Tree } from '@lezer/common';
import { highlightTree } from '@lezer/highlight';
import { categoryFromClasses, categoryHighlighter, type HighlightCategory, type HighlightSpan } from './categories';

import { typescriptParser, javascriptParser } from './grammars/typescript';
import { jsonParser } from './grammars/json';
import { pythonParser } from './grammars/python';
import { rustParser } from './grammars/rust';

/** Language with no grammar: one `text` span. */
export const PLAIN_TEXT = 'plaintext';

class SpanBuilder {
  readonly spans: HighlightSpan[] = [];
  private end = 0;

  constructor(private readonly length: number) {}

  push(from: number, to: number, category: HighlightCategory): void {
    from = Math.max(from, this.end);
    to = Math.min(to, this.length);
    if (to <= from) return;
    if (from > this.end) this.append(this.end, from, 'text');
    this.append(from, to, category);
  }

  finish(): HighlightSpan[] {
    if (this.end < this.length) this.append(this.end, this.length, 'text');
    return this.spans;
  }

  private append(from: number, to: number, category: HighlightCategory): void {
    const last = this.spans[this.spans.length - 1];
    if (last && last.category === category && last.to === from) {
      this.spans[this.spans.length - 1] = { from: last.from, to, category };
    } else {
      this.spans.push({ from, to, category });
    }
    this.end = to;
  }
}

/**
 * Categorized spans for a document of `length` characters parsed into
 * `tree`. Sorted, non-overlapping, and covering [0, length) exactly.
 */
export function computeSpans(tree: Tree, length: number): HighlightSpan[] {
  const builder = new SpanBuilder(length);
  highlightTree(tree, categoryHighlighter, (from, to, classes) => {
    builder.push(from, to, categoryFromClasses(classes));
  });
  return builder.finish();
}

/** Spans for a document without a grammar. */
export function plainSpans(length: number): HighlightSpan[] {
  return length > 0 ? [{ from: 0, to: length, category: 'text' }] : [];
}

export class SyntaxEngine {
  private parsers: Map<string, Parser> = new Map();

  constructor() {
    this.registerGrammar('typescript', typescriptParser);
    this.registerGrammar('javascript', javascriptParser);
    this.registerGrammar('json', jsonParser);
    this.registerGrammar('python', pythonParser);
    this.registerGrammar('rust', rustParser);
  }

  registerGrammar(languageId: string, parser: Parser): void {
    this.parsers.set(languageId, parser);
  }

  getParser(languageId: string): Parser | null {
    return this.parsers.get(languageId) ?? null;
  }

  hasLanguage(languageId: string): boolean {
    return this.parsers.has(languageId);
  }

  /** Languages a document may be set to, including plain text. */
  isKnownLanguage(languageId: string): boolean {
    return languageId === PLAIN_TEXT || this.parsers.has(languageId);
  }

  getSupportedLanguages(): string[] {
    return [...this.parsers.keys()];
  }

  /** Parse `text` in one go. */
  highlight(languageId: string, text: string): HighlightSpan[] {
    const parser = this.getParser(languageId);
    if (!parser) return plainSpans(text.length);
    return computeSpans(parser.parse(text), text.length);
  }
}

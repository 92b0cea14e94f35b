import { describe, expect, test } from 'vitest';
import { Parser, type Input, type PartialParse, type TreeFragment } from '@lezer/common';
import { TextBuffer } from '../core/buffer/text-buffer';
import { Settings } from '../core/config/settings';
import { ParseFailureError } from '../core/errors';
import { categoryFromClasses, type HighlightSpan } from '../core/tokenizer/categories';
import { jsonParser } from '../core/tokenizer/grammars/json';
import { HighlightPipeline, type HighlightState } from '../core/tokenizer/highlight-pipeline';
import { SyntaxEngine, plainSpans } from '../core/tokenizer/syntax-engine';

function expectCovering(spans: readonly HighlightSpan[], length: number): void {
  if (length === 0) {
    expect(spans).toEqual([]);
    return;
  }
  expect(spans[0].from).toBe(0);
  for (let i = 1; i < spans.length; i++) {
    expect(spans[i].from).toBe(spans[i - 1].to);
    expect(spans[i].category === spans[i - 1].category).toBe(false);
  }
  expect(spans[spans.length - 1].to).toBe(length);
}

/** JSON grammar that refuses any document containing '!'. */
class FlakyParser extends Parser {
  createParse(
    input: Input,
    fragments: readonly TreeFragment[],
    ranges: readonly { from: number; to: number }[],
  ): PartialParse {
    if (input.read(0, input.length).includes('!')) throw new Error('unexpected token');
    return jsonParser.startParse(input, fragments, ranges);
  }
}

function setup(text: string, languageId: string, settings = new Settings()) {
  const buf = new TextBuffer(text);
  const engine = new SyntaxEngine();
  engine.registerGrammar('flaky', new FlakyParser());
  const pipeline = new HighlightPipeline(buf, engine, languageId, settings);
  buf.onDidChange((change) => pipeline.notify(change));
  const published: HighlightState[] = [];
  pipeline.onPublish((state) => published.push(state));
  return { buf, engine, pipeline, published };
}

const tsSource = Array.from(
  { length: 200 },
  (_, i) => `function f${i}(a: number): string { return "v" + a * ${i}; } // note ${i}`,
).join('\n');

describe('SyntaxEngine', () => {
  test('registers the bundled grammars', () => {
    const engine = new SyntaxEngine();
    expect(engine.getSupportedLanguages()).toEqual(['typescript', 'javascript', 'json', 'python', 'rust']);
    expect(engine.isKnownLanguage('plaintext')).toBe(true);
    expect(engine.hasLanguage('plaintext')).toBe(false);
    expect(engine.getParser('cobol')).toBeNull();
  });

  test('typescript spans cover the document', () => {
    const text = 'const x = 1;';
    const spans = new SyntaxEngine().highlight('typescript', text);
    expectCovering(spans, text.length);
    expect(spans[0]).toEqual({ from: 0, to: 5, category: 'keyword' });
    expect(spans).toContainEqual({ from: 10, to: 11, category: 'constant' });
  });

  test('json property names', () => {
    const text = '{"a": 1}';
    const spans = new SyntaxEngine().highlight('json', text);
    expectCovering(spans, text.length);
    expect(spans).toContainEqual({ from: 1, to: 4, category: 'property' });
  });

  test('every grammar covers its sample', () => {
    const engine = new SyntaxEngine();
    const samples: Record<string, string> = {
      javascript: 'let s = `x${y}`;\n',
      python: 'def f(x):\n    return x  # done\n',
      rust: 'fn main() { let v: Vec<u8> = vec![1]; }\n',
    };
    for (const [languageId, text] of Object.entries(samples)) {
      expectCovering(engine.highlight(languageId, text), text.length);
    }
  });

  test('unknown languages and empty documents', () => {
    const engine = new SyntaxEngine();
    expect(engine.highlight('plaintext', 'abc')).toEqual([{ from: 0, to: 3, category: 'text' }]);
    expect(engine.highlight('typescript', '')).toEqual([]);
    expect(plainSpans(0)).toEqual([]);
  });

  test('categoryFromClasses takes the most specific known class', () => {
    expect(categoryFromClasses('keyword')).toBe('keyword');
    expect(categoryFromClasses('variable variable.builtin')).toBe('variable.builtin');
    expect(categoryFromClasses('bogus')).toBe('text');
  });
});

describe('HighlightPipeline', () => {
  test('publishes the first parse', async () => {
    const { pipeline, published } = setup('const x = 1;', 'typescript');
    expect(pipeline.getState().version).toBe(-1);
    await pipeline.whenIdle();
    const state = pipeline.getState();
    expect(state.version).toBe(0);
    expect(state.languageId).toBe('typescript');
    expect(state.error).toBeNull();
    expect(state.spans[0]).toEqual({ from: 0, to: 5, category: 'keyword' });
    expect(published).toHaveLength(1);
    expect(Object.isFrozen(state)).toBe(true);
  });

  test('incremental results match a full parse after edits', async () => {
    const { buf, engine, pipeline } = setup(tsSource, 'typescript');
    await pipeline.whenIdle();

    buf.insert({ line: 10, column: 0 }, 'const inserted = "s";\n');
    buf.delete({ start: { line: 50, column: 0 }, end: { line: 52, column: 0 } });
    await pipeline.whenIdle();
    buf.insert({ line: 199, column: 0 }, 'let z = 2;\n');

    await pipeline.whenIdle();
    const state = pipeline.getState();
    expect(state.version).toBe(buf.version);
    expect(state.spans).toEqual(engine.highlight('typescript', buf.getText()));
    expectCovering(state.spans, buf.getLength());
  });

  test('sliced parsing publishes only finished results', async () => {
    const { buf, engine, pipeline, published } = setup(tsSource, 'typescript', new Settings({ 'highlight.sliceMs': 0 }));
    await new Promise((resolve) => setTimeout(resolve, 0));
    buf.insert({ line: 0, column: 0 }, '// head\n');

    await pipeline.whenIdle();
    expect(published.every((s) => s.error === null)).toBe(true);
    expect(published[published.length - 1].version).toBe(1);
    expect(pipeline.getState().spans).toEqual(engine.highlight('typescript', buf.getText()));
  });

  test('a failed parse keeps the previous spans', async () => {
    const { buf, pipeline } = setup('{"a": 1}', 'flaky');
    await pipeline.whenIdle();
    const good = pipeline.getState();
    expect(good.error).toBeNull();

    buf.insert({ line: 0, column: 8 }, '!');
    await pipeline.whenIdle();
    const failed = pipeline.getState();
    expect(failed.version).toBe(0);
    expect(failed.spans).toEqual(good.spans);
    expect(failed.error).toBeInstanceOf(ParseFailureError);
    expect(failed.error?.code).toBe('ParseFailure');
    expect(failed.error?.message).toBe('Failed to parse flaky document (version 1): unexpected token');

    buf.delete({ start: { line: 0, column: 8 }, end: { line: 0, column: 9 } });
    await pipeline.whenIdle();
    expect(pipeline.getState().error).toBeNull();
    expect(pipeline.getState().version).toBe(2);
  });

  test('failed parses do not accumulate changes', async () => {
    const { buf, pipeline } = setup('{"a": 1}', 'flaky');
    await pipeline.whenIdle();
    for (let i = 0; i < 3; i++) {
      buf.insert({ line: 0, column: 0 }, '!');
      await pipeline.whenIdle();
    }
    expect(pipeline.getState().error?.message).toBe('Failed to parse flaky document (version 3): unexpected token');
    expect(pipeline.pendingChanges).toBe(0);
  });

  test('switching to plain text', async () => {
    const { pipeline } = setup('let a', 'typescript');
    await pipeline.whenIdle();
    pipeline.setLanguage('plaintext');
    expect(pipeline.language).toBe('plaintext');
    await pipeline.whenIdle();
    expect(pipeline.getState()).toEqual({
      version: 0,
      languageId: 'plaintext',
      spans: [{ from: 0, to: 5, category: 'text' }],
      error: null,
    });
  });

  test('a throwing listener does not stop the others', async () => {
    const { pipeline, published } = setup('1', 'json');
    pipeline.onPublish(() => {
      throw new Error('listener');
    });
    await pipeline.whenIdle();
    expect(published).toHaveLength(1);
  });

  test('dispose stops parsing', async () => {
    const { buf, pipeline, published } = setup('x', 'typescript');
    pipeline.dispose();
    await pipeline.whenIdle();
    buf.insert({ line: 0, column: 1 }, 'y');
    await pipeline.whenIdle();
    expect(published).toEqual([]);
    expect(pipeline.getState().version).toBe(-1);
  });
});

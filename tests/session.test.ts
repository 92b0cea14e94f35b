import { describe, expect, test } from 'vitest';
import { Settings } from '../core/config/settings';
import { MemoryFileIO } from '../core/document/file-io';
import { EditorSession } from '../view-model/editor-session';
import { DARK_THEME } from '../view-model/theme';

function makeSession(content: string, languageId = 'plaintext', settings?: Settings) {
  return new EditorSession({ content, languageId, settings, fileIO: new MemoryFileIO() });
}

describe('EditorSession', () => {
  test('line views carry highlighted tokens once the parse lands', async () => {
    const session = makeSession('const a = 1;', 'typescript');
    expect(session.getLineView(0)?.tokens).toEqual([
      { startColumn: 0, endColumn: 12, category: 'text', color: DARK_THEME.tokens.text, fontStyle: 'normal' },
    ]);

    await session.whenIdle();
    const view = session.getLineView(0);
    expect(view?.text).toBe('const a = 1;');
    expect(view?.cursorColumns).toEqual([0]);
    expect(view?.hasPrimaryCursor).toBe(true);
    expect(view?.selections).toEqual([]);
    expect(view?.tokens[0]).toEqual({
      startColumn: 0,
      endColumn: 5,
      category: 'keyword',
      color: DARK_THEME.tokens.keyword,
      fontStyle: 'normal',
    });
    expect(session.getLineView(1)).toBeNull();
  });

  test('visual selections appear in line views', () => {
    const session = makeSession('ab\ncd');
    session.typeText('vj');
    expect(session.mode).toBe('visual');
    expect(session.getLineView(0)?.selections).toEqual([{ startColumn: 0, endColumn: 2, includesLineBreak: true }]);
    expect(session.getLineView(1)?.selections).toEqual([{ startColumn: 0, endColumn: 1, includesLineBreak: false }]);
    expect(session.getLineView(1)?.hasPrimaryCursor).toBe(true);

    session.handleKey({ key: 'Escape' });
    expect(session.getLineView(0)?.selections).toEqual([]);
  });

  test('typeText returns the last result', () => {
    const session = makeSession('abc');
    expect(session.typeText('d')).toEqual({ handled: true, mode: 'normal', pending: true });
    expect(session.typeText('d')).toEqual({ handled: true, mode: 'normal' });
    expect(session.buffer.getText()).toBe('');
  });

  test('statuses reach listeners', () => {
    const session = makeSession('abc');
    const statuses: string[] = [];
    session.onStatus((s) => statuses.push(s));
    session.typeText('u');
    expect(statuses).toEqual(['Already at oldest change']);
    expect(session.status).toBe('Already at oldest change');
  });

  test('history depth follows the setting', () => {
    const settings = new Settings();
    const session = makeSession('abcd', 'plaintext', settings);
    session.typeText('xxx');
    expect(session.buffer.getText()).toBe('d');
    expect(session.history.undoDepth).toBe(3);
    settings.set('history.maxDepth', 1);
    expect(session.history.undoDepth).toBe(1);
  });

  test('open reads a file into a new session', async () => {
    const fileIO = new MemoryFileIO({ 'src/main.rs': 'fn main() {}' });
    const session = await EditorSession.open('src/main.rs', { fileIO });
    expect(session.buffer.getText()).toBe('fn main() {}');
    expect(session.document.uri).toBe('src/main.rs');
    expect(session.document.languageId).toBe('rust');
    expect(session.document.isDirty).toBe(false);
    await session.whenIdle();
    expect(session.getHighlightState().languageId).toBe('rust');
    session.dispose();
  });

  test('dispose silences the session', async () => {
    const session = makeSession('abc', 'typescript');
    const statuses: string[] = [];
    session.onStatus((s) => statuses.push(s));
    session.dispose();
    session.typeText('u');
    await session.whenIdle();
    expect(statuses).toEqual([]);
    expect(session.getHighlightState().version).toBe(-1);
  });
});

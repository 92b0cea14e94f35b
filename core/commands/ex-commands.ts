/**
 * Built-in ex commands: write, edit, quit, undo/redo, go to line, syntax.
 */

import { firstNonBlankColumn } from '../cursor/word-boundary';
import type { HistoryResult } from '../history/undo-manager';
import type { CommandRegistry } from './registry';

function historyStatus(result: HistoryResult): string | undefined {
  return result.applied ? undefined : result.error.message;
}

export function registerExCommands(registry: CommandRegistry): void {
  registry.register(['w', 'write'], (ctx, { args }) => ctx.save(args[0]));

  registry.register(['e', 'edit'], (ctx, { args, bang }) => {
    const path = args[0] ?? ctx.document.uri;
    if (!path) return 'No file name';
    if (ctx.document.isDirty && !bang) return 'No write since last change (add ! to override)';
    return ctx.open(path);
  });

  registry.register(['q', 'quit'], (ctx, { bang }) => {
    if (ctx.document.isDirty && !bang) return 'No write since last change (add ! to override)';
    ctx.quit();
    return undefined;
  });

  registry.register(['wq', 'x'], async (ctx, { args }) => {
    const status = await ctx.save(args[0]);
    ctx.quit();
    return status;
  });

  registry.register(['u', 'undo'], (ctx) => historyStatus(ctx.undo()));
  registry.register(['red', 'redo'], (ctx) => historyStatus(ctx.redo()));

  registry.register('goto', (ctx, { args }) => {
    const line = Math.max(1, parseInt(args[0] ?? '1', 10)) - 1;
    const target = Math.min(line, ctx.buffer.getLineCount() - 1);
    ctx.cursors.moveToPosition(target, firstNonBlankColumn(ctx.buffer.getLine(target)));
    return undefined;
  });

  registry.register('syntax', (ctx, { args }) => {
    const languageId = args[0];
    if (!languageId) return `syntax=${ctx.document.languageId}`;
    return ctx.setLanguage(languageId) ? undefined : `Unknown language: ${languageId}`;
  });
}

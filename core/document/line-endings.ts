/**
 * Line ending detection. The buffer always stores '\n'; a document
 * remembers the dominant ending of the file it was loaded from and
 * writes it back on save.
 */

export type LineEnding = '\n' | '\r\n' | '\r';

/** Dominant line ending among the first 1000 line breaks; '\n' by default. */
export function detectLineEnding(text: string): LineEnding {
  let crlfCount = 0;
  let lfCount = 0;
  let crCount = 0;
  let linesSeen = 0;

  for (let i = 0; i < text.length && linesSeen < 1000; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 13) { // \r
      if (i + 1 < text.length && text.charCodeAt(i + 1) === 10) {
        crlfCount++;
        i++; // skip \n
      } else {
        crCount++;
      }
      linesSeen++;
    } else if (ch === 10) { // \n
      lfCount++;
      linesSeen++;
    }
  }

  if (crlfCount > lfCount && crlfCount > crCount) return '\r\n';
  if (crCount > lfCount && crCount > crlfCount) return '\r';
  return '\n';
}

/** Convert '\n'-separated buffer text to the given ending. */
export function applyLineEnding(text: string, ending: LineEnding): string {
  return ending === '\n' ? text : text.split('\n').join(ending);
}

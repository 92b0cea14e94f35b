/**
 * Word classes for vi-style word motions.
 *
 * A "word" is a run of keyword characters (letters, digits, underscore) or a
 * run of other non-blank characters. A "WORD" (big word) is any run of
 * non-blank characters. Line breaks count as blanks.
 */

export enum CharClass {
  Blank = 0,
  Keyword = 1,
  Punctuation = 2,
}

function isKeywordCode(ch: number): boolean {
  // ASCII fast path
  if (ch >= 65 && ch <= 90) return true;   // A-Z
  if (ch >= 97 && ch <= 122) return true;  // a-z
  if (ch >= 48 && ch <= 57) return true;   // 0-9
  if (ch === 95) return true;              // _

  // Unicode letters (simplified)
  if (ch >= 0xC0 && ch <= 0x024F) return ch !== 0xD7 && ch !== 0xF7; // Latin Extended
  if (ch >= 0x0370 && ch <= 0x04FF) return true; // Greek, Cyrillic
  if (ch >= 0x3040 && ch <= 0x30FF) return true; // Japanese
  if (ch >= 0x4E00 && ch <= 0x9FFF) return true; // CJK
  if (ch >= 0xAC00 && ch <= 0xD7AF) return true; // Korean
  return false;
}

export function isBlank(ch: string | undefined): boolean {
  return ch === undefined || ch === ' ' || ch === '\t' || ch === '\n';
}

/** Classify a character; `big` collapses keyword and punctuation into one class. */
export function charClass(ch: string | undefined, big: boolean): CharClass {
  if (ch === undefined || isBlank(ch)) return CharClass.Blank;
  if (big) return CharClass.Keyword;
  return isKeywordCode(ch.charCodeAt(0)) ? CharClass.Keyword : CharClass.Punctuation;
}

/** Column of the first non-blank character, or the line length if there is none. */
export function firstNonBlankColumn(line: string): number {
  const idx = line.search(/[^ \t]/);
  return idx === -1 ? line.length : idx;
}

/** Leading whitespace of a line. */
export function leadingIndent(line: string): string {
  return line.slice(0, firstNonBlankColumn(line));
}

/**
 * Get the word at a given column position.
 * Returns [startColumn, endColumn).
 */
export function getWordAtColumn(line: string, column: number, big = false): [number, number] {
  if (line.length === 0) return [0, 0];
  const col = Math.min(Math.max(0, column), line.length - 1);
  const cls = charClass(line[col], big);
  let start = col;
  let end = col + 1;
  while (start > 0 && charClass(line[start - 1], big) === cls) start--;
  while (end < line.length && charClass(line[end], big) === cls) end++;
  return [start, end];
}

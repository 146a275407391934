/* =======================================================================================
 * DISPLAY COLUMNS
 * ---------------------------------------------------------------------------------------
 * Terminal column for a byte offset within a line. Wide East Asian characters and
 * emoji take two columns, combining marks and default-ignorable code points none,
 * tabs advance to the next tab stop.
 * ======================================================================================= */

import { eastAsianWidth } from "get-east-asian-width";

import { utf8Length } from "./lines.js";

export const DEFAULT_TAB_WIDTH = 4;

const zeroWidthRegex = /^(?:\p{Mark}|\p{Default_Ignorable_Code_Point}|\p{Cc})$/u;

/** Display width of a single code point (tabs excluded). */
export function charWidth(ch: string): number {
  const cp = ch.codePointAt(0);
  if (cp === undefined) return 0;
  if (zeroWidthRegex.test(ch)) return 0;
  return eastAsianWidth(cp);
}

function advance(column: number, ch: string, tabWidth: number): number {
  if (ch === "\t") return column + (tabWidth - (column % tabWidth));
  return column + charWidth(ch);
}

/** Display width of a whole string, with tab stops every `tabWidth` columns. */
export function stringWidth(text: string, tabWidth = DEFAULT_TAB_WIDTH): number {
  let column = 0;
  for (const ch of text) column = advance(column, ch, tabWidth);
  return column;
}

/** Replace tabs with spaces up to the next tab stop. */
export function expandTabs(text: string, tabWidth = DEFAULT_TAB_WIDTH): string {
  if (!text.includes("\t")) return text;
  let column = 0;
  let out = "";
  for (const ch of text) {
    if (ch === "\t") {
      const stop = tabWidth - (column % tabWidth);
      out += " ".repeat(stop);
      column += stop;
    } else {
      out += ch;
      column += charWidth(ch);
    }
  }
  return out;
}

/** Whether `byteOffset` lands between two code points of `text` (or at either end). */
export function isCharBoundary(text: string, byteOffset: number): boolean {
  let position = 0;
  for (const ch of text) {
    if (position === byteOffset) return true;
    if (position > byteOffset) return false;
    position += utf8Length(ch.codePointAt(0) ?? 0);
  }
  return position === byteOffset;
}

function byteSlice(text: string, byteOffset: number): string {
  let position = 0;
  let end = 0;
  for (const ch of text) {
    if (position >= byteOffset) break;
    position += utf8Length(ch.codePointAt(0) ?? 0);
    end += ch.length;
  }
  return text.slice(0, end);
}

/**
 * Display column of `byteOffset` within a line's content.
 *
 * Starts are 1-based inclusive (`+1`); ends are 1-based inclusive ends, i.e.
 * the column of the last covered cell, which is also the 0-based exclusive end.
 * An offset past the content (inside the terminator) counts the terminator as
 * one column. An offset inside a multi-byte character includes that character.
 */
export function displayColumn(
  content: string,
  byteOffset: number,
  isStart: boolean,
  tabWidth = DEFAULT_TAB_WIDTH,
): number {
  const adjust = isStart ? 1 : 0;
  const contentBytes = Buffer.byteLength(content, "utf8");
  if (byteOffset > contentBytes) {
    return stringWidth(content, tabWidth) + 1 + adjust;
  }
  if (isCharBoundary(content, byteOffset)) {
    return stringWidth(byteSlice(content, byteOffset), tabWidth) + adjust;
  }
  // Misaligned offset: walk until the byte index is reached or exceeded.
  let position = 0;
  let column = 0;
  for (const ch of content) {
    if (position >= byteOffset) break;
    column = advance(column, ch, tabWidth);
    position += utf8Length(ch.codePointAt(0) ?? 0);
  }
  return column + adjust;
}

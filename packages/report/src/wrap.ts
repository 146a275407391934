import { stringWidth } from "@spanlight/source";
import wrapAnsi from "wrap-ansi";

export interface WrapOptions {
  /** Total width, indents included. */
  width: number;
  initialIndent: string;
  subsequentIndent: string;
}

// SGR colour codes and OSC 8 hyperlink brackets.
const ansiPattern = /\u001b\[[0-9;]*m|\u001b\]8;[^\u001b\u0007]*(?:\u001b\\|\u0007)/g;

export function visibleWidth(text: string): number {
  return stringWidth(text.replace(ansiPattern, ""));
}

/**
 * Word-wrap `text` to `width`, prefixing the first line with `initialIndent`
 * and every other line with `subsequentIndent`. Explicit newlines are kept.
 */
export function wrapText(text: string, options: WrapOptions): string[] {
  const indentWidth = Math.max(visibleWidth(options.initialIndent), visibleWidth(options.subsequentIndent));
  const available = Math.max(1, options.width - indentWidth);
  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    const pieces = paragraph === "" ? [""] : wrapAnsi(paragraph, available, { hard: true, trim: true }).split("\n");
    for (const piece of pieces) {
      lines.push((lines.length === 0 ? options.initialIndent : options.subsequentIndent) + piece);
    }
  }
  return lines;
}

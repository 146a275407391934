import type { SpanContents } from "./resolve.js";

/** One line of an extracted window, positioned in the original source. */
export interface Line {
  /** 1-based line number in the whole source. */
  readonly lineNumber: number;
  /** Byte offset of the line start in the original source. */
  readonly offset: number;
  /** Byte length, terminator included. */
  readonly length: number;
  /** Decoded line, terminator included; concatenating every `text` gives back the window. */
  readonly text: string;
  /** Decoded line without its terminator. */
  readonly content: string;
  /** Final line of the source, with no terminator after it. */
  readonly atEndOfFile: boolean;
}

const decoder = new TextDecoder("utf-8");

/** UTF-8 byte length of a single code point. */
export function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Split a resolved window into lines. Numbering continues from the window's
 * first line instead of restarting at 1.
 *
 * @param sourceLength - byte length of the whole source, to tell a window that
 *   stops mid-file from one that reaches the end.
 */
export function scanLines(contents: SpanContents, sourceLength: number): Line[] {
  const text = decoder.decode(contents.data);
  const lines: Line[] = [];
  const chars = Array.from(text);

  let lineNumber = contents.line + 1;
  let lineStart = contents.span.offset;
  let offset = lineStart;
  let raw = "";
  let content = "";

  const close = (atEndOfFile: boolean) => {
    lines.push({ lineNumber, offset: lineStart, length: offset - lineStart, text: raw, content, atEndOfFile });
    lineNumber += 1;
    lineStart = offset;
    raw = "";
    content = "";
  };

  for (let i = 0; i < chars.length; i += 1) {
    const ch = chars[i] ?? "";
    if (ch === "\n") {
      offset += 1;
      raw += ch;
      close(false);
    } else if (ch === "\r" && chars[i + 1] === "\n") {
      offset += 2;
      raw += "\r\n";
      i += 1;
      close(false);
    } else {
      offset += utf8Length(ch.codePointAt(0) ?? 0);
      raw += ch;
      content += ch;
    }
  }

  if (offset > lineStart) {
    close(offset === sourceLength);
  }
  return lines;
}

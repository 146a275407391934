/* =======================================================================================
 * SPAN RESOLUTION
 * ---------------------------------------------------------------------------------------
 * Byte offset -> line/column, plus a bounded window of context lines around a span.
 * Works on raw bytes: line boundaries are `\n` and `\r\n`; a lone `\r` is content.
 * ======================================================================================= */

import { debug } from "./debug.js";
import { SourceError, SourceErrorCode } from "./errors.js";
import { spanEnd, type SourceSpan } from "./span.js";

const LF = 0x0a;
const CR = 0x0d;

/** Result of extracting a span together with its context lines. */
export interface SpanContents {
  /** Extracted bytes (a view into the source, not a copy). */
  readonly data: Uint8Array;
  /** Byte range of `data` within the whole source. */
  readonly span: SourceSpan;
  /** 0-based index of the first extracted line. */
  readonly line: number;
  /**
   * 0-based byte column of the span start when no leading context was
   * requested; `0` otherwise, since the window then opens on a line boundary.
   */
  readonly column: number;
  /** Number of source lines the extraction touches. */
  readonly lineCount: number;
  /** Name of the source the contents came from, when it has one. */
  readonly name?: string;
}

export interface LineExtent {
  /** Byte offset of the first byte of the line. */
  readonly start: number;
  /** Byte offset just past the line terminator (or the end of input). */
  readonly end: number;
  /** Byte length of the terminator: 0, 1 (`\n`) or 2 (`\r\n`). */
  readonly terminator: number;
}

/**
 * Extent of the line beginning at `start`. Past the last terminator this is an
 * empty, unterminated line at the end of the input.
 */
export function lineExtent(bytes: Uint8Array, start: number): LineExtent {
  for (let i = start; i < bytes.length; i += 1) {
    const byte = bytes[i];
    if (byte === LF) return { start, end: i + 1, terminator: 1 };
    if (byte === CR && bytes[i + 1] === LF) return { start, end: i + 2, terminator: 2 };
  }
  return { start, end: bytes.length, terminator: 0 };
}

/** Whether `offset` falls on `line`; the final unterminated line also owns the end-of-input position. */
function lineHolds(line: LineExtent, offset: number): boolean {
  if (offset < line.start) return false;
  if (offset < line.end) return true;
  return line.terminator === 0 && offset === line.end;
}

/**
 * Extract `span` plus up to `before` lines preceding its first line and up to
 * `after` lines following its last line.
 *
 * @throws SourceError `OUT_OF_BOUNDS` when the span reaches past the input.
 */
export function readSpan(
  bytes: Uint8Array,
  span: SourceSpan,
  before = 0,
  after = 0,
  name?: string,
): SpanContents {
  const end = spanEnd(span);
  if (end > bytes.length) {
    debug.resolve("span.out-of-bounds", { offset: span.offset, length: span.length, size: bytes.length });
    throw new SourceError(
      `Span (offset: ${span.offset}, length: ${span.length}) exceeds source of ${bytes.length} bytes`,
      SourceErrorCode.OUT_OF_BOUNDS,
      span,
    );
  }
  const lastByte = span.length > 0 ? end - 1 : span.offset;

  // Starts of the lines preceding the span, oldest dropped once over `before`.
  const leading: number[] = [];
  let firstLine = 0;
  let spanLine = -1;
  let spanLineStart = 0;
  let endLine = -1;
  let windowEnd = end;
  let trailing = 0;

  let index = 0;
  let start = 0;
  for (;;) {
    const line = lineExtent(bytes, start);
    if (spanLine < 0) {
      if (lineHolds(line, span.offset)) {
        spanLine = index;
        spanLineStart = line.start;
      } else {
        leading.push(line.start);
        if (leading.length > before) {
          leading.shift();
          firstLine += 1;
        }
      }
    }
    if (spanLine >= 0) {
      if (endLine < 0) {
        if (lineHolds(line, lastByte)) {
          endLine = index;
          windowEnd = line.end;
        }
      } else if (trailing < after && line.end > line.start) {
        trailing += 1;
        windowEnd = line.end;
      }
      if (endLine >= 0 && trailing >= after) break;
    }
    if (line.terminator === 0) break;
    start = line.end;
    index += 1;
  }

  if (spanLine < 0 || endLine < 0) {
    // Unreachable for in-range spans; kept so a scan mismatch cannot slip through silently.
    throw new SourceError(
      `Span (offset: ${span.offset}, length: ${span.length}) could not be located`,
      SourceErrorCode.OUT_OF_BOUNDS,
      span,
    );
  }

  const windowStart = before === 0 ? span.offset : (leading[0] ?? spanLineStart);
  const contents: SpanContents = {
    data: bytes.subarray(windowStart, windowEnd),
    span: { offset: windowStart, length: windowEnd - windowStart },
    line: before === 0 ? spanLine : firstLine,
    column: before === 0 ? span.offset - spanLineStart : 0,
    lineCount: endLine + trailing - (before === 0 ? spanLine : firstLine) + 1,
    ...(name !== undefined ? { name } : {}),
  };
  debug.resolve("span.read", {
    offset: span.offset,
    length: span.length,
    window: [windowStart, windowEnd],
    line: contents.line,
    lineCount: contents.lineCount,
  });
  return contents;
}

/**
 * Non-throwing variant of {@link readSpan}: out-of-bounds spans yield the
 * error value instead. Other failures still throw.
 */
export function tryReadSpan(
  bytes: Uint8Array,
  span: SourceSpan,
  before = 0,
  after = 0,
  name?: string,
): SpanContents | SourceError {
  try {
    return readSpan(bytes, span, before, after, name);
  } catch (error) {
    if (error instanceof SourceError && error.code === SourceErrorCode.OUT_OF_BOUNDS) return error;
    throw error;
  }
}

/** 0-based line and byte column of `offset`. */
export function locate(bytes: Uint8Array, offset: number): { line: number; column: number } {
  const contents = readSpan(bytes, { offset, length: 0 });
  return { line: contents.line, column: contents.column };
}

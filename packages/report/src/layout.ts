/* =======================================================================================
 * SPAN LAYOUT
 * ---------------------------------------------------------------------------------------
 * How each span relates to each line of a window, and how many gutter columns the
 * window needs for the vertical connectors of multi-line spans.
 * ======================================================================================= */

import { displayColumn, spanEnd, type Line, type SourceSpan } from "@spanlight/source";

/**
 * - `contained`: starts and ends on the line (a point when zero-length); drawn as an underline.
 * - `starts`: first line of a multi-line span.
 * - `ends`: last line of a multi-line span.
 * - `flyby`: the span passes through without starting or ending here.
 * - `none`: no intersection.
 */
export type SpanRelation = "contained" | "starts" | "ends" | "flyby" | "none";

export type MultiLineRelation = Extract<SpanRelation, "starts" | "ends" | "flyby">;

export function classifySpan(line: Line, span: SourceSpan): SpanRelation {
  const lineStart = line.offset;
  const lineEnd = line.offset + line.length;
  const start = span.offset;
  const end = spanEnd(span);

  if (span.length === 0) {
    if (start < lineStart) return "none";
    if (start < lineEnd) return "contained";
    return start === lineEnd && line.atEndOfFile ? "contained" : "none";
  }

  if (start >= lineStart && end <= lineEnd) return "contained";
  if (start >= lineStart && start < lineEnd) return "starts";
  if (start < lineStart) {
    if (end > lineEnd) return "flyby";
    if (end > lineStart) return "ends";
  }
  return "none";
}

export function isMultiLineRelation(relation: SpanRelation): relation is MultiLineRelation {
  return relation === "starts" || relation === "ends" || relation === "flyby";
}

export interface LineLayout {
  readonly line: Line;
  /** One relation per span, in span order. */
  readonly relations: readonly SpanRelation[];
}

export interface WindowLayout {
  readonly lines: readonly LineLayout[];
  /** Gutter columns reserved for vertical connectors across the whole window. */
  readonly maxGutter: number;
}

/** Number of spans occupying a gutter column on a line. */
export function gutterDepth(relations: readonly SpanRelation[]): number {
  let depth = 0;
  for (const relation of relations) {
    if (isMultiLineRelation(relation)) depth += 1;
  }
  return depth;
}

/** Widest gutter any line of the window needs. */
export function maxGutter(lines: readonly Line[], spans: readonly SourceSpan[]): number {
  return layoutWindow(lines, spans).maxGutter;
}

export function layoutWindow(lines: readonly Line[], spans: readonly SourceSpan[]): WindowLayout {
  let maxGutter = 0;
  const laidOut = lines.map((line) => {
    const relations = spans.map((span) => classifySpan(line, span));
    maxGutter = Math.max(maxGutter, gutterDepth(relations));
    return { line, relations };
  });
  return { lines: laidOut, maxGutter };
}

/** Display columns of a span on a line it is contained in. */
export interface SpanColumns {
  /** 0-based first column. */
  readonly start: number;
  /** 0-based exclusive end, at least `start + 1`. */
  readonly end: number;
  /** Column of the label connector, the middle of the underline. */
  readonly vbar: number;
}

export function spanColumns(line: Line, span: SourceSpan, tabWidth: number): SpanColumns {
  const start = displayColumn(line.content, span.offset - line.offset, true, tabWidth) - 1;
  const rawEnd =
    span.length === 0 ? start + 1 : displayColumn(line.content, spanEnd(span) - line.offset, false, tabWidth);
  const end = Math.max(rawEnd, start + 1);
  return { start, end, vbar: start + Math.floor((end - start) / 2) };
}

/* =======================================================================================
 * SPAN MODEL
 * ---------------------------------------------------------------------------------------
 * Byte-offset spans over UTF-8 source text. Everything downstream (resolution, layout,
 * merging, rendering) speaks in these half-open byte ranges.
 * ======================================================================================= */

import { SourceError, SourceErrorCode } from "./errors.js";

/** Half-open byte range `[offset, offset + length)`. A zero length is a point. */
export interface SourceSpan {
  readonly offset: number;
  readonly length: number;
}

/** A span with an optional label; `primary` marks the span that anchors its snippet. */
export interface LabeledSpan extends SourceSpan {
  readonly label?: string;
  readonly primary?: boolean;
}

function isByteCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Build a validated span.
 *
 * @throws SourceError `INVALID_SPAN` when either part is negative or fractional,
 * or when `offset + length` leaves the safe-integer range.
 */
export function createSpan(offset: number, length: number): SourceSpan {
  if (!isByteCount(offset) || !isByteCount(length) || !Number.isSafeInteger(offset + length)) {
    throw new SourceError(
      `Invalid span (offset: ${offset}, length: ${length})`,
      SourceErrorCode.INVALID_SPAN,
      { offset, length },
    );
  }
  return { offset, length };
}

export function labeled(offset: number, length: number, label?: string): LabeledSpan {
  const span = createSpan(offset, length);
  return label === undefined ? span : { ...span, label };
}

/** Same as {@link labeled}, flagged as the snippet anchor. */
export function primary(offset: number, length: number, label?: string): LabeledSpan {
  return { ...labeled(offset, length, label), primary: true };
}

export function spanEnd(span: SourceSpan): number {
  return span.offset + span.length;
}

export function isPointSpan(span: SourceSpan): boolean {
  return span.length === 0;
}

/** Smallest span covering both inputs. */
export function spanUnion(a: SourceSpan, b: SourceSpan): SourceSpan {
  const start = Math.min(a.offset, b.offset);
  const end = Math.max(spanEnd(a), spanEnd(b));
  return createSpan(start, end - start);
}

/**
 * Whether two spans share at least one byte. Points intersect a span that
 * strictly contains their offset, and another point at the same offset.
 */
export function spansIntersect(a: SourceSpan, b: SourceSpan): boolean {
  if (a.length === 0 && b.length === 0) return a.offset === b.offset;
  if (a.length === 0) return a.offset >= b.offset && a.offset < spanEnd(b);
  if (b.length === 0) return b.offset >= a.offset && b.offset < spanEnd(a);
  return a.offset < spanEnd(b) && b.offset < spanEnd(a);
}

/** Stable ordering by offset, longer spans first on ties. */
export function compareSpans(a: SourceSpan, b: SourceSpan): number {
  return a.offset - b.offset || b.length - a.length;
}

/* =======================================================================================
 * WINDOW MERGING
 * ---------------------------------------------------------------------------------------
 * Labels whose context windows overlap or touch are folded into one snippet window, so
 * each region of source is drawn once with all of its labels.
 *
 * Only line ranges are compared: two spans that share no byte but whose windows share
 * (or abut on) a line end up in the same window.
 * ======================================================================================= */

import {
  compareSpans,
  debug,
  locate,
  SourceError,
  spanUnion,
  tryReadSpan,
  type LabeledSpan,
  type SourceSpan,
  type SpanContents,
} from "@spanlight/source";

export interface SnippetWindow {
  /** Union of every label span in the window. */
  readonly span: SourceSpan;
  /** Labels drawn in this window, sorted by offset. */
  readonly labels: readonly LabeledSpan[];
  /** Label whose position heads the snippet. */
  readonly anchor: LabeledSpan;
  /** 0-based line of the anchor. */
  readonly line: number;
  /** 0-based byte column of the anchor. */
  readonly column: number;
  /** Extraction of `span` with the requested context. */
  readonly contents: SpanContents;
}

export interface LabelFailure {
  readonly label: LabeledSpan;
  readonly error: SourceError;
}

export interface MergeResult {
  readonly windows: readonly SnippetWindow[];
  readonly failures: readonly LabelFailure[];
}

interface Draft {
  span: SourceSpan;
  contents: SpanContents;
  first: LabeledSpan;
  labels: LabeledSpan[];
}

/**
 * Pick the label that heads a window: a primary label wins, otherwise the
 * earliest-starting one.
 */
export function pickAnchor(first: LabeledSpan, labels: readonly LabeledSpan[]): LabeledSpan {
  return labels.find((label) => label.primary === true) ?? first;
}

function finish(draft: Draft, bytes: Uint8Array): SnippetWindow {
  const anchor = pickAnchor(draft.first, draft.labels);
  const position = locate(bytes, anchor.offset);
  return {
    span: draft.span,
    labels: draft.labels,
    anchor,
    line: position.line,
    column: position.column,
    contents: draft.contents,
  };
}

function toSpan(label: LabeledSpan): SourceSpan {
  return { offset: label.offset, length: label.length };
}

/**
 * Group labels into snippet windows.
 *
 * Labels that cannot be read (they reach past the source) are returned as
 * failures and take no part in merging.
 */
export function mergeWindows(
  bytes: Uint8Array,
  labels: readonly LabeledSpan[],
  contextLinesBefore: number,
  contextLinesAfter: number,
  name?: string,
): MergeResult {
  const sorted = [...labels].sort(compareSpans);
  const failures: LabelFailure[] = [];
  const windows: SnippetWindow[] = [];
  let current: Draft | undefined;

  for (const label of sorted) {
    const contents = tryReadSpan(bytes, label, contextLinesBefore, contextLinesAfter, name);
    if (contents instanceof SourceError) {
      failures.push({ label, error: contents });
      continue;
    }

    if (current) {
      const reach = current.contents.line + current.contents.lineCount;
      if (reach >= contents.line) {
        const merged = spanUnion(current.span, label);
        const mergedContents = tryReadSpan(bytes, merged, contextLinesBefore, contextLinesAfter, name);
        if (!(mergedContents instanceof SourceError)) {
          debug.merge("window.merged", {
            span: [merged.offset, merged.length],
            lines: [mergedContents.line, mergedContents.lineCount],
            labels: current.labels.length + 1,
          });
          current = { span: merged, contents: mergedContents, first: current.first, labels: [...current.labels, label] };
          continue;
        }
        debug.merge("window.merge-failed", { span: [merged.offset, merged.length] });
      }
      windows.push(finish(current, bytes));
    }
    current = { span: toSpan(label), contents, first: label, labels: [label] };
  }

  if (current) windows.push(finish(current, bytes));
  debug.merge("windows", { windows: windows.length, failures: failures.length });
  return { windows, failures };
}

/* =======================================================================================
 * SNIPPET RENDERER
 * ---------------------------------------------------------------------------------------
 * Draws merged snippet windows: numbered source lines, a gutter of connectors for
 * multi-line spans, underlines for single-line spans and label rows beneath them.
 *
 *    ╭─[main.ts:2:3]
 *  1 │ ╭─▶ source
 *  2 │ ├─▶   text
 *    · ╰──── block
 *  3 │       here
 *    ╰────
 * ======================================================================================= */

import {
  debug,
  expandTabs,
  scanLines,
  spanEnd,
  type LabeledSpan,
  type Line,
  type SourceCode,
  type SpanContents,
} from "@spanlight/source";

import { paintRuns, type Highlighter } from "./highlighter.js";
import { isMultiLineRelation, layoutWindow, spanColumns, type SpanColumns, type SpanRelation } from "./layout.js";
import { mergeWindows, type MergeResult, type SnippetWindow } from "./merge.js";
import { writeLine, type OutputSink } from "./sink.js";
import { highlightStyle, type GraphicalTheme, type Style } from "./theme.js";

export interface SnippetOptions {
  readonly contextLinesBefore: number;
  readonly contextLinesAfter: number;
  readonly tabWidth: number;
  readonly theme: GraphicalTheme;
  readonly highlighter: Highlighter;
}

interface FancySpan {
  readonly index: number;
  readonly span: LabeledSpan;
  /** Label split into lines; undefined when the span has no label. */
  readonly label: readonly string[] | undefined;
  readonly style: Style;
}

interface Placed {
  readonly fancy: FancySpan;
  readonly relation: SpanRelation;
}

interface Underlined extends SpanColumns {
  readonly fancy: FancySpan;
}

interface Frame {
  readonly linumWidth: number;
  readonly maxGutter: number;
  readonly fancy: readonly FancySpan[];
  readonly language: string | undefined;
}

const LF = 0x0a;
const CR = 0x0d;

/**
 * A point sitting at the very end of a source that ends with a newline is
 * moved back before that newline, so it is drawn after the last line's text
 * rather than on a line that does not exist.
 */
export function anchorTrailingPoint(bytes: Uint8Array, label: LabeledSpan): LabeledSpan {
  const { offset } = label;
  if (label.length !== 0 || offset === 0 || offset !== bytes.length || bytes[offset - 1] !== LF) return label;
  const back = offset >= 2 && bytes[offset - 2] === CR ? 2 : 1;
  return { ...label, offset: offset - back };
}

export function outOfBoundsNotice(label: LabeledSpan): string {
  return (
    `Failed to read contents for label '${label.label ?? "<none>"}' ` +
    `(offset: ${label.offset}, length: ${label.length}): OutOfBounds`
  );
}

/**
 * Window contents that begin on a line boundary. Without leading context the
 * extraction starts at the span itself, so it is read again from its line start.
 */
export function alignedContents(source: SourceCode, window: SnippetWindow, before: number, after: number): SpanContents {
  const { contents } = window;
  if (contents.column === 0) return contents;
  const lineStart = window.span.offset - contents.column;
  return source.readSpan({ offset: lineStart, length: spanEnd(window.span) - lineStart }, before, after);
}

export class SnippetRenderer {
  constructor(private readonly options: SnippetOptions) {}

  /** Labels prepared for layout: trailing points anchored, windows merged. */
  windows(source: SourceCode, labels: readonly LabeledSpan[]): MergeResult {
    const prepared = labels.map((label) => anchorTrailingPoint(source.bytes, label));
    return mergeWindows(
      source.bytes,
      prepared,
      this.options.contextLinesBefore,
      this.options.contextLinesAfter,
      source.name,
    );
  }

  render(sink: OutputSink, source: SourceCode, labels: readonly LabeledSpan[]): void {
    const { windows, failures } = this.windows(source, labels);
    const { styles } = this.options.theme;
    for (const failure of failures) {
      debug.render("label.unreadable", { offset: failure.label.offset, length: failure.label.length });
      writeLine(sink, `  ${styles.error(outOfBoundsNotice(failure.label))}`);
    }
    for (const window of windows) this.renderWindow(sink, source, window);
  }

  private renderWindow(sink: OutputSink, source: SourceCode, window: SnippetWindow): void {
    const { contextLinesBefore, contextLinesAfter, theme } = this.options;
    const chars = theme.characters;
    const contents = alignedContents(source, window, contextLinesBefore, contextLinesAfter);
    const lines = scanLines(contents, source.bytes.length);
    const layout = layoutWindow(lines, window.labels);
    const lastLine = lines.at(-1);
    const linumWidth = String(lastLine ? lastLine.lineNumber : contents.line + 1).length;

    const frame: Frame = {
      linumWidth,
      maxGutter: layout.maxGutter,
      fancy: window.labels.map((span, index) => ({
        index,
        span,
        label: span.label?.split("\n"),
        style: highlightStyle(theme.styles, index),
      })),
      language: source.language,
    };
    debug.render("window", { line: contents.line, lines: lines.length, labels: window.labels.length, gutter: layout.maxGutter });

    writeLine(sink, this.header(window, linumWidth, contents.name ?? source.name));
    for (const { line, relations } of layout.lines) {
      const placed = frame.fancy.map((fancy) => ({ fancy, relation: relations[fancy.index] ?? "none" }));
      this.renderLine(sink, frame, line, placed);
    }
    writeLine(sink, `${" ".repeat(linumWidth + 2)}${chars.lbot}${chars.hbar.repeat(4)}`);
  }

  private header(window: SnippetWindow, linumWidth: number, name: string | undefined): string {
    const { characters: chars, styles } = this.options.theme;
    const position = `${window.line + 1}:${window.column + 1}`;
    const title = name !== undefined ? `${styles.filename(name)}:${position}` : position;
    return `${" ".repeat(linumWidth + 2)}${chars.ltop}${chars.hbar}${chars.lbox}${title}${chars.rbox}`;
  }

  private renderLine(sink: OutputSink, frame: Frame, line: Line, placed: readonly Placed[]): void {
    const { theme, tabWidth, highlighter } = this.options;
    const { characters: chars, styles } = theme;

    const linum = ` ${styles.linum(String(line.lineNumber).padStart(frame.linumWidth))} ${chars.vbar} `;
    const text = paintRuns(highlighter.highlightLine(expandTabs(line.content, tabWidth), frame.language));
    writeLine(sink, linum + this.lineGutter(frame, placed) + text);

    const underlined = placed
      .filter((entry) => entry.relation === "contained")
      .map((entry) => ({ fancy: entry.fancy, ...spanColumns(line, entry.fancy.span, tabWidth) }));
    if (underlined.length > 0) this.renderUnderlines(sink, frame, placed, underlined);

    for (const entry of placed) {
      if (entry.relation === "ends") this.renderEndLabel(sink, frame, placed, entry.fancy);
    }
  }

  private noLinum(frame: Frame): string {
    const { characters: chars, styles } = this.options.theme;
    return ` ${styles.linum(" ".repeat(frame.linumWidth))} ${chars.vbarBreak} `;
  }

  private textOrigin(frame: Frame): number {
    return frame.maxGutter > 0 ? frame.maxGutter + 3 : 0;
  }

  /** Connectors drawn beside a source line. */
  private lineGutter(frame: Frame, placed: readonly Placed[]): string {
    const { maxGutter } = frame;
    if (maxGutter === 0) return "";
    const chars = this.options.theme.characters;
    let gutter = "";
    let used = 0;
    let depth = 0;
    let arrow = false;

    for (const { fancy, relation } of placed) {
      if (!isMultiLineRelation(relation)) continue;
      if (relation === "starts" || relation === "ends") {
        const corner = relation === "starts" ? chars.ltop : fancy.label ? chars.lcross : chars.lbot;
        const run = `${corner}${chars.hbar.repeat(maxGutter - depth)}${chars.rarrow}`;
        gutter += fancy.style(run);
        used += maxGutter - depth + 2;
        arrow = true;
        break;
      }
      gutter += fancy.style(chars.vbar);
      used += 1;
      depth += 1;
    }
    return gutter + " ".repeat((arrow ? 1 : 3) + Math.max(0, maxGutter - used));
  }

  /**
   * Connectors drawn beside the rows under a source line. `target` turns its
   * column into the elbow of an end-label row; labelled spans ending on this
   * line before `closedBelow` no longer carry a bar.
   */
  private highlightGutter(
    frame: Frame,
    placed: readonly Placed[],
    width: number,
    target?: number,
    closedBelow = target ?? 0,
  ): string {
    const { maxGutter } = frame;
    if (maxGutter === 0) return " ".repeat(width);
    const chars = this.options.theme.characters;
    let gutter = "";
    let used = 0;
    let depth = 0;

    for (const { fancy, relation } of placed) {
      if (!isMultiLineRelation(relation)) continue;
      if (fancy.index === target) {
        gutter += fancy.style(`${chars.lbot}${chars.hbar.repeat(maxGutter - depth + 2)}`);
        used += maxGutter - depth + 3;
        break;
      }
      const open = relation !== "ends" || (fancy.label !== undefined && fancy.index >= closedBelow);
      gutter += open ? fancy.style(chars.vbar) : " ";
      used += 1;
      depth += 1;
    }
    return gutter + " ".repeat(Math.max(0, width - used));
  }

  private renderUnderlines(
    sink: OutputSink,
    frame: Frame,
    placed: readonly Placed[],
    underlined: readonly Underlined[],
  ): void {
    const chars = this.options.theme.characters;
    const prefix = this.noLinum(frame) + this.highlightGutter(frame, placed, this.textOrigin(frame));

    let underline = "";
    let highest = 0;
    for (const entry of underlined) {
      const { fancy } = entry;
      const from = Math.max(entry.start, highest);
      if (from >= entry.end) continue;
      const middle = fancy.span.length === 0 ? chars.uarrow : fancy.label ? chars.underbar : chars.underline;
      let run = "";
      for (let column = from; column < entry.end; column += 1) {
        run += column === entry.vbar ? middle : chars.underline;
      }
      underline += " ".repeat(from - highest) + fancy.style(run);
      highest = entry.end;
    }
    writeLine(sink, prefix + underline);

    // Labels stack upwards: the rightmost-starting label is written first.
    const withLabels = underlined.filter((entry) => entry.fancy.label !== undefined);
    for (let k = withLabels.length - 1; k >= 0; k -= 1) {
      const current = withLabels[k];
      if (!current) continue;
      const earlier = withLabels.slice(0, k);
      const [first = "", ...rest] = current.fancy.label ?? [];
      const { style } = current.fancy;
      writeLine(sink, prefix + this.labelRow(earlier, current, style(`${chars.lbot}${chars.hbar}${chars.hbar} ${first}`)));
      for (const extra of rest) {
        writeLine(sink, prefix + this.labelRow(earlier, current, style(`${chars.vbar}   ${extra}`)));
      }
    }
  }

  /** Bars for labels still waiting below, then `tail` at the current label's connector. */
  private labelRow(earlier: readonly Underlined[], current: Underlined, tail: string): string {
    const chars = this.options.theme.characters;
    let row = "";
    let cursor = 0;
    for (const entry of earlier) {
      if (entry.vbar < cursor || entry.vbar >= current.vbar) continue;
      row += " ".repeat(entry.vbar - cursor) + entry.fancy.style(chars.vbar);
      cursor = entry.vbar + 1;
    }
    return row + " ".repeat(Math.max(0, current.vbar - cursor)) + tail;
  }

  private renderEndLabel(sink: OutputSink, frame: Frame, placed: readonly Placed[], fancy: FancySpan): void {
    if (!fancy.label) return;
    const chars = this.options.theme.characters;
    const [first = "", ...rest] = fancy.label;
    const prefix = this.noLinum(frame);
    const elbow = this.highlightGutter(frame, placed, frame.maxGutter + 1, fancy.index);
    writeLine(sink, prefix + elbow + fancy.style(`${chars.hbar} ${first}`));
    for (const extra of rest) {
      const gutter = this.highlightGutter(frame, placed, frame.maxGutter + 3, undefined, fancy.index + 1);
      writeLine(sink, `${prefix}${gutter}  ${fancy.style(extra)}`);
    }
  }
}

/* =======================================================================================
 * NARRATABLE REPORT HANDLER
 * ---------------------------------------------------------------------------------------
 * Linear, glyph-free rendering for screen readers and plain logs. Same windows and
 * columns as the graphical handler, spelled out in words.
 * ======================================================================================= */

import { debug, scanLines, type LabeledSpan, type Line, type SourceCode } from "@spanlight/source";

import { causeChain, severityOf, type Diagnostic } from "./diagnostic.js";
import { layoutWindow, spanColumns, type SpanRelation } from "./layout.js";
import type { SnippetWindow } from "./merge.js";
import { resolveReportOptions, type ReportOptions, type ResolvedReportOptions } from "./options.js";
import type { ReportHandler } from "./report.js";
import { writeLine, type OutputSink } from "./sink.js";
import { alignedContents, outOfBoundsNotice, SnippetRenderer } from "./snippet.js";

export class NarratableReportHandler implements ReportHandler {
  private readonly resolved: ResolvedReportOptions;
  private readonly snippets: SnippetRenderer;

  constructor(options: ReportOptions = {}) {
    this.resolved = resolveReportOptions(options);
    this.snippets = new SnippetRenderer(this.resolved);
  }

  render(diagnostic: Diagnostic, sink: OutputSink): void {
    this.renderReport(diagnostic, sink, 0, undefined);
  }

  private renderReport(
    diagnostic: Diagnostic,
    sink: OutputSink,
    depth: number,
    inherited: SourceCode | undefined,
  ): void {
    const source = diagnostic.source ?? inherited;
    writeLine(sink, diagnostic.message);
    writeLine(sink, `    Diagnostic severity: ${severityOf(diagnostic)}`);
    for (const cause of causeChain(diagnostic.cause)) {
      writeLine(sink, `    Caused by: ${cause.message}`);
    }

    const labels = diagnostic.labels ?? [];
    if (labels.length > 0 && source) {
      const { windows, failures } = this.snippets.windows(source, labels);
      for (const failure of failures) writeLine(sink, `    ${outOfBoundsNotice(failure.label)}`);
      for (const window of windows) this.renderWindow(sink, source, window);
    } else if (labels.length > 0) {
      debug.report("labels.no-source", { labels: labels.length });
    }

    if (diagnostic.help !== undefined) writeLine(sink, `diagnostic help: ${diagnostic.help}`);
    if (diagnostic.code !== undefined) writeLine(sink, `diagnostic code: ${diagnostic.code}`);
    if (diagnostic.url !== undefined) writeLine(sink, `For more details, see:\n${diagnostic.url}`);

    const related = diagnostic.related ?? [];
    if (related.length === 0) return;
    if (depth >= this.resolved.maxRelatedDepth) {
      writeLine(sink);
      writeLine(sink, `${related.length} related diagnostic(s) omitted (nesting limit ${this.resolved.maxRelatedDepth})`);
      return;
    }
    for (const child of related) {
      writeLine(sink);
      this.renderReport(child, sink, depth + 1, source);
    }
  }

  private renderWindow(sink: OutputSink, source: SourceCode, window: SnippetWindow): void {
    const { contextLinesBefore, contextLinesAfter } = this.resolved;
    const contents = alignedContents(source, window, contextLinesBefore, contextLinesAfter);
    const lines = scanLines(contents, source.bytes.length);
    const layout = layoutWindow(lines, window.labels);
    const name = contents.name ?? source.name;

    writeLine(sink);
    writeLine(
      sink,
      `Begin snippet${name !== undefined ? ` for ${name}` : ""} starting at line ${window.line + 1}, column ${window.column + 1}`,
    );
    writeLine(sink);
    for (const { line, relations } of layout.lines) {
      writeLine(sink, `snippet line ${line.lineNumber}: ${line.content}`);
      window.labels.forEach((label, index) => {
        const text = this.describeLabel(line, label, relations[index] ?? "none");
        if (text !== undefined) writeLine(sink, text);
      });
    }
    writeLine(sink);
  }

  private describeLabel(line: Line, label: LabeledSpan, relation: SpanRelation): string | undefined {
    if (relation === "none" || relation === "flyby") return undefined;
    const { tabWidth } = this.resolved;
    const noun = label.label !== undefined ? "label" : "highlight";
    const suffix = label.label !== undefined ? `: ${label.label.replace(/\n/g, " ")}` : "";
    const n = line.lineNumber;

    if (relation === "ends") {
      const end = spanColumns(line, { offset: line.offset, length: label.offset + label.length - line.offset }, tabWidth).end;
      return `    ${noun} ending at line ${n}, column ${end}${suffix}`;
    }
    const columns = spanColumns(line, label, tabWidth);
    if (relation === "starts") return `    ${noun} starting at line ${n}, column ${columns.start + 1}${suffix}`;
    if (label.length === 0) return `    ${noun} at line ${n}, column ${columns.start + 1}${suffix}`;
    return `    ${noun} at line ${n}, columns ${columns.start + 1} to ${columns.end}${suffix}`;
  }
}

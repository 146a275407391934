/* =======================================================================================
 * GRAPHICAL REPORT HANDLER
 * ---------------------------------------------------------------------------------------
 * Full report: code/url header, severity icon and message, cause chain, snippets,
 * help, footer, then related diagnostics nested below.
 * ======================================================================================= */

import { debug, type SourceCode } from "@spanlight/source";

import { causeChain, severityOf, type Diagnostic } from "./diagnostic.js";
import { resolveReportOptions, type ReportOptions, type ResolvedReportOptions } from "./options.js";
import type { ReportHandler } from "./report.js";
import { writeLine, type OutputSink } from "./sink.js";
import { SnippetRenderer } from "./snippet.js";
import { severityTable, type GraphicalTheme } from "./theme.js";
import { wrapText } from "./wrap.js";

const OSC8_OPEN = "\u001b]8;;";
const OSC8_CLOSE = "\u001b\\";

export function hyperlink(url: string, text: string): string {
  return `${OSC8_OPEN}${url}${OSC8_CLOSE}${text}${OSC8_OPEN}${OSC8_CLOSE}`;
}

export class GraphicalReportHandler implements ReportHandler {
  private readonly resolved: ResolvedReportOptions;
  private readonly snippets: SnippetRenderer;

  constructor(private readonly options: ReportOptions = {}) {
    this.resolved = resolveReportOptions(options);
    this.snippets = new SnippetRenderer(this.resolved);
  }

  get settings(): ResolvedReportOptions {
    return this.resolved;
  }

  // === Builders (each returns a new handler) ===

  withTheme(theme: GraphicalTheme): GraphicalReportHandler {
    return new GraphicalReportHandler({ ...this.options, theme });
  }

  withWidth(width: number): GraphicalReportHandler {
    return new GraphicalReportHandler({ ...this.options, width });
  }

  withTabWidth(tabWidth: number): GraphicalReportHandler {
    return new GraphicalReportHandler({ ...this.options, tabWidth });
  }

  withContextLines(contextLines: number): GraphicalReportHandler {
    return new GraphicalReportHandler({ ...this.options, contextLines });
  }

  withLinks(links: boolean): GraphicalReportHandler {
    return new GraphicalReportHandler({ ...this.options, links });
  }

  withFooter(footer: string): GraphicalReportHandler {
    return new GraphicalReportHandler({ ...this.options, footer });
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
    debug.report("render", { depth, labels: diagnostic.labels?.length ?? 0, hasSource: source !== undefined });

    this.renderHeader(diagnostic, sink, depth);
    this.renderCauses(diagnostic, sink);

    const labels = diagnostic.labels ?? [];
    if (labels.length > 0) {
      if (source) this.snippets.render(sink, source, labels);
      else debug.report("labels.no-source", { labels: labels.length });
    }

    this.renderFooter(diagnostic, sink, depth);
    this.renderRelated(diagnostic, sink, depth, source);
  }

  private renderHeader(diagnostic: Diagnostic, sink: OutputSink, depth: number): void {
    const { links, theme } = this.resolved;
    const severity = severityTable(theme)[severityOf(diagnostic)];
    const { code, url } = diagnostic;

    let header = "";
    if (url !== undefined && links) {
      const text = code !== undefined ? `${code} (link)` : "(link)";
      header = hyperlink(url, severity.style(text));
    } else if (code !== undefined) {
      header = severity.style(code);
      if (url !== undefined) header += ` (${theme.styles.link(url)})`;
    } else if (url !== undefined) {
      header = `(${theme.styles.link(url)})`;
    }

    if (depth > 0) {
      const title = severity.style(`${severity.title}:`);
      writeLine(sink, header ? `${title} ${header}` : title);
    } else if (header) {
      writeLine(sink, header);
    }
    writeLine(sink);
  }

  private renderCauses(diagnostic: Diagnostic, sink: OutputSink): void {
    const { theme, width } = this.resolved;
    const chars = theme.characters;
    const severity = severityTable(theme)[severityOf(diagnostic)];

    for (const line of wrapText(diagnostic.message, {
      width,
      initialIndent: `  ${severity.style(severity.icon)} `,
      subsequentIndent: `  ${severity.style(chars.vbar)} `,
    })) {
      writeLine(sink, line);
    }

    const chain = causeChain(diagnostic.cause);
    chain.forEach((cause, index) => {
      const last = index === chain.length - 1;
      const corner = last ? chars.lbot : chars.lcross;
      const lines = wrapText(cause.message, {
        width,
        initialIndent: `  ${severity.style(`${corner}${chars.hbar}${chars.rarrow}`)} `,
        subsequentIndent: last ? "      " : `  ${severity.style(chars.vbar)}   `,
      });
      for (const line of lines) writeLine(sink, line);
    });
  }

  private renderFooter(diagnostic: Diagnostic, sink: OutputSink, depth: number): void {
    const { theme, width, footer } = this.resolved;
    if (diagnostic.help !== undefined) {
      const lines = wrapText(diagnostic.help, {
        width,
        initialIndent: `  ${theme.styles.help("help:")} `,
        subsequentIndent: "        ",
      });
      for (const line of lines) writeLine(sink, line);
    }
    if (depth === 0 && footer !== undefined) {
      writeLine(sink);
      for (const line of wrapText(footer, { width, initialIndent: "  ", subsequentIndent: "  " })) {
        writeLine(sink, line);
      }
    }
  }

  private renderRelated(
    diagnostic: Diagnostic,
    sink: OutputSink,
    depth: number,
    source: SourceCode | undefined,
  ): void {
    const related = diagnostic.related ?? [];
    if (related.length === 0) return;
    if (depth >= this.resolved.maxRelatedDepth) {
      debug.report("related.depth-limit", { depth, skipped: related.length });
      writeLine(sink);
      writeLine(sink, `  ... ${related.length} related diagnostic(s) omitted (nesting limit ${this.resolved.maxRelatedDepth})`);
      return;
    }
    for (const child of related) {
      writeLine(sink);
      this.renderReport(child, sink, depth + 1, source);
    }
  }
}

// Report package public API
//
// Diagnostic model, report handlers (graphical and narratable), themes and options.

// === Diagnostics ===
export { buildDiagnostic, causeFromError, causeChain, severityOf, DEFAULT_SEVERITY } from "./diagnostic.js";
export type { Diagnostic, DiagnosticCause, DiagnosticInput, Severity } from "./diagnostic.js";

// === Handlers ===
export { GraphicalReportHandler, hyperlink } from "./graphical.js";
export { NarratableReportHandler } from "./narratable.js";
export { formatReport, createDefaultHandler } from "./report.js";
export type { ReportHandler, DefaultHandlerContext } from "./report.js";

// === Output ===
export { StringSink, streamSink, writeLine } from "./sink.js";
export type { OutputSink } from "./sink.js";

// === Options ===
export {
  resolveReportOptions,
  readEnvOptions,
  detectRenderMode,
  RenderError,
  RenderErrorCode,
  DEFAULT_CONTEXT_LINES,
  DEFAULT_WIDTH,
  DEFAULT_MAX_RELATED_DEPTH,
} from "./options.js";
export type {
  ReportOptions,
  ResolvedReportOptions,
  ContextLines,
  RenderMode,
  RenderErrorCodeType,
  Env,
} from "./options.js";

// === Themes ===
export { GraphicalTheme, ThemeCharacters, ThemeStyles, highlightStyle, severityTable, identityStyle } from "./theme.js";
export type { Style, SeverityPresentation } from "./theme.js";

// === Layout / snippets ===
export { classifySpan, layoutWindow, maxGutter, gutterDepth, isMultiLineRelation, spanColumns } from "./layout.js";
export type { SpanRelation, MultiLineRelation, LineLayout, WindowLayout, SpanColumns } from "./layout.js";
export { mergeWindows, pickAnchor } from "./merge.js";
export type { SnippetWindow, LabelFailure, MergeResult } from "./merge.js";
export { SnippetRenderer, anchorTrailingPoint, alignedContents, outOfBoundsNotice } from "./snippet.js";
export type { SnippetOptions } from "./snippet.js";

// === Text ===
export { wrapText, visibleWidth } from "./wrap.js";
export type { WrapOptions } from "./wrap.js";
export { plainHighlighter, paintRuns } from "./highlighter.js";
export type { Highlighter, StyledRun } from "./highlighter.js";

// Source package public API
//
// Spans, span resolution, line scanning and display columns.
// Import from here rather than deep paths for stability.

// === Spans ===
export {
  createSpan,
  labeled,
  primary,
  spanEnd,
  spanUnion,
  spansIntersect,
  isPointSpan,
  compareSpans,
} from "./span.js";
export type { SourceSpan, LabeledSpan } from "./span.js";

// === Errors ===
export { SourceError, SourceErrorCode, isOutOfBounds } from "./errors.js";
export type { SourceErrorCodeType } from "./errors.js";

// === Resolution ===
export { readSpan, tryReadSpan, locate, lineExtent } from "./resolve.js";
export type { SpanContents, LineExtent } from "./resolve.js";

// === Lines / columns ===
export { scanLines, utf8Length } from "./lines.js";
export type { Line } from "./lines.js";
export {
  displayColumn,
  stringWidth,
  charWidth,
  expandTabs,
  isCharBoundary,
  DEFAULT_TAB_WIDTH,
} from "./columns.js";

// === Source code ===
export { NamedSource, sourceFromText } from "./source-code.js";
export type { SourceCode, NamedSourceOptions } from "./source-code.js";

// === Debug ===
export { debug, configureDebug, refreshDebugChannels, getDebugChannel, isDebugEnabled } from "./debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./debug.js";

import type { Diagnostic } from "./diagnostic.js";
import { GraphicalReportHandler } from "./graphical.js";
import { NarratableReportHandler } from "./narratable.js";
import { detectRenderMode, readEnvOptions, type Env, type ReportOptions } from "./options.js";
import { StringSink, type OutputSink } from "./sink.js";
import { GraphicalTheme } from "./theme.js";

/** Renders one diagnostic (and everything related to it) into a sink. */
export interface ReportHandler {
  render(diagnostic: Diagnostic, sink: OutputSink): void;
}

/** Render into a string. */
export function formatReport(diagnostic: Diagnostic, handler: ReportHandler = new GraphicalReportHandler()): string {
  const sink = new StringSink();
  handler.render(diagnostic, sink);
  return sink.toString();
}

export interface DefaultHandlerContext {
  env?: Env;
  isTTY?: boolean;
}

/**
 * Handler suited to the current terminal. Environment options
 * (`COLUMNS`, `SPANLIGHT_TAB_WIDTH`) apply first, explicit options override them.
 */
export function createDefaultHandler(options: ReportOptions = {}, context: DefaultHandlerContext = {}): ReportHandler {
  const env = context.env ?? process.env;
  const isTTY = context.isTTY ?? process.stderr.isTTY === true;
  const merged: ReportOptions = { ...readEnvOptions(env), ...options };

  switch (detectRenderMode(env, isTTY)) {
    case "narratable":
      return new NarratableReportHandler(merged);
    case "graphical-plain":
      return new GraphicalReportHandler({ ...merged, theme: merged.theme ?? GraphicalTheme.unicodeNoColor() });
    case "graphical":
      return new GraphicalReportHandler({ ...merged, theme: merged.theme ?? GraphicalTheme.unicode() });
  }
}

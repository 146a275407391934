/* =======================================================================================
 * REPORT OPTIONS
 * ---------------------------------------------------------------------------------------
 * Caller options, their defaults, environment overrides and render-mode detection.
 * ======================================================================================= */

import { DEFAULT_TAB_WIDTH } from "@spanlight/source";

import { plainHighlighter, type Highlighter } from "./highlighter.js";
import { GraphicalTheme } from "./theme.js";

export class RenderError extends Error {
  constructor(
    message: string,
    public readonly code: RenderErrorCodeType,
    public readonly option?: string,
  ) {
    super(message);
    this.name = "RenderError";
  }
}

/** Error codes */
export const RenderErrorCode = {
  INVALID_OPTION: "RENDER_INVALID_OPTION",
} as const;

export type RenderErrorCodeType = (typeof RenderErrorCode)[keyof typeof RenderErrorCode];

export interface ContextLines {
  before: number;
  after: number;
}

export interface ReportOptions {
  /** Lines of context around each label; a single number applies to both sides. Default 1. */
  contextLines?: number | ContextLines;
  /** Wrap width for messages, causes and help text. Default 80. */
  width?: number;
  /** Tab stop width used for columns and tab expansion. Default 4. */
  tabWidth?: number;
  theme?: GraphicalTheme;
  /** Emit OSC 8 hyperlinks for diagnostic URLs. Default true. */
  links?: boolean;
  /** Text appended after a top-level report. */
  footer?: string;
  /** Nesting limit for related diagnostics. Default 16. */
  maxRelatedDepth?: number;
  highlighter?: Highlighter;
}

export interface ResolvedReportOptions {
  readonly contextLinesBefore: number;
  readonly contextLinesAfter: number;
  readonly width: number;
  readonly tabWidth: number;
  readonly theme: GraphicalTheme;
  readonly links: boolean;
  readonly footer: string | undefined;
  readonly maxRelatedDepth: number;
  readonly highlighter: Highlighter;
}

export const DEFAULT_CONTEXT_LINES = 1;
export const DEFAULT_WIDTH = 80;
export const DEFAULT_MAX_RELATED_DEPTH = 16;

function requireCount(value: number, option: string, minimum: number): number {
  if (!Number.isInteger(value) || value < minimum) {
    throw new RenderError(
      `Option "${option}" must be an integer >= ${minimum}, got ${value}`,
      RenderErrorCode.INVALID_OPTION,
      option,
    );
  }
  return value;
}

export function resolveReportOptions(options: ReportOptions = {}): ResolvedReportOptions {
  const context = options.contextLines ?? DEFAULT_CONTEXT_LINES;
  const { before, after } = typeof context === "number" ? { before: context, after: context } : context;
  return {
    contextLinesBefore: requireCount(before, "contextLines.before", 0),
    contextLinesAfter: requireCount(after, "contextLines.after", 0),
    width: requireCount(options.width ?? DEFAULT_WIDTH, "width", 1),
    tabWidth: requireCount(options.tabWidth ?? DEFAULT_TAB_WIDTH, "tabWidth", 1),
    theme: options.theme ?? GraphicalTheme.unicode(),
    links: options.links ?? true,
    footer: options.footer,
    maxRelatedDepth: requireCount(options.maxRelatedDepth ?? DEFAULT_MAX_RELATED_DEPTH, "maxRelatedDepth", 0),
    highlighter: options.highlighter ?? plainHighlighter,
  };
}

export type Env = Readonly<Record<string, string | undefined>>;

function parsePositive(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
}

/**
 * Options taken from the environment: `COLUMNS` sets the width and
 * `SPANLIGHT_TAB_WIDTH` the tab width. Unparseable values are ignored.
 */
export function readEnvOptions(env: Env = process.env): ReportOptions {
  const width = parsePositive(env["COLUMNS"]);
  const tabWidth = parsePositive(env["SPANLIGHT_TAB_WIDTH"]);
  return {
    ...(width !== undefined ? { width } : {}),
    ...(tabWidth !== undefined ? { tabWidth } : {}),
  };
}

/**
 * - `graphical`: unicode glyphs with ANSI colour.
 * - `graphical-plain`: unicode glyphs, no escape codes.
 * - `narratable`: linear text for screen readers and logs.
 */
export type RenderMode = "graphical" | "graphical-plain" | "narratable";

function isSet(value: string | undefined): boolean {
  return value !== undefined && value !== "" && value !== "0";
}

/**
 * Pick a render mode. `NO_COLOR` wins over everything, then
 * `CLICOLOR_FORCE` / `FORCE_COLOR`; otherwise colour needs a TTY outside CI,
 * and non-interactive output falls back to narration.
 */
export function detectRenderMode(env: Env, isTTY: boolean): RenderMode {
  if (isSet(env["NO_COLOR"])) return "graphical-plain";
  if (isSet(env["CLICOLOR_FORCE"]) || isSet(env["FORCE_COLOR"])) return "graphical";
  if (!isTTY || isSet(env["CI"])) return "narratable";
  return "graphical";
}

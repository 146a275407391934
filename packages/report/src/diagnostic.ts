/* =======================================================================================
 * DIAGNOSTIC MODEL
 * ---------------------------------------------------------------------------------------
 * Plain data handed to report handlers. Handlers only read it.
 * ======================================================================================= */

import { labeled, type LabeledSpan, type SourceCode } from "@spanlight/source";

export type Severity = "error" | "warning" | "advice";

export const DEFAULT_SEVERITY: Severity = "error";

/** One link of a cause chain, outermost first. */
export interface DiagnosticCause {
  /** Error class or category name, e.g. `TypeError`. */
  readonly kind: string;
  readonly message: string;
  readonly cause?: DiagnosticCause;
}

export interface Diagnostic {
  readonly message: string;
  readonly code?: string;
  /** Defaults to `error` when absent. */
  readonly severity?: Severity;
  readonly help?: string;
  readonly url?: string;
  /** Source the labels point into. Related diagnostics without one inherit their parent's. */
  readonly source?: SourceCode;
  readonly labels?: readonly LabeledSpan[];
  readonly cause?: DiagnosticCause;
  readonly related?: readonly Diagnostic[];
}

export interface DiagnosticInput {
  message: string;
  code?: string;
  severity?: Severity;
  help?: string;
  url?: string;
  source?: SourceCode;
  labels?: readonly LabeledSpan[];
  /** A thrown value is converted with {@link causeFromError}. */
  cause?: DiagnosticCause | Error;
  related?: readonly DiagnosticInput[];
}

const MAX_CAUSE_DEPTH = 32;

/**
 * Convert a thrown value and its `Error.cause` chain into a {@link DiagnosticCause}.
 * Chains longer than 32 links (or cyclic ones) are cut off.
 */
export function causeFromError(error: unknown, depth = 0): DiagnosticCause | undefined {
  if (error === undefined || error === null || depth >= MAX_CAUSE_DEPTH) return undefined;
  if (error instanceof Error) {
    const cause = causeFromError(error.cause, depth + 1);
    return { kind: error.name, message: error.message, ...(cause ? { cause } : {}) };
  }
  if (typeof error === "string") return { kind: "Error", message: error };
  return { kind: typeof error, message: String(error) };
}

/** Flatten a cause chain, outermost first. */
export function causeChain(cause: DiagnosticCause | undefined): DiagnosticCause[] {
  const chain: DiagnosticCause[] = [];
  let current = cause;
  while (current && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
}

export function severityOf(diagnostic: Diagnostic): Severity {
  return diagnostic.severity ?? DEFAULT_SEVERITY;
}

function toCause(cause: DiagnosticCause | Error): DiagnosticCause | undefined {
  return cause instanceof Error ? causeFromError(cause) : cause;
}

/**
 * Build a diagnostic, validating label spans (negative or fractional offsets
 * throw a `SourceError`) and converting `Error` causes.
 */
export function buildDiagnostic(input: DiagnosticInput): Diagnostic {
  const labels = input.labels?.map((span) => {
    const checked = labeled(span.offset, span.length, span.label);
    return span.primary === true ? { ...checked, primary: true } : checked;
  });
  const cause = input.cause !== undefined ? toCause(input.cause) : undefined;
  const related = input.related?.map(buildDiagnostic);

  return {
    message: input.message,
    severity: input.severity ?? DEFAULT_SEVERITY,
    ...(input.code !== undefined ? { code: input.code } : {}),
    ...(input.help !== undefined ? { help: input.help } : {}),
    ...(input.url !== undefined ? { url: input.url } : {}),
    ...(input.source !== undefined ? { source: input.source } : {}),
    ...(labels !== undefined ? { labels } : {}),
    ...(cause !== undefined ? { cause } : {}),
    ...(related !== undefined ? { related } : {}),
  };
}

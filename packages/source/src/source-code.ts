import { readSpan, type SpanContents } from "./resolve.js";
import type { SourceSpan } from "./span.js";

const encoder = new TextEncoder();

/** Source text a diagnostic points into. Read-only; the engine never mutates it. */
export interface SourceCode {
  /** File name (or any display name) shown in snippet headers. */
  readonly name?: string;
  /** Language hint for highlighters. */
  readonly language?: string;
  /** UTF-8 bytes of the whole source. */
  readonly bytes: Uint8Array;
  readSpan(span: SourceSpan, contextLinesBefore: number, contextLinesAfter: number): SpanContents;
}

export interface NamedSourceOptions {
  name?: string;
  language?: string;
}

/**
 * In-memory source held as UTF-8 bytes, optionally named.
 *
 * @example
 * const source = new NamedSource("let x = ;", { name: "main.ts" });
 * source.readSpan({ offset: 8, length: 1 }, 0, 0).column; // 8
 */
export class NamedSource implements SourceCode {
  readonly bytes: Uint8Array;
  readonly name?: string;
  readonly language?: string;

  constructor(text: string | Uint8Array, options: NamedSourceOptions = {}) {
    this.bytes = typeof text === "string" ? encoder.encode(text) : text;
    if (options.name !== undefined) this.name = options.name;
    if (options.language !== undefined) this.language = options.language;
  }

  readSpan(span: SourceSpan, contextLinesBefore: number, contextLinesAfter: number): SpanContents {
    return readSpan(this.bytes, span, contextLinesBefore, contextLinesAfter, this.name);
  }

  withLanguage(language: string): NamedSource {
    return new NamedSource(this.bytes, {
      language,
      ...(this.name !== undefined ? { name: this.name } : {}),
    });
  }
}

export function sourceFromText(text: string, name?: string): NamedSource {
  return new NamedSource(text, name !== undefined ? { name } : {});
}

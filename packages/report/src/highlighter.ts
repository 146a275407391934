import type { Style } from "./theme.js";

/** A run of text sharing one style. */
export interface StyledRun {
  readonly text: string;
  readonly style?: Style;
}

/**
 * Syntax highlighting hook. Receives one line of content at a time, with tabs
 * already expanded; the concatenated run texts must equal the input.
 */
export interface Highlighter {
  highlightLine(content: string, language?: string): readonly StyledRun[];
}

export const plainHighlighter: Highlighter = {
  highlightLine(content) {
    return [{ text: content }];
  },
};

export function paintRuns(runs: readonly StyledRun[]): string {
  let out = "";
  for (const run of runs) out += run.style ? run.style(run.text) : run.text;
  return out;
}

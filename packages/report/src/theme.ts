/* =======================================================================================
 * THEMES
 * ---------------------------------------------------------------------------------------
 * Glyph sets (unicode / ascii) and style sets (ANSI / none). A theme pairs one of each.
 * ======================================================================================= */

import { Chalk } from "chalk";

import type { Severity } from "./diagnostic.js";

export interface ThemeCharacters {
  readonly hbar: string;
  readonly vbar: string;
  readonly vbarBreak: string;
  readonly uarrow: string;
  readonly rarrow: string;
  readonly ltop: string;
  readonly lbot: string;
  readonly lbox: string;
  readonly rbox: string;
  readonly lcross: string;
  readonly underbar: string;
  readonly underline: string;
  readonly error: string;
  readonly warning: string;
  readonly advice: string;
}

export const ThemeCharacters = {
  unicode(): ThemeCharacters {
    return {
      hbar: "─",
      vbar: "│",
      vbarBreak: "·",
      uarrow: "▲",
      rarrow: "▶",
      ltop: "╭",
      lbot: "╰",
      lbox: "[",
      rbox: "]",
      lcross: "├",
      underbar: "┬",
      underline: "─",
      error: "×",
      warning: "⚠",
      advice: "☞",
    };
  },

  ascii(): ThemeCharacters {
    return {
      hbar: "-",
      vbar: "|",
      vbarBreak: ":",
      uarrow: "^",
      rarrow: ">",
      ltop: ",",
      lbot: "`",
      lbox: "[",
      rbox: "]",
      lcross: "|",
      underbar: "|",
      underline: "^",
      error: "x",
      warning: "!",
      advice: ">",
    };
  },
} as const;

export type Style = (text: string) => string;

export const identityStyle: Style = (text) => text;

export interface ThemeStyles {
  readonly error: Style;
  readonly warning: Style;
  readonly advice: Style;
  readonly help: Style;
  readonly link: Style;
  readonly filename: Style;
  readonly linum: Style;
  /** Cycled through by label index within a snippet window. */
  readonly highlights: readonly Style[];
}

export const ThemeStyles = {
  /** 16-colour ANSI styles, independent of chalk's own terminal detection. */
  ansi(): ThemeStyles {
    const ansi = new Chalk({ level: 1 });
    return {
      error: (text) => ansi.red(text),
      warning: (text) => ansi.yellow(text),
      advice: (text) => ansi.cyan(text),
      help: (text) => ansi.cyan(text),
      link: (text) => ansi.cyan.underline.bold(text),
      filename: (text) => ansi.bold(text),
      linum: (text) => ansi.dim(text),
      highlights: [
        (text) => ansi.magenta.bold(text),
        (text) => ansi.yellow.bold(text),
        (text) => ansi.green.bold(text),
      ],
    };
  },

  none(): ThemeStyles {
    return {
      error: identityStyle,
      warning: identityStyle,
      advice: identityStyle,
      help: identityStyle,
      link: identityStyle,
      filename: identityStyle,
      linum: identityStyle,
      highlights: [identityStyle],
    };
  },
} as const;

export interface GraphicalTheme {
  readonly characters: ThemeCharacters;
  readonly styles: ThemeStyles;
}

export const GraphicalTheme = {
  unicode(): GraphicalTheme {
    return { characters: ThemeCharacters.unicode(), styles: ThemeStyles.ansi() };
  },
  unicodeNoColor(): GraphicalTheme {
    return { characters: ThemeCharacters.unicode(), styles: ThemeStyles.none() };
  },
  ascii(): GraphicalTheme {
    return { characters: ThemeCharacters.ascii(), styles: ThemeStyles.ansi() };
  },
  /** Plain ASCII with no escape codes at all. */
  none(): GraphicalTheme {
    return { characters: ThemeCharacters.ascii(), styles: ThemeStyles.none() };
  },
} as const;

/** Style used for the label at `index` of a window. */
export function highlightStyle(styles: ThemeStyles, index: number): Style {
  const { highlights } = styles;
  if (highlights.length === 0) return identityStyle;
  return highlights[index % highlights.length] ?? identityStyle;
}

// === Severity table ===

export interface SeverityPresentation {
  readonly icon: string;
  readonly style: Style;
  /** Prefix of a related diagnostic's header line. */
  readonly title: string;
}

const SEVERITY_TITLES: Record<Severity, string> = {
  error: "Error",
  warning: "Warning",
  advice: "Advice",
};

export function severityTable(theme: GraphicalTheme): Record<Severity, SeverityPresentation> {
  const { characters, styles } = theme;
  return {
    error: { icon: characters.error, style: styles.error, title: SEVERITY_TITLES.error },
    warning: { icon: characters.warning, style: styles.warning, title: SEVERITY_TITLES.warning },
    advice: { icon: characters.advice, style: styles.advice, title: SEVERITY_TITLES.advice },
  };
}

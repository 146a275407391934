import { describe, test, expect } from "vitest";
import { NamedSource } from "@spanlight/source";

import type { Diagnostic } from "../src/diagnostic.js";
import { GraphicalReportHandler, hyperlink } from "../src/graphical.js";
import type { Highlighter } from "../src/highlighter.js";
import type { ReportOptions } from "../src/options.js";
import { formatReport } from "../src/report.js";
import { GraphicalTheme } from "../src/theme.js";

function render(diagnostic: Diagnostic, options: ReportOptions = {}): string {
  const handler = new GraphicalReportHandler({ theme: GraphicalTheme.unicodeNoColor(), links: false, ...options });
  return formatReport(diagnostic, handler);
}

function lines(...rows: string[]): string {
  return `${rows.join("\n")}\n`;
}

const badFile = (text: string) => new NamedSource(text, { name: "bad_file.ts" });

describe("single-line labels", () => {
  test("one label with code and help", () => {
    const out = render({
      message: "oops!",
      code: "oops::my::bad",
      help: "try doing it better next time?",
      source: badFile("source\n  text\n    here"),
      labels: [{ offset: 9, length: 4, label: "this bit here" }],
    });
    expect(out).toBe(
      lines(
        "oops::my::bad",
        "",
        "  × oops!",
        "   ╭─[bad_file.ts:2:3]",
        " 1 │ source",
        " 2 │   text",
        "   ·   ──┬─",
        "   ·     ╰── this bit here",
        " 3 │     here",
        "   ╰────",
        "  help: try doing it better next time?",
      ),
    );
  });

  test("several labels on one line stack their label rows", () => {
    const out = render({
      message: "oops!",
      source: badFile("source\n  text text text text text\n    here"),
      labels: [
        { offset: 9, length: 4, label: "x" },
        { offset: 14, length: 4, label: "y" },
        { offset: 24, length: 4, label: "z" },
      ],
    });
    expect(out).toBe(
      lines(
        "",
        "  × oops!",
        "   ╭─[bad_file.ts:2:3]",
        " 1 │ source",
        " 2 │   text text text text text",
        "   ·   ──┬─ ──┬─      ──┬─",
        "   ·     │    │         ╰── z",
        "   ·     │    ╰── y",
        "   ·     ╰── x",
        " 3 │     here",
        "   ╰────",
      ),
    );
  });

  test("unlabelled spans are underlined without a connector", () => {
    const out = render({
      message: "oops!",
      source: new NamedSource("one two"),
      labels: [{ offset: 4, length: 3 }],
    });
    expect(out).toBe(lines("", "  × oops!", "   ╭─[1:5]", " 1 │ one two", "   ·     ───", "   ╰────"));
  });

  test("a point renders an arrow", () => {
    const out = render({
      message: "unexpected token",
      source: new NamedSource("let x = ;\n", { name: "main.ts" }),
      labels: [{ offset: 8, length: 0, label: "expected expression" }],
    });
    expect(out).toBe(
      lines(
        "",
        "  × unexpected token",
        "   ╭─[main.ts:1:9]",
        " 1 │ let x = ;",
        "   ·         ▲",
        "   ·         ╰── expected expression",
        "   ╰────",
      ),
    );
  });

  test("a point at the end of a newline-terminated source stays on the last line", () => {
    const out = render({
      message: "unexpected end of input",
      source: new NamedSource("abc\n", { name: "a.txt" }),
      labels: [{ offset: 4, length: 0, label: "here" }],
    });
    expect(out).toBe(
      lines(
        "",
        "  × unexpected end of input",
        "   ╭─[a.txt:1:4]",
        " 1 │ abc",
        "   ·    ▲",
        "   ·    ╰── here",
        "   ╰────",
      ),
    );
  });

  test("tabs are expanded and columns follow them", () => {
    const out = render({
      message: "bad name",
      source: new NamedSource("\tx = 1"),
      labels: [{ offset: 1, length: 1, label: "name" }],
    });
    expect(out).toBe(
      lines("", "  × bad name", "   ╭─[1:2]", " 1 │     x = 1", "   ·     ┬", "   ·     ╰── name", "   ╰────"),
    );
  });

  test("multi-line label text continues under its connector", () => {
    const out = render({
      message: "oops!",
      source: new NamedSource("abc", { name: "a.txt" }),
      labels: [{ offset: 0, length: 3, label: "first\nsecond" }],
    });
    expect(out).toBe(
      lines(
        "",
        "  × oops!",
        "   ╭─[a.txt:1:1]",
        " 1 │ abc",
        "   · ─┬─",
        "   ·  ╰── first",
        "   ·  │   second",
        "   ╰────",
      ),
    );
  });
});

describe("multi-line labels", () => {
  test("adjacent blocks share one window", () => {
    const out = render({
      message: "oops!",
      code: "oops::my::bad",
      source: badFile("source\n  text\n    here\nmore here"),
      labels: [
        { offset: 0, length: 10, label: "this bit here" },
        { offset: 20, length: 6, label: "also this bit" },
      ],
    });
    expect(out).toBe(
      lines(
        "oops::my::bad",
        "",
        "  × oops!",
        "   ╭─[bad_file.ts:1:1]",
        " 1 │ ╭─▶ source",
        " 2 │ ├─▶   text",
        "   · ╰──── this bit here",
        " 3 │ ╭─▶     here",
        " 4 │ ├─▶ more here",
        "   · ╰──── also this bit",
        "   ╰────",
      ),
    );
  });

  test("a nested block flies past the outer one's gutter", () => {
    const out = render({
      message: "oops!",
      code: "oops::my::bad",
      help: "try doing it better next time?",
      source: badFile("line1\nline2\nline3\nline4\nline5\n"),
      labels: [
        { offset: 0, length: 30, label: "block 1" },
        { offset: 10, length: 9, label: "block 2" },
      ],
    });
    expect(out).toBe(
      lines(
        "oops::my::bad",
        "",
        "  × oops!",
        "   ╭─[bad_file.ts:1:1]",
        " 1 │ ╭──▶ line1",
        " 2 │ │╭─▶ line2",
        " 3 │ ││   line3",
        " 4 │ │├─▶ line4",
        "   · │╰──── block 2",
        " 5 │ ├──▶ line5",
        "   · ╰───── block 1",
        "   ╰────",
        "  help: try doing it better next time?",
      ),
    );
  });
});

describe("edge cases", () => {
  test("empty source renders an empty frame", () => {
    const out = render({
      message: "oops!",
      source: badFile(""),
      labels: [{ offset: 0, length: 0, label: "here" }],
    });
    expect(out).toBe(lines("", "  × oops!", "   ╭─[bad_file.ts:1:1]", "   ╰────"));
  });

  test("unreadable labels become notices", () => {
    const out = render({
      message: "oops!",
      source: new NamedSource("hello, world!"),
      labels: [{ offset: 50, length: 6, label: "bad" }],
    });
    expect(out).toBe(
      lines("", "  × oops!", "  Failed to read contents for label 'bad' (offset: 50, length: 6): OutOfBounds"),
    );
  });

  test("labels without a source are skipped", () => {
    const out = render({ message: "oops!", labels: [{ offset: 0, length: 1 }] });
    expect(out).toBe(lines("", "  × oops!"));
  });
});

describe("windows without leading context", () => {
  const source = () => badFile("aa\nlet x = ;\nbb\ncc\n");

  test("a mid-line span still shows its whole line", () => {
    const out = render(
      {
        message: "unexpected token",
        source: source(),
        labels: [
          { offset: 7, length: 1, label: "binding" },
          { offset: 11, length: 1, label: "missing value" },
        ],
      },
      { contextLines: 0 },
    );
    expect(out).toBe(
      lines(
        "",
        "  × unexpected token",
        "   ╭─[bad_file.ts:2:5]",
        " 2 │ let x = ;",
        "   ·     ┬   ┬",
        "   ·     │   ╰── missing value",
        "   ·     ╰── binding",
        "   ╰────",
      ),
    );
  });

  test("trailing context is kept when only leading context is off", () => {
    const out = render(
      { message: "unexpected token", source: source(), labels: [{ offset: 7, length: 1, label: "binding" }] },
      { contextLines: { before: 0, after: 2 } },
    );
    expect(out).toBe(
      lines(
        "",
        "  × unexpected token",
        "   ╭─[bad_file.ts:2:5]",
        " 2 │ let x = ;",
        "   ·     ┬",
        "   ·     ╰── binding",
        " 3 │ bb",
        " 4 │ cc",
        "   ╰────",
      ),
    );
  });
});

describe("report sections", () => {
  test("cause chain", () => {
    const out = render({
      message: "outer",
      code: "E1",
      url: "https://example.invalid/E1",
      cause: { kind: "Error", message: "middle", cause: { kind: "Error", message: "inner" } },
    });
    expect(out).toBe(lines("E1 (https://example.invalid/E1)", "", "  × outer", "  ├─▶ middle", "  ╰─▶ inner"));
  });

  test("links wrap the code in an OSC 8 hyperlink", () => {
    const out = render({ message: "outer", code: "E1", url: "https://example.invalid/E1" }, { links: true });
    expect(out).toBe(lines(hyperlink("https://example.invalid/E1", "E1 (link)"), "", "  × outer"));
    expect(hyperlink("https://example.invalid", "x")).toBe(
      "\u001b]8;;https://example.invalid\u001b\\x\u001b]8;;\u001b\\",
    );
  });

  test("messages wrap to the configured width", () => {
    const out = render({ message: "alpha beta gamma delta epsilon" }, { width: 18 });
    expect(out).toBe(lines("", "  × alpha beta", "  │ gamma delta", "  │ epsilon"));
  });

  test("related diagnostics inherit the parent's source", () => {
    const out = render({
      message: "parent",
      source: new NamedSource("abc", { name: "a.txt" }),
      related: [
        {
          message: "child",
          severity: "warning",
          code: "W1",
          labels: [{ offset: 0, length: 3, label: "here" }],
        },
      ],
    });
    expect(out).toBe(
      lines(
        "",
        "  × parent",
        "",
        "Warning: W1",
        "",
        "  ⚠ child",
        "   ╭─[a.txt:1:1]",
        " 1 │ abc",
        "   · ─┬─",
        "   ·  ╰── here",
        "   ╰────",
      ),
    );
  });

  test("related nesting stops at the depth limit", () => {
    const out = render({ message: "parent", related: [{ message: "child" }] }, { maxRelatedDepth: 0 });
    expect(out).toBe(lines("", "  × parent", "", "  ... 1 related diagnostic(s) omitted (nesting limit 0)"));
  });

  test("footer follows the top-level report", () => {
    const handler = new GraphicalReportHandler({ theme: GraphicalTheme.unicodeNoColor(), links: false }).withFooter(
      "see the docs",
    );
    expect(formatReport({ message: "oops!", help: "fix it" }, handler)).toBe(
      lines("", "  × oops!", "  help: fix it", "", "  see the docs"),
    );
  });
});

describe("themes and hooks", () => {
  test("ascii theme without colour", () => {
    const out = render(
      {
        message: "oops!",
        source: new NamedSource("abc", { name: "a.txt" }),
        labels: [{ offset: 0, length: 3, label: "here" }],
      },
      { theme: GraphicalTheme.none() },
    );
    expect(out).toBe(
      lines("", "  x oops!", "   ,-[a.txt:1:1]", " 1 | abc", "   : ^|^", "   :  `-- here", "   `----"),
    );
  });

  test("the highlighter styles source lines", () => {
    const brackets: Highlighter = {
      highlightLine: (content) => [{ text: content, style: (text) => `<${text}>` }],
    };
    const out = render(
      { message: "oops!", source: new NamedSource("abc"), labels: [{ offset: 0, length: 1 }] },
      { highlighter: brackets },
    );
    expect(out).toBe(lines("", "  × oops!", "   ╭─[1:1]", " 1 │ <abc>", "   · ─", "   ╰────"));
  });

  test("builders return configured copies", () => {
    const base = new GraphicalReportHandler();
    const narrow = base.withWidth(40).withTabWidth(2).withContextLines(3).withLinks(false);
    expect(base.settings.width).toBe(80);
    expect(narrow.settings).toMatchObject({
      width: 40,
      tabWidth: 2,
      contextLinesBefore: 3,
      contextLinesAfter: 3,
      links: false,
    });
  });
});

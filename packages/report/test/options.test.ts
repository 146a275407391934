import { describe, test, expect } from "vitest";

import { GraphicalReportHandler } from "../src/graphical.js";
import { NarratableReportHandler } from "../src/narratable.js";
import {
  detectRenderMode,
  readEnvOptions,
  RenderError,
  RenderErrorCode,
  resolveReportOptions,
} from "../src/options.js";
import { createDefaultHandler } from "../src/report.js";

describe("resolveReportOptions", () => {
  test("defaults", () => {
    const resolved = resolveReportOptions();
    expect(resolved).toMatchObject({
      contextLinesBefore: 1,
      contextLinesAfter: 1,
      width: 80,
      tabWidth: 4,
      links: true,
      footer: undefined,
      maxRelatedDepth: 16,
    });
    expect(resolved.theme.characters.hbar).toBe("─");
  });

  test("context lines may differ per side", () => {
    expect(resolveReportOptions({ contextLines: 2 })).toMatchObject({ contextLinesBefore: 2, contextLinesAfter: 2 });
    expect(resolveReportOptions({ contextLines: { before: 0, after: 3 } })).toMatchObject({
      contextLinesBefore: 0,
      contextLinesAfter: 3,
    });
  });

  test("rejects widths below one", () => {
    try {
      resolveReportOptions({ width: 0 });
      expect.unreachable("width 0 should be rejected");
    } catch (error) {
      expect(error).toBeInstanceOf(RenderError);
      if (error instanceof RenderError) {
        expect(error.code).toBe(RenderErrorCode.INVALID_OPTION);
        expect(error.option).toBe("width");
      }
    }
    expect(() => resolveReportOptions({ tabWidth: -1 })).toThrow(RenderError);
    expect(() => resolveReportOptions({ contextLines: 1.5 })).toThrow(RenderError);
  });
});

describe("readEnvOptions", () => {
  test("reads COLUMNS and SPANLIGHT_TAB_WIDTH", () => {
    expect(readEnvOptions({ COLUMNS: "100", SPANLIGHT_TAB_WIDTH: "2" })).toEqual({ width: 100, tabWidth: 2 });
  });

  test("ignores unusable values", () => {
    expect(readEnvOptions({ COLUMNS: "wide", SPANLIGHT_TAB_WIDTH: "0" })).toEqual({});
    expect(readEnvOptions({})).toEqual({});
  });
});

describe("detectRenderMode", () => {
  test("NO_COLOR wins", () => {
    expect(detectRenderMode({ NO_COLOR: "1", FORCE_COLOR: "1" }, true)).toBe("graphical-plain");
  });

  test("forced colour overrides a missing TTY", () => {
    expect(detectRenderMode({ CLICOLOR_FORCE: "1" }, false)).toBe("graphical");
    expect(detectRenderMode({ FORCE_COLOR: "0" }, false)).toBe("narratable");
  });

  test("terminals get colour, pipes and CI get narration", () => {
    expect(detectRenderMode({}, true)).toBe("graphical");
    expect(detectRenderMode({}, false)).toBe("narratable");
    expect(detectRenderMode({ CI: "true" }, true)).toBe("narratable");
  });
});

describe("createDefaultHandler", () => {
  test("narration off a terminal", () => {
    expect(createDefaultHandler({}, { env: {}, isTTY: false })).toBeInstanceOf(NarratableReportHandler);
  });

  test("plain unicode under NO_COLOR, with env and explicit options merged", () => {
    const handler = createDefaultHandler({ tabWidth: 8 }, { env: { NO_COLOR: "1", COLUMNS: "60" }, isTTY: true });
    expect(handler).toBeInstanceOf(GraphicalReportHandler);
    if (handler instanceof GraphicalReportHandler) {
      expect(handler.settings.width).toBe(60);
      expect(handler.settings.tabWidth).toBe(8);
      expect(handler.settings.theme.styles.error("x")).toBe("x");
      expect(handler.settings.theme.characters.vbar).toBe("│");
    }
  });

  test("an explicitly undefined theme keeps the plain theme under NO_COLOR", () => {
    const handler = createDefaultHandler({ theme: undefined }, { env: { NO_COLOR: "1" }, isTTY: true });
    expect(handler).toBeInstanceOf(GraphicalReportHandler);
    if (handler instanceof GraphicalReportHandler) {
      expect(handler.settings.theme.styles.error("x")).toBe("x");
    }
  });
});

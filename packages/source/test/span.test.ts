import { describe, test, expect } from "vitest";

import {
  compareSpans,
  createSpan,
  isPointSpan,
  labeled,
  primary,
  spanEnd,
  spansIntersect,
  spanUnion,
} from "../src/span.js";
import { SourceError, SourceErrorCode } from "../src/errors.js";

describe("createSpan", () => {
  test("accepts non-negative integers", () => {
    expect(createSpan(3, 0)).toEqual({ offset: 3, length: 0 });
    expect(spanEnd(createSpan(3, 4))).toBe(7);
  });

  test("rejects negative or fractional parts", () => {
    for (const [offset, length] of [
      [-1, 2],
      [0, -1],
      [1.5, 0],
    ] as const) {
      try {
        createSpan(offset, length);
        expect.unreachable("createSpan should throw");
      } catch (error) {
        expect(error).toBeInstanceOf(SourceError);
        if (error instanceof SourceError) expect(error.code).toBe(SourceErrorCode.INVALID_SPAN);
      }
    }
  });
});

describe("labels", () => {
  test("labeled omits the label key when there is none", () => {
    expect(labeled(1, 2)).toEqual({ offset: 1, length: 2 });
    expect(labeled(1, 2, "here")).toEqual({ offset: 1, length: 2, label: "here" });
  });

  test("primary flags the anchor", () => {
    expect(primary(1, 2, "x")).toEqual({ offset: 1, length: 2, label: "x", primary: true });
  });
});

describe("span relations", () => {
  test("union covers both spans and the gap between them", () => {
    expect(spanUnion({ offset: 0, length: 3 }, { offset: 5, length: 2 })).toEqual({ offset: 0, length: 7 });
    expect(spanUnion({ offset: 4, length: 1 }, { offset: 2, length: 0 })).toEqual({ offset: 2, length: 3 });
  });

  test("intersection is half-open", () => {
    expect(spansIntersect({ offset: 0, length: 3 }, { offset: 3, length: 1 })).toBe(false);
    expect(spansIntersect({ offset: 0, length: 3 }, { offset: 2, length: 2 })).toBe(true);
  });

  test("points intersect spans that contain their offset", () => {
    expect(isPointSpan({ offset: 2, length: 0 })).toBe(true);
    expect(spansIntersect({ offset: 2, length: 0 }, { offset: 0, length: 3 })).toBe(true);
    expect(spansIntersect({ offset: 3, length: 0 }, { offset: 0, length: 3 })).toBe(false);
    expect(spansIntersect({ offset: 3, length: 0 }, { offset: 3, length: 0 })).toBe(true);
  });

  test("ordering is by offset, longer first on ties", () => {
    const spans = [
      { offset: 5, length: 1 },
      { offset: 2, length: 3 },
      { offset: 2, length: 5 },
    ];
    expect([...spans].sort(compareSpans)).toEqual([
      { offset: 2, length: 5 },
      { offset: 2, length: 3 },
      { offset: 5, length: 1 },
    ]);
  });
});

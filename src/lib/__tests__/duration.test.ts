import { describe, expect, it } from "vitest";

import { parseDuration } from "../duration";

describe("parseDuration", () => {
  it.each([
    ["90", 90_000],
    ["0", 0],
    ["1500ms", 1_500],
    ["1.5s", 1_500],
    ["90s", 90_000],
    ["1m", 60_000],
    ["2h", 7_200_000],
    [" 30s ", 30_000],
  ])("should parse %j", (value, expected) => {
    expect(parseDuration(value)).toBe(expected);
  });

  it.each(["", "soon", "-5s", "5d", "1m30s", "s"])("should reject %j", (value) => {
    expect(parseDuration(value)).toBeNull();
  });
});

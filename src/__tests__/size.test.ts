import { describe, it, expect } from "vitest";
import { defaultSizeRules, estimateLabelLines, estimateLabelSize, mergeSizeRules } from "../size.js";

describe("estimateLabelLines", () => {
  it("wraps on the characters-per-line constant", () => {
    expect(estimateLabelLines("")).toBe(1);
    expect(estimateLabelLines("x".repeat(28))).toBe(1);
    expect(estimateLabelLines("x".repeat(29))).toBe(2);
    expect(estimateLabelLines("x".repeat(57))).toBe(3);
  });
});

describe("estimateLabelSize", () => {
  it("derives height from line count", () => {
    expect(estimateLabelSize("AND CT")).toEqual({ width: 240, height: 42 });
    expect(estimateLabelSize("x".repeat(40))).toEqual({ width: 240, height: 60 });
  });

  it("honours custom rules", () => {
    const cfg = mergeSizeRules({ chars_per_line: 10, line_height: 20, label_padding: 0, node_width: 100 });
    expect(estimateLabelSize("x".repeat(25), cfg)).toEqual({ width: 100, height: 60 });
  });
});

describe("mergeSizeRules", () => {
  it("falls back to defaults for missing or invalid values", () => {
    expect(mergeSizeRules(undefined)).toEqual(defaultSizeRules);
    expect(mergeSizeRules({ chars_per_line: -3, line_height: "abc", node_height: "80" })).toEqual({
      ...defaultSizeRules,
      node_height: 80,
    });
  });
});

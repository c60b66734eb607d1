import { describe, it, expect } from "vitest";
import {
  estimateTokens,
  estimateSize,
  countLines,
  sizeIssues,
  DEFAULT_TOKEN_WARNING_THRESHOLD,
} from "../src/token-estimator.js";

describe("estimateTokens", () => {
  it("rounds characters per token up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });

  it("counts code points rather than UTF-16 units", () => {
    expect(estimateTokens("😀😀😀😀")).toBe(1);
  });

  it("honors a custom ratio and ignores a non-positive one", () => {
    expect(estimateTokens("abcdef", 3)).toBe(2);
    expect(estimateTokens("abcdef", 0)).toBe(2);
  });

  it("never decreases when text is appended", () => {
    const bases = ["", "a", "# Rule\n", "x".repeat(1001)];
    const suffixes = ["b", "\n", "- Use strict mode", "é".repeat(17)];
    for (const base of bases) {
      for (const suffix of suffixes) {
        expect(estimateTokens(base + suffix)).toBeGreaterThanOrEqual(estimateTokens(base));
      }
    }
  });

  it("is deterministic", () => {
    const text = "## Coding Standards\n\n- Prefer early returns\n";
    expect(estimateTokens(text)).toBe(estimateTokens(text));
  });
});

describe("countLines", () => {
  it("does not count a trailing newline as an extra line", () => {
    expect(countLines("")).toBe(0);
    expect(countLines("a")).toBe(1);
    expect(countLines("a\n")).toBe(1);
    expect(countLines("a\nb")).toBe(2);
  });
});

describe("estimateSize", () => {
  it("reports tokens, UTF-8 bytes and lines", () => {
    expect(estimateSize("héllo\n")).toEqual({
      estimatedTokens: 2,
      bytes: 7,
      lines: 1,
      tier: "ok",
    });
  });

  it("moves to the warning tier above the token threshold", () => {
    const text = "x".repeat((DEFAULT_TOKEN_WARNING_THRESHOLD + 1) * 4);
    expect(estimateSize(text).tier).toBe("warning");
    expect(estimateSize(text, { tokenWarningThreshold: 5000 }).tier).toBe("ok");
  });

  it("moves to the warning tier above the line threshold", () => {
    expect(estimateSize("a\nb\nc\n", { lineWarningThreshold: 2 }).tier).toBe("warning");
  });
});

describe("sizeIssues", () => {
  it("returns nothing within thresholds", () => {
    expect(sizeIssues(estimateSize("short"))).toEqual([]);
  });

  it("reports both token and line overruns", () => {
    const options = { tokenWarningThreshold: 1, lineWarningThreshold: 1 };
    const estimate = estimateSize("abcdefgh\nij\n", options);
    expect(sizeIssues(estimate, options).map((i) => i.message)).toEqual([
      "oversized: 3 estimated tokens (threshold 1)",
      "oversized: 2 lines (threshold 1)",
    ]);
  });
});

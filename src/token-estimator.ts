// src/token-estimator.ts — Approximate token and size budget for templates
// Heuristic, not a tokenizer: code points divided by an average characters-per-token ratio.
// Rules are included in every matching AI request, so oversized ones waste context.

import type { EstimatorOptions, SizeEstimate, ValidationIssue } from "./types.js";

export const DEFAULT_CHARS_PER_TOKEN = 4;
export const DEFAULT_TOKEN_WARNING_THRESHOLD = 1000;
// Rule guidance: keep each file under 150 lines
export const DEFAULT_LINE_WARNING_THRESHOLD = 150;

export const DEFAULT_ESTIMATOR_OPTIONS: EstimatorOptions = {
  charsPerToken: DEFAULT_CHARS_PER_TOKEN,
  tokenWarningThreshold: DEFAULT_TOKEN_WARNING_THRESHOLD,
  lineWarningThreshold: DEFAULT_LINE_WARNING_THRESHOLD,
};

/**
 * Estimate the token count of a text. Deterministic, and never decreases as text is appended.
 */
export function estimateTokens(
  text: string,
  charsPerToken: number = DEFAULT_CHARS_PER_TOKEN,
): number {
  const ratio = charsPerToken > 0 ? charsPerToken : DEFAULT_CHARS_PER_TOKEN;
  let codePoints = 0;
  for (const _ of text) codePoints++;
  return Math.ceil(codePoints / ratio);
}

export function countLines(text: string): number {
  if (text.length === 0) return 0;
  const n = text.split("\n").length;
  return text.endsWith("\n") ? n - 1 : n;
}

export function estimateSize(
  text: string,
  options: Partial<EstimatorOptions> = {},
): SizeEstimate {
  const opts = { ...DEFAULT_ESTIMATOR_OPTIONS, ...options };
  const estimatedTokens = estimateTokens(text, opts.charsPerToken);
  const lines = countLines(text);
  const over =
    estimatedTokens > opts.tokenWarningThreshold || lines > opts.lineWarningThreshold;

  return {
    estimatedTokens,
    bytes: Buffer.byteLength(text, "utf8"),
    lines,
    tier: over ? "warning" : "ok",
  };
}

/**
 * Advisory issues for an estimate over its thresholds. Never blocking.
 */
export function sizeIssues(
  estimate: SizeEstimate,
  options: Partial<EstimatorOptions> = {},
): ValidationIssue[] {
  const opts = { ...DEFAULT_ESTIMATOR_OPTIONS, ...options };
  const issues: ValidationIssue[] = [];

  if (estimate.estimatedTokens > opts.tokenWarningThreshold) {
    issues.push({
      severity: "warning",
      code: "Oversized",
      message: `oversized: ${estimate.estimatedTokens} estimated tokens (threshold ${opts.tokenWarningThreshold})`,
    });
  }
  if (estimate.lines > opts.lineWarningThreshold) {
    issues.push({
      severity: "warning",
      code: "Oversized",
      message: `oversized: ${estimate.lines} lines (threshold ${opts.lineWarningThreshold})`,
    });
  }

  return issues;
}

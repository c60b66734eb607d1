// src/pipeline.ts — Starter kit pipeline
// Single linear pass per request: select → substitute → validate → package.

import { packageArchive } from "./archive.js";
import type { TemplateCatalog } from "./catalog.js";
import { buildSelection, type BuildOptions } from "./selection.js";
import { hasBlockingIssues } from "./validator.js";
import type { ResolvedConfig, SelectionOutcome, SelectionRequest, ValidationResult } from "./types.js";

export interface StarterKitOptions extends BuildOptions {
  archiveRoot?: string;
  /** Package even when a rule is missing required frontmatter. */
  force?: boolean;
}

export interface StarterKitResult {
  outcome: SelectionOutcome;
  /** Absent when selection failed or packaging was blocked. */
  archive?: Uint8Array;
  blocked: boolean;
  /** Rules whose blocking issues withheld the archive. */
  blockedBy: string[];
}

/**
 * Build and package a starter kit. ArchiveIOError propagates to the caller.
 */
export function createStarterKit(
  catalog: TemplateCatalog,
  request: SelectionRequest,
  options: StarterKitOptions = {},
): StarterKitResult {
  const outcome = buildSelection(catalog, request, options);
  if (outcome.status === "unresolved") {
    return { outcome, blocked: true, blockedBy: [] };
  }

  const blockedBy = outcome.validations.filter(hasBlockingIssues).map((v) => v.path);
  if (blockedBy.length > 0 && !options.force) {
    return { outcome, blocked: true, blockedBy };
  }

  const archive = packageArchive(outcome.files, { rootDir: options.archiveRoot ?? "" });
  return { outcome, archive, blocked: false, blockedBy };
}

/**
 * Starter kit options derived from resolved config.
 */
export function optionsFromConfig(
  config: ResolvedConfig,
  force = false,
): StarterKitOptions {
  return {
    archiveRoot: config.archiveRoot,
    includeAgentsMd: config.includeAgentsMd,
    includeReadme: config.includeReadme,
    force,
    validation: {
      estimator: {
        charsPerToken: config.charsPerToken,
        tokenWarningThreshold: config.tokenWarningThreshold,
        lineWarningThreshold: config.lineWarningThreshold,
      },
    },
  };
}

// ─── Reporting ───────────────────────────────────────────────────────────────

/**
 * Format validation results for console output.
 */
export function formatValidationReport(results: readonly ValidationResult[]): string {
  const invalid = results.filter((r) => !r.isValid).length;
  const warnings = results.reduce(
    (n, r) => n + r.issues.filter((i) => i.severity === "warning").length,
    0,
  );
  const tokens = results.reduce((n, r) => n + r.size.estimatedTokens, 0);

  const lines: string[] = [];
  lines.push(
    `[VALIDATE] ${results.length} document(s), ${invalid} invalid, ${warnings} warning(s), ~${tokens} tokens`,
  );

  for (const result of results) {
    for (const issue of result.issues) {
      const marker = issue.severity === "error" ? "✗" : "⚠";
      lines.push(`[VALIDATE]   ${marker} ${result.path}: ${issue.message}`);
    }
  }

  return lines.join("\n");
}

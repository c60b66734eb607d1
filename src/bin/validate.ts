// src/bin/validate.ts — Validate rule and command files on disk

import { existsSync, readFileSync } from "node:fs";
import { resolve, sep } from "node:path";
import type { ParsedArgs } from "../config.js";
import { formatValidationReport } from "../pipeline.js";
import type { ResolvedConfig, TemplateCategory, ValidationResult } from "../types.js";
import { validateDocument } from "../validator.js";
import { stderr, stdout } from "./io.js";

/**
 * Files under a `commands` directory are commands; everything else is treated as a rule.
 */
export function inferCategory(filePath: string): TemplateCategory {
  const segments = filePath.split(/[\\/]/);
  return segments.slice(0, -1).includes("commands") ? "command" : "rule";
}

/**
 * Returns the process exit code: 0 when every file is valid, 1 otherwise, 2 on usage errors.
 */
export function runValidate(args: ParsedArgs, config: ResolvedConfig): number {
  if (args.positionals.length === 0) {
    stderr("Usage: cursor-kickstart validate <files...> [--category rule|command]");
    return 2;
  }
  const forced = parseCategory(args.category);
  if (forced === null) {
    stderr(`[error] --category must be "rule" or "command", got "${args.category ?? ""}"`);
    return 2;
  }

  const results: ValidationResult[] = [];
  let missing = 0;

  for (const file of args.positionals) {
    const absPath = resolve(file);
    if (!existsSync(absPath)) {
      stderr(`[error] File not found: ${file}`);
      missing++;
      continue;
    }
    const category = forced ?? inferCategory(absPath.split(sep).join("/"));
    results.push(
      validateDocument(file, readFileSync(absPath, "utf-8"), category, {
        estimator: {
          charsPerToken: config.charsPerToken,
          tokenWarningThreshold: config.tokenWarningThreshold,
          lineWarningThreshold: config.lineWarningThreshold,
        },
      }),
    );
  }

  if (results.length > 0) {
    stdout(formatValidationReport(results));
  }

  return missing > 0 || results.some((r) => !r.isValid) ? 1 : 0;
}

function parseCategory(value: string | undefined): TemplateCategory | undefined | null {
  if (value === undefined) return undefined;
  if (value === "rule" || value === "command") return value;
  return null;
}

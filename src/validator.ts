// src/validator.ts — Frontmatter Validator
// Checks a document's leading header against its category schema and attaches a size estimate.
// All problems are returned as issues; nothing here throws.

import picomatch from "picomatch";
import { parseFrontmatter } from "./frontmatter.js";
import { schemaFor } from "./frontmatter-schema.js";
import { estimateSize, sizeIssues } from "./token-estimator.js";
import type {
  EstimatorOptions,
  FieldSpec,
  Frontmatter,
  FrontmatterSchema,
  FrontmatterValue,
  IssueCode,
  TemplateCategory,
  ValidationIssue,
  ValidationResult,
} from "./types.js";

export interface ValidateOptions {
  /** Overrides the category's default schema. */
  schema?: FrontmatterSchema;
  estimator?: Partial<EstimatorOptions>;
}

// Issues that mean a rule cannot be activated by Cursor at all
const BLOCKING_CODES: ReadonlySet<IssueCode> = new Set<IssueCode>([
  "FrontmatterMissing",
  "NoFrontmatter",
  "InvalidFrontmatter",
]);

/**
 * Validate one document. Commands skip schema checks and are always valid.
 */
export function validateDocument(
  path: string,
  text: string,
  category: TemplateCategory,
  options: ValidateOptions = {},
): ValidationResult {
  const size = estimateSize(text, options.estimator);
  const issues: ValidationIssue[] = [];

  if (category === "rule") {
    const schema = options.schema ?? schemaFor(category);
    issues.push(...checkRuleHeader(text, schema));
  }

  issues.push(...sizeIssues(size, options.estimator));

  return {
    path,
    category,
    isValid: !issues.some((i) => i.severity === "error"),
    issues,
    size,
  };
}

/**
 * Whether an issue prevents a rule from being packaged.
 */
export function isBlockingIssue(issue: ValidationIssue): boolean {
  return issue.severity === "error" && BLOCKING_CODES.has(issue.code);
}

export function hasBlockingIssues(result: ValidationResult): boolean {
  return result.category === "rule" && result.issues.some(isBlockingIssue);
}

// ─── Rule header checks ──────────────────────────────────────────────────────

function checkRuleHeader(text: string, schema: FrontmatterSchema): ValidationIssue[] {
  const parsed = parseFrontmatter(text);

  if (!parsed.hasHeader) {
    return [{ severity: "error", code: "NoFrontmatter", message: "no frontmatter found" }];
  }
  if (parsed.error !== undefined || parsed.frontmatter === null) {
    return [
      {
        severity: "error",
        code: "InvalidFrontmatter",
        message: `invalid frontmatter: ${parsed.error ?? "unreadable header"}`,
      },
    ];
  }

  const frontmatter = parsed.frontmatter;
  const missing: ValidationIssue[] = [];
  const mismatched: ValidationIssue[] = [];
  const unknown: ValidationIssue[] = [];

  for (const [field, spec] of Object.entries(schema)) {
    if (spec.required && isAbsent(frontmatter[field])) {
      missing.push({
        severity: "error",
        code: "FrontmatterMissing",
        message: `missing field: ${field}`,
        field,
      });
    }
  }

  for (const [field, value] of Object.entries(frontmatter)) {
    const spec = schema[field];
    if (!spec) {
      unknown.push({
        severity: "warning",
        code: "UnknownFrontmatterField",
        message: `unknown field: ${field}`,
        field,
      });
      continue;
    }
    // Absent optional fields are fine; absent required ones were reported above
    if (value === null) continue;

    const issue = checkField(field, value, spec);
    if (issue) mismatched.push(issue);
  }

  return [
    ...missing,
    ...mismatched,
    ...unknown,
    ...checkGlobs(frontmatter),
    ...checkActivation(frontmatter),
  ];
}

function checkField(
  field: string,
  value: FrontmatterValue,
  spec: FieldSpec,
): ValidationIssue | null {
  if (!matchesType(value, spec)) {
    return {
      severity: "error",
      code: "FrontmatterTypeMismatch",
      message: `type mismatch: ${field}`,
      field,
    };
  }
  if (spec.allowed && !isAllowed(value, spec.allowed)) {
    return {
      severity: "error",
      code: "FrontmatterInvalidValue",
      message: `invalid value: ${field}`,
      field,
    };
  }
  return null;
}

function matchesType(value: FrontmatterValue, spec: FieldSpec): boolean {
  switch (spec.type) {
    case "string":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "number":
      return typeof value === "number";
    case "string[]":
      return Array.isArray(value) && value.every((v) => typeof v === "string");
  }
}

function isAllowed(
  value: FrontmatterValue,
  allowed: readonly (string | number | boolean)[],
): boolean {
  const values = Array.isArray(value) ? value : [value];
  return values.every(
    (v) =>
      (typeof v === "string" || typeof v === "number" || typeof v === "boolean") &&
      allowed.includes(v),
  );
}

function isAbsent(value: FrontmatterValue | undefined): boolean {
  return value === undefined || value === null;
}

function checkGlobs(frontmatter: Frontmatter): ValidationIssue[] {
  const globs = frontmatter.globs;
  if (!Array.isArray(globs)) return [];

  const issues: ValidationIssue[] = [];
  for (const glob of globs) {
    if (typeof glob !== "string") continue;
    if (!isCompilableGlob(glob)) {
      issues.push({
        severity: "warning",
        code: "InvalidGlob",
        message: `invalid glob: ${glob}`,
        field: "globs",
      });
    }
  }
  return issues;
}

function isCompilableGlob(glob: string): boolean {
  if (glob.trim().length === 0) return false;
  try {
    picomatch.makeRe(glob, { strictBrackets: true });
    return true;
  } catch {
    return false;
  }
}

function checkActivation(frontmatter: Frontmatter): ValidationIssue[] {
  const { alwaysApply, globs, description } = frontmatter;
  const neverApplies = alwaysApply === false;
  const noGlobs = Array.isArray(globs) && globs.length === 0;
  const noDescription = typeof description === "string" && description.trim().length === 0;

  if (neverApplies && noGlobs && noDescription) {
    return [
      {
        severity: "warning",
        code: "InactiveRule",
        message: "rule is never activated: alwaysApply is false, globs is empty and description is blank",
      },
    ];
  }
  return [];
}

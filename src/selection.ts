// src/selection.ts — Selection Set Builder
// Resolves a SelectionRequest against the catalog, substitutes placeholders, validates
// every selected document and appends the scaffold files. Problems are collected, never thrown.

import type { TemplateCatalog } from "./catalog.js";
import { generateReadme, AGENTS_MD_TEMPLATE_NAME } from "./scaffold.js";
import { applySubstitutions } from "./substitution.js";
import { validateDocument, type ValidateOptions } from "./validator.js";
import type {
  ResolvedFile,
  SelectionOutcome,
  SelectionRequest,
  TemplateDocument,
  ValidationIssue,
  ValidationResult,
  Warning,
} from "./types.js";
import { AGENTS_MD_PATH, README_PATH } from "./types.js";

export interface BuildOptions {
  validation?: ValidateOptions;
  /** Used when the request does not say. Default false. */
  includeAgentsMd?: boolean;
  /** Used when the request does not say. Default false. */
  includeReadme?: boolean;
}

const encoder = new TextEncoder();

export function buildSelection(
  catalog: TemplateCatalog,
  request: SelectionRequest,
  options: BuildOptions = {},
): SelectionOutcome {
  const warnings: Warning[] = [];
  const requested = request.templates ?? catalog.defaults().map((d) => d.path);

  // Step 1: resolve identities
  const issues: ValidationIssue[] = [];
  const selected = new Map<string, TemplateDocument>();
  const reported = new Set<string>();

  for (const path of requested) {
    const doc = catalog.get(path);
    if (doc) {
      selected.set(path, doc);
    } else if (!reported.has(path)) {
      reported.add(path);
      issues.push(unknownTemplate(path));
    }
  }

  const overrides = request.overrides ?? {};
  for (const path of Object.keys(overrides)) {
    if (!selected.has(path) && !reported.has(path)) {
      reported.add(path);
      issues.push(unknownTemplate(path));
    }
  }

  if (issues.length > 0) {
    return { status: "unresolved", issues, warnings };
  }

  const documents = [...selected.values()].sort(
    (a, b) => catalog.indexOf(a.path) - catalog.indexOf(b.path),
  );

  // Steps 2-3: substitute, then validate the substituted text
  const files: ResolvedFile[] = [];
  const validations: ValidationResult[] = [];

  for (const doc of documents) {
    const source = overrides[doc.path] ?? doc.content;
    const text = substitute(doc.path, source, request, warnings);
    validations.push(validateDocument(doc.path, text, doc.category, options.validation));
    files.push({ path: doc.path, content: encoder.encode(text) });
  }

  // Scaffold files
  // Off unless asked for; the CLI config turns both on
  const includeAgentsMd = request.includeAgentsMd ?? options.includeAgentsMd ?? false;
  const includeReadme = request.includeReadme ?? options.includeReadme ?? false;

  if (includeAgentsMd) {
    const template = catalog.scaffold[AGENTS_MD_TEMPLATE_NAME];
    if (template === undefined) {
      warnings.push({
        level: "warn",
        module: "selection",
        message: "No AGENTS.md scaffold template in catalog; skipping AGENTS.md",
      });
    } else if (!selected.has(AGENTS_MD_PATH)) {
      const text = substitute(AGENTS_MD_PATH, template, request, warnings);
      files.push({ path: AGENTS_MD_PATH, content: encoder.encode(text) });
    }
  }

  if (includeReadme && !selected.has(README_PATH)) {
    files.push({ path: README_PATH, content: encoder.encode(generateReadme(documents)) });
  }

  // Step 4: success reflects rule validity only; invalid documents are still returned
  const success = validations.every((v) => v.category !== "rule" || v.isValid);

  return { status: "resolved", files, validations, success, warnings };
}

function substitute(
  path: string,
  text: string,
  request: SelectionRequest,
  warnings: Warning[],
): string {
  const result = applySubstitutions(text, request.variables);
  if (result.unresolved.length > 0) {
    warnings.push({
      level: "info",
      module: "selection",
      message: `Placeholders left for manual editing: ${result.unresolved.join(", ")}`,
      file: path,
    });
  }
  return result.text;
}

function unknownTemplate(path: string): ValidationIssue {
  return {
    severity: "error",
    code: "UnknownTemplate",
    message: `unknown template: ${path}`,
  };
}

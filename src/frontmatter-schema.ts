// src/frontmatter-schema.ts — Frontmatter contracts per template category
// Rules carry activation metadata; commands are plain markdown with no header contract.

import type { FrontmatterSchema, TemplateCategory } from "./types.js";

export const RULE_SCHEMA: FrontmatterSchema = {
  description: {
    type: "string",
    required: true,
    description:
      "Brief summary shown in the Cursor UI when browsing rules. The agent also reads it to decide whether to include the rule when activation is left to the agent.",
    example: 'description: "Coding standards for Python files"',
  },
  globs: {
    type: "string[]",
    required: true,
    description:
      "File patterns that trigger this rule. Opening a matching file adds the rule to the AI context.",
    example: 'globs:\n  - "**/*.py"\n  - "src/**/*.ts"',
  },
  alwaysApply: {
    type: "boolean",
    required: true,
    description:
      "When true, the rule is always included regardless of which files are open. Keep these minimal to preserve context space.",
    example: "alwaysApply: true",
  },
};

export const COMMAND_SCHEMA: FrontmatterSchema = {};

export function schemaFor(category: TemplateCategory): FrontmatterSchema {
  return category === "rule" ? RULE_SCHEMA : COMMAND_SCHEMA;
}

/**
 * Render schema documentation as a markdown table.
 */
export function formatSchemaTable(schema: FrontmatterSchema): string {
  const lines = [
    "| Field | Type | Required | Description |",
    "|-------|------|----------|-------------|",
  ];
  for (const [field, spec] of Object.entries(schema)) {
    const type = spec.allowed
      ? `${spec.type} (${spec.allowed.map((v) => JSON.stringify(v)).join(" | ")})`
      : spec.type;
    lines.push(`| \`${field}\` | ${type} | ${spec.required ? "yes" : "no"} | ${spec.description} |`);
  }
  return lines.join("\n");
}

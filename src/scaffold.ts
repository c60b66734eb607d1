// src/scaffold.ts — Fixed kit files generated around the selected templates
// README.md is assembled in code from the selection; AGENTS.md comes from the scaffold template.

import type { TemplateDocument } from "./types.js";
import { COMMANDS_DIR, RULES_DIR } from "./types.js";

export const AGENTS_MD_TEMPLATE_NAME = "AGENTS.md";

/**
 * Build the kit README listing exactly the selected rules and commands.
 */
export function generateReadme(documents: readonly TemplateDocument[]): string {
  const rules = documents.filter((d) => d.category === "rule");
  const commands = documents.filter((d) => d.category === "command");
  const lines: string[] = [];

  lines.push("# Cursor Starter Kit");
  lines.push("");
  lines.push("Ready-to-use Cursor Rules and Commands for this project.");
  lines.push("");
  lines.push("## Quick Setup");
  lines.push("");
  lines.push("1. Copy the `.cursor/` folder to your project root");
  lines.push("2. (Optional) Copy `AGENTS.md` to your project root");
  lines.push("3. Fill in any remaining `{{placeholder}}` and `[bracketed]` text");
  lines.push("4. Start using commands by typing `/` in Cursor chat");

  if (rules.length > 0) {
    lines.push("");
    lines.push(`### Rules (\`${RULES_DIR}/\`)`);
    lines.push("");
    lines.push("| Rule | Purpose |");
    lines.push("|------|---------|");
    for (const rule of rules) {
      lines.push(`| \`${rule.name}\` | ${tableCell(rule.description)} |`);
    }
  }

  if (commands.length > 0) {
    lines.push("");
    lines.push(`### Commands (\`${COMMANDS_DIR}/\`)`);
    lines.push("");
    lines.push("| Command | Purpose |");
    lines.push("|---------|---------|");
    for (const command of commands) {
      const slash = `/${command.name.replace(/\.mdc?$/, "")}`;
      lines.push(`| \`${slash}\` | ${tableCell(command.description)} |`);
    }
  }

  lines.push("");
  lines.push("## Rules vs Commands");
  lines.push("");
  lines.push("- Rules give Cursor persistent context. They apply automatically through `globs` or `alwaysApply`.");
  lines.push("- Commands run on demand when you type `/command-name` in chat.");
  lines.push("");

  return lines.join("\n");
}

function tableCell(text: string): string {
  const cell = text.replace(/\|/g, "\\|").replace(/\s*\n\s*/g, " ").trim();
  return cell.length > 0 ? cell : "-";
}

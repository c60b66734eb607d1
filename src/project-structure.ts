// src/project-structure.ts — project-structure.md rule generation
// AI-assisted when a TextGenerator is available, otherwise a fixed template.

import type { TextGenerator } from "./llm/client.js";
import { applySubstitutions } from "./substitution.js";
import {
  projectStructureFallback,
  projectStructureTemplate,
} from "./templates/project-structure.js";
import { RULES_DIR } from "./types.js";

export const PROJECT_STRUCTURE_PATH = `${RULES_DIR}/project-structure.md`;

export interface ProjectStructureInput {
  projectName: string;
  techStack: string[];
  mainFiles: string;
  architectureNotes: string;
}

export interface ProjectStructureResult {
  content: string;
  source: "ai" | "template";
}

const DEFAULT_TREE = "src/\n├── main.py\n└── utils.py";

/**
 * Template-based project-structure.md. Deterministic.
 */
export function generateTemplateStructure(input: ProjectStructureInput): string {
  // Single line, so the quoted description header stays valid YAML
  const name = input.projectName.replace(/\s+/g, " ").trim() || "My Project";
  const stack = cleanStack(input.techStack);

  return applySubstitutions(projectStructureFallback, {
    description: `Project structure and architecture overview for ${name}`.replace(/["\\]/g, "'"),
    projectName: name,
    overview: `A project built with ${stack.length > 0 ? stack.join(", ") : "various technologies"}.`,
    directoryTree: input.mainFiles.trim() || DEFAULT_TREE,
    architecture: input.architectureNotes.trim() || "Describe your architecture here.",
    technologies:
      stack.length > 0 ? stack.map((t) => `- **${t}**`).join("\n") : "- Not specified",
  }).text;
}

/**
 * Generate project-structure.md, preferring the text generator when one is given.
 * Generator failures propagate; the template is used only when no generator exists.
 */
export async function generateProjectStructure(
  input: ProjectStructureInput,
  generator: TextGenerator | null = null,
): Promise<ProjectStructureResult> {
  if (!generator) {
    return { content: generateTemplateStructure(input), source: "template" };
  }

  const output = await generator.generate(projectStructureTemplate.formatInstructions, {
    system: projectStructureTemplate.systemPrompt,
    variables: {
      projectName: input.projectName,
      techStack: cleanStack(input.techStack).join(", ") || "Not specified",
      mainFiles: input.mainFiles || "Not specified",
      architectureNotes: input.architectureNotes || "Not specified",
    },
  });

  return { content: stripCodeFence(output), source: "ai" };
}

function cleanStack(techStack: readonly string[]): string[] {
  return techStack.map((t) => t.trim()).filter((t) => t.length > 0);
}

/**
 * Models often wrap the whole document in a ```markdown fence.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = /^```(?:markdown|md)?\s*\n([\s\S]*?)\n```$/.exec(trimmed);
  return `${(match ? match[1] : trimmed).trimEnd()}\n`;
}

// src/bin/structure.ts — Generate a project-structure.md rule

import { resolve } from "node:path";
import { splitList, type ParsedArgs } from "../config.js";
import { createTextGenerator, type TextGenerator } from "../llm/client.js";
import { generateProjectStructure, type ProjectStructureInput } from "../project-structure.js";
import type { ResolvedConfig, Warning } from "../types.js";
import { stderr, writeFileSafe } from "./io.js";

export function structureInputFromArgs(args: ParsedArgs): ProjectStructureInput {
  return {
    projectName: args.name ?? "",
    techStack: splitList(args.stack ?? ""),
    mainFiles: args.files ?? "",
    architectureNotes: args.notes ?? "",
  };
}

/**
 * The text generator for `--ai`, or null with a warning when no API key is configured.
 */
export function generatorForArgs(
  args: ParsedArgs,
  config: ResolvedConfig,
  warnings: Warning[],
): TextGenerator | null {
  if (!args.ai) return null;
  const generator = createTextGenerator(config.llm);
  if (!generator) {
    warnings.push({
      level: "warn",
      module: "structure",
      message: `--ai needs ${config.llm.provider === "openai" ? "OPENAI_API_KEY" : "ANTHROPIC_API_KEY"}; using the template instead`,
    });
  }
  return generator;
}

export async function runStructure(
  args: ParsedArgs,
  config: ResolvedConfig,
  warnings: Warning[],
): Promise<number> {
  const input = structureInputFromArgs(args);
  if (!input.projectName) {
    stderr("Usage: cursor-kickstart structure --name <project> [--stack a,b] [--files <tree>] [--notes <text>] [--ai]");
    return 2;
  }

  const generator = generatorForArgs(args, config, warnings);
  if (generator && args.verbose) {
    stderr(`[INFO] Calling LLM (${config.llm.provider}, ${config.llm.model})...`);
  }

  const result = await generateProjectStructure(input, generator);

  if (args.output) {
    const outPath = resolve(args.output);
    writeFileSafe(outPath, result.content);
    if (!args.quiet) stderr(`Written to ${outPath} (${result.source})`);
  } else {
    process.stdout.write(result.content);
  }
  return 0;
}

// src/bin/build.ts — Build and write a starter kit archive

import { resolve } from "node:path";
import type { TemplateCatalog } from "../catalog.js";
import { parseVariables, splitList, type ParsedArgs } from "../config.js";
import { loadCatalog } from "../loader.js";
import { createStarterKit, formatValidationReport, optionsFromConfig } from "../pipeline.js";
import { generateProjectStructure, PROJECT_STRUCTURE_PATH } from "../project-structure.js";
import type { ResolvedConfig, SelectionRequest, Warning } from "../types.js";
import { printWarnings, stderr, stdout, writeFileSafe } from "./io.js";
import { generatorForArgs, structureInputFromArgs } from "./structure.js";

/**
 * Returns the process exit code: 0 on success, 1 on unknown templates, invalid rules or a
 * blocked archive.
 */
export async function runBuild(
  args: ParsedArgs,
  config: ResolvedConfig,
  warnings: Warning[],
): Promise<number> {
  const catalog = loadCatalog(config.templatesDir, warnings);
  const request = await requestFromArgs(args, config, catalog, warnings);

  const start = performance.now();
  const result = createStarterKit(catalog, request, optionsFromConfig(config, args.force));
  const { outcome } = result;

  printWarnings([...warnings, ...outcome.warnings], args.quiet);

  if (outcome.status === "unresolved") {
    for (const issue of outcome.issues) stderr(`[error] ${issue.message}`);
    stderr("Run `cursor-kickstart list` to see available templates.");
    return 1;
  }

  stdout(formatValidationReport(outcome.validations));

  if (args.dryRun) {
    for (const file of outcome.files) {
      stdout(`  ${file.path} (${file.content.byteLength} bytes)`);
    }
    return outcome.success ? 0 : 1;
  }

  if (!result.archive) {
    stderr(
      `[error] Archive not written: missing required frontmatter in ${result.blockedBy.join(", ")}. ` +
        "Fix the rules or pass --force to package anyway.",
    );
    return 1;
  }

  const outPath = resolve(config.output);
  writeFileSafe(outPath, result.archive);
  if (!args.quiet) {
    stderr(`Written to ${outPath} (${outcome.files.length} files, ${result.archive.byteLength} bytes)`);
  }
  if (args.verbose) {
    stderr(`[INFO] Built in ${Math.round(performance.now() - start)}ms`);
  }

  return outcome.success ? 0 : 1;
}

async function requestFromArgs(
  args: ParsedArgs,
  config: ResolvedConfig,
  catalog: TemplateCatalog,
  warnings: Warning[],
): Promise<SelectionRequest> {
  const templates =
    args.positionals.length > 0
      ? args.positionals.map((ref) => catalog.find(ref)?.path ?? ref)
      : undefined;

  const variables = parseVariables(args.vars, warnings);
  if (args.name && variables.projectName === undefined) variables.projectName = args.name;
  if (args.stack && variables.techStack === undefined) variables.techStack = splitList(args.stack);

  // Project details on the command line regenerate project-structure.md
  const overrides: Record<string, string> = {};
  const wantsStructure = Boolean(args.name || args.stack || args.files || args.notes);
  const selected = templates ?? catalog.defaults().map((d) => d.path);

  if (wantsStructure && selected.includes(PROJECT_STRUCTURE_PATH)) {
    const generator = generatorForArgs(args, config, warnings);
    const projectName = variables.projectName;
    const structure = await generateProjectStructure(
      {
        ...structureInputFromArgs(args),
        projectName: typeof projectName === "string" ? projectName : "",
      },
      generator,
    );
    overrides[PROJECT_STRUCTURE_PATH] = structure.content;
  }

  return { templates, variables, overrides };
}

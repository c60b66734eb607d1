#!/usr/bin/env node
// CLI entry point for cursor-kickstart

import { ENGINE_VERSION, formatSchemaTable, loadCatalog, RULE_SCHEMA } from "../index.js";
import { parseCliArgs, resolveConfig, type ParsedArgs } from "../config.js";
import type { ResolvedConfig, Warning } from "../types.js";
import { printWarnings, stderr, stdout } from "./io.js";

const HELP_TEXT = `
cursor-kickstart v${ENGINE_VERSION}

Usage:
  cursor-kickstart list                        List bundled rule and command templates
  cursor-kickstart build [templates...]        Build a starter kit ZIP (default: default selection)
  cursor-kickstart validate <files...>         Validate rule frontmatter and size
  cursor-kickstart structure --name <project>  Generate a project-structure.md rule
  cursor-kickstart schema                      Show the rule frontmatter fields

Options:
  --var key=value      Placeholder value, repeatable (techStack takes a comma list)
  --output, -o         Output path (build: cursor-starter-kit.zip; structure: stdout)
  --root               Folder inside the archive (default: cursor-starter-kit, "" for none)
  --no-agents          Leave AGENTS.md out of the kit
  --no-readme          Leave README.md out of the kit
  --force              Write the archive even when a rule is missing required frontmatter
  --dry-run            Validate and list kit files without writing
  --name, --stack      Project name and comma-separated tech stack
  --files, --notes     Directory layout and architecture notes for project-structure.md
  --ai                 Generate project-structure.md with the configured LLM
  --category           validate: force "rule" or "command"
  --templates, -t      Template directory (default: bundled templates)
  --config, -c         Path to config file (default: kickstart.config.json)
  --quiet, -q          Suppress warnings
  --verbose, -v        Print timing and LLM details
  --help, -h           Show this help text

Environment Variables:
  ANTHROPIC_API_KEY    Enables --ai with Anthropic
  OPENAI_API_KEY       Enables --ai with OpenAI
  KICKSTART_LLM_PROVIDER, KICKSTART_LLM_MODEL

Examples:
  npx cursor-kickstart build --var projectName=Acme --var techStack=TypeScript,React
  npx cursor-kickstart build cursor-rules debug --root "" -o kit.zip
  npx cursor-kickstart validate .cursor/rules/*.md
  npx cursor-kickstart structure --name Acme --stack "Go,Postgres" --ai -o .cursor/rules/project-structure.md
`.trim();

async function main(): Promise<void> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(args.help ? 0 : 2);
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);

  const code = await dispatch(args, config, warnings);
  process.exit(code);
}

async function dispatch(
  args: ParsedArgs,
  config: ResolvedConfig,
  warnings: Warning[],
): Promise<number> {
  switch (args.command) {
    case "list": {
      const catalog = loadCatalog(config.templatesDir, warnings);
      printWarnings(warnings, args.quiet);
      for (const category of ["rule", "command"] as const) {
        stdout(category === "rule" ? "Rules:" : "Commands:");
        for (const doc of catalog.list(category)) {
          const marker = doc.defaultSelected ? "*" : " ";
          stdout(`  ${marker} ${doc.path}  ${doc.description}`);
        }
      }
      stdout("\n* selected by default");
      return 0;
    }
    case "build": {
      const { runBuild } = await import("./build.js");
      return runBuild(args, config, warnings);
    }
    case "validate": {
      const { runValidate } = await import("./validate.js");
      printWarnings(warnings, args.quiet);
      return runValidate(args, config);
    }
    case "structure": {
      const { runStructure } = await import("./structure.js");
      const code = await runStructure(args, config, warnings);
      printWarnings(warnings, args.quiet);
      return code;
    }
    case "schema":
      stdout(formatSchemaTable(RULE_SCHEMA));
      return 0;
    default:
      stderr(`Unknown command: ${args.command}\n`);
      stderr(HELP_TEXT);
      return 2;
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(2);
});

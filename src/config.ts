// src/config.ts — Config Resolver
// Merge order: defaults ← config file ← environment ← CLI args. Problems become warnings.

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { DEFAULT_MODELS } from "./llm/client.js";
import { defaultTemplatesDir } from "./loader.js";
import { DEFAULT_ESTIMATOR_OPTIONS } from "./token-estimator.js";
import type { LLMProvider, ResolvedConfig, Warning } from "./types.js";

export const CONFIG_FILENAME = "kickstart.config.json";
export const DEFAULT_ARCHIVE_ROOT = "cursor-starter-kit";
export const DEFAULT_OUTPUT = "cursor-starter-kit.zip";

export interface ParsedArgs {
  command?: string;
  positionals: string[];
  config?: string;
  templates?: string;
  output?: string;
  root?: string;
  vars: string[];
  category?: string;
  name?: string;
  stack?: string;
  files?: string;
  notes?: string;
  ai: boolean;
  agents?: boolean;
  readme?: boolean;
  force: boolean;
  dryRun: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

interface FileConfig {
  templatesDir?: string;
  archiveRoot?: string;
  output?: string;
  charsPerToken?: number;
  tokenWarningThreshold?: number;
  lineWarningThreshold?: number;
  includeAgentsMd?: boolean;
  includeReadme?: boolean;
  llm?: {
    provider?: LLMProvider;
    model?: string;
    maxOutputTokens?: number;
    baseUrl?: string;
    apiKey?: string;
  };
}

const PROVIDERS: readonly LLMProvider[] = ["anthropic", "openai"];
const DEFAULT_MAX_OUTPUT_TOKENS = 4096;

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const file = loadConfigFile(args.config, cwd, warnings) ?? {};
  const llmFile = file.llm ?? {};

  const provider = resolveProvider(env.KICKSTART_LLM_PROVIDER ?? llmFile.provider, env, warnings);
  const envKey = provider === "openai" ? env.OPENAI_API_KEY : env.ANTHROPIC_API_KEY;

  return {
    templatesDir: args.templates
      ? resolve(cwd, args.templates)
      : file.templatesDir
        ? resolve(cwd, file.templatesDir)
        : defaultTemplatesDir(),
    archiveRoot: args.root ?? file.archiveRoot ?? DEFAULT_ARCHIVE_ROOT,
    output: args.output ?? file.output ?? DEFAULT_OUTPUT,
    charsPerToken: positive(
      "charsPerToken",
      file.charsPerToken,
      DEFAULT_ESTIMATOR_OPTIONS.charsPerToken,
      warnings,
    ),
    tokenWarningThreshold: positive(
      "tokenWarningThreshold",
      file.tokenWarningThreshold,
      DEFAULT_ESTIMATOR_OPTIONS.tokenWarningThreshold,
      warnings,
    ),
    lineWarningThreshold: positive(
      "lineWarningThreshold",
      file.lineWarningThreshold,
      DEFAULT_ESTIMATOR_OPTIONS.lineWarningThreshold,
      warnings,
    ),
    includeAgentsMd: args.agents ?? file.includeAgentsMd ?? true,
    includeReadme: args.readme ?? file.includeReadme ?? true,
    llm: {
      provider,
      model: env.KICKSTART_LLM_MODEL ?? llmFile.model ?? DEFAULT_MODELS[provider],
      maxOutputTokens: positive(
        "llm.maxOutputTokens",
        llmFile.maxOutputTokens,
        DEFAULT_MAX_OUTPUT_TOKENS,
        warnings,
      ),
      baseUrl: llmFile.baseUrl,
      apiKey: envKey ?? llmFile.apiKey,
    },
    verbose: args.verbose,
  };
}

/**
 * Without an explicit choice, use whichever provider has a key, preferring Anthropic.
 */
function resolveProvider(
  requested: string | undefined,
  env: NodeJS.ProcessEnv,
  warnings: Warning[],
): LLMProvider {
  if (requested !== undefined) {
    const match = PROVIDERS.find((p) => p === requested);
    if (match) return match;
    warnings.push({
      level: "warn",
      module: "config",
      message: `Unknown LLM provider "${requested}". Expected one of: ${PROVIDERS.join(", ")}. Using anthropic.`,
    });
    return "anthropic";
  }
  if (!env.ANTHROPIC_API_KEY && env.OPENAI_API_KEY) return "openai";
  return "anthropic";
}

function positive(
  name: string,
  value: number | undefined,
  fallback: number,
  warnings: Warning[],
): number {
  if (value === undefined) return fallback;
  if (Number.isFinite(value) && value > 0) return value;
  warnings.push({
    level: "warn",
    module: "config",
    message: `Ignoring ${name}=${String(value)}: must be a positive number. Using ${fallback}.`,
  });
  return fallback;
}

// ─── Config file ─────────────────────────────────────────────────────────────

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // "kickstart" key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && isRecord(pkg.kickstart)) {
        return toFileConfig(pkg.kickstart, pkgJson, warnings);
      }
    } catch {
      // A broken package.json belongs to the user's project, not to us
      return null;
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    if (!isRecord(parsed)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file ${filePath} must contain a JSON object`,
      });
      return null;
    }
    return toFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

function toFileConfig(
  raw: Record<string, unknown>,
  filePath: string,
  warnings: Warning[],
): FileConfig {
  const config: FileConfig = {
    templatesDir: str(raw.templatesDir),
    archiveRoot: str(raw.archiveRoot),
    output: str(raw.output),
    charsPerToken: num(raw.charsPerToken),
    tokenWarningThreshold: num(raw.tokenWarningThreshold),
    lineWarningThreshold: num(raw.lineWarningThreshold),
    includeAgentsMd: bool(raw.includeAgentsMd),
    includeReadme: bool(raw.includeReadme),
  };

  if (isRecord(raw.llm)) {
    const llm = raw.llm;
    const provider = str(llm.provider);
    config.llm = {
      provider: PROVIDERS.find((p) => p === provider),
      model: str(llm.model),
      maxOutputTokens: num(llm.maxOutputTokens),
      baseUrl: str(llm.baseUrl),
      apiKey: str(llm.apiKey),
    };
    if (provider !== undefined && config.llm.provider === undefined) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Unknown LLM provider "${provider}" in ${filePath}. Expected one of: ${PROVIDERS.join(", ")}.`,
      });
    }
    if (config.llm.apiKey) {
      warnings.push({
        level: "warn",
        module: "config",
        message:
          "API keys should not be stored in config files. Use ANTHROPIC_API_KEY or OPENAI_API_KEY instead.",
      });
    }
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function num(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function bool(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

// ─── CLI args ────────────────────────────────────────────────────────────────

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { o: "output", c: "config", t: "templates", q: "quiet", v: "verbose", h: "help" },
    boolean: ["ai", "force", "dry-run", "quiet", "verbose", "help", "agents", "readme"],
    string: ["output", "config", "templates", "root", "var", "category", "name", "stack", "files", "notes"],
  });

  const positionals = args._.map(String);
  const [command, ...rest] = positionals;

  return {
    command,
    positionals: rest,
    config: optionalString(args.config),
    templates: optionalString(args.templates),
    output: optionalString(args.output),
    root: typeof args.root === "string" ? args.root : undefined,
    vars: toStringList(args.var),
    category: optionalString(args.category),
    name: optionalString(args.name),
    stack: optionalString(args.stack),
    files: optionalString(args.files),
    notes: optionalString(args.notes),
    ai: args.ai === true,
    // mri turns --no-agents into agents=false; absent flags stay undefined
    agents: argv.some((a) => a === "--agents" || a === "--no-agents") ? args.agents === true : undefined,
    readme: argv.some((a) => a === "--readme" || a === "--no-readme") ? args.readme === true : undefined,
    force: args.force === true,
    dryRun: args["dry-run"] === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
  };
}

/**
 * Parse repeated `--var key=value` flags. Comma-separated `techStack` becomes a list.
 */
export function parseVariables(
  vars: string[],
  warnings: Warning[] = [],
): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  for (const entry of vars) {
    const eq = entry.indexOf("=");
    if (eq <= 0) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Ignoring --var "${entry}": expected key=value`,
      });
      continue;
    }
    const key = entry.slice(0, eq).trim();
    const value = entry.slice(eq + 1);
    out[key] = LIST_VARIABLES.has(key) ? splitList(value) : value;
  }
  return out;
}

const LIST_VARIABLES = new Set(["techStack"]);

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function toStringList(value: unknown): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value.map(String);
  return [String(value)];
}

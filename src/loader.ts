// src/loader.ts — Catalog Loader
// Reads a template directory into a TemplateCatalog:
//   rules/*.md|mdc     → .cursor/rules/<name>
//   commands/*.md      → .cursor/commands/<name>
//   scaffold/AGENTS.md → AGENTS.md scaffold template
//   manifest.json      → { entries: { "<dir>/<name>": { title?, description?, defaultSelected? } } }

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import picomatch from "picomatch";
import { TemplateCatalog, createTemplateDocument } from "./catalog.js";
import { AGENTS_MD_TEMPLATE_NAME } from "./scaffold.js";
import type { TemplateCategory, TemplateDocument, Warning } from "./types.js";
import { COMMANDS_DIR, FileNotFoundError, RULES_DIR } from "./types.js";

export interface ManifestEntry {
  title?: string;
  description?: string;
  defaultSelected?: boolean;
}

interface SourceDir {
  dir: string;
  category: TemplateCategory;
  outputDir: string;
  isMatch: (name: string) => boolean;
}

const SOURCE_DIRS: SourceDir[] = [
  { dir: "rules", category: "rule", outputDir: RULES_DIR, isMatch: picomatch("*.{md,mdc}") },
  { dir: "commands", category: "command", outputDir: COMMANDS_DIR, isMatch: picomatch("*.md") },
];

/**
 * The templates bundled with this package.
 */
export function defaultTemplatesDir(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "..", "templates");
}

/**
 * Load a template directory. Throws FileNotFoundError when the directory is missing;
 * everything else is reported through warnings.
 */
export function loadCatalog(
  templatesDir: string,
  warnings: Warning[] = [],
): TemplateCatalog {
  const absDir = resolve(templatesDir);
  if (!existsSync(absDir) || !statSync(absDir).isDirectory()) {
    throw new FileNotFoundError(absDir);
  }

  const manifest = loadManifest(join(absDir, "manifest.json"), warnings);
  const used = new Set<string>();
  const documents: TemplateDocument[] = [];

  for (const source of SOURCE_DIRS) {
    const dirPath = join(absDir, source.dir);
    if (!existsSync(dirPath)) continue;

    const names = readdirSync(dirPath)
      .filter((name) => source.isMatch(name) && statSync(join(dirPath, name)).isFile())
      .sort();

    for (const name of names) {
      const key = `${source.dir}/${name}`;
      const meta = manifest[key] ?? {};
      used.add(key);

      documents.push(
        createTemplateDocument({
          path: `${source.outputDir}/${name}`,
          category: source.category,
          content: readFileSync(join(dirPath, name), "utf-8"),
          title: meta.title,
          description: meta.description,
          defaultSelected: meta.defaultSelected,
        }),
      );
    }
  }

  for (const key of Object.keys(manifest)) {
    if (!used.has(key)) {
      warnings.push({
        level: "warn",
        module: "loader",
        message: `Manifest entry has no template file: ${key}`,
        file: join(absDir, key),
      });
    }
  }

  const scaffold: Record<string, string> = {};
  const agentsMdPath = join(absDir, "scaffold", AGENTS_MD_TEMPLATE_NAME);
  if (existsSync(agentsMdPath)) {
    scaffold[AGENTS_MD_TEMPLATE_NAME] = readFileSync(agentsMdPath, "utf-8");
  }

  return new TemplateCatalog(documents, scaffold);
}

function loadManifest(
  manifestPath: string,
  warnings: Warning[],
): Record<string, ManifestEntry> {
  if (!existsSync(manifestPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(manifestPath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "loader",
      message: `Failed to parse manifest: ${msg}`,
      file: manifestPath,
    });
    return {};
  }

  const entries = isRecord(parsed) ? parsed.entries : undefined;
  if (!isRecord(entries)) {
    warnings.push({
      level: "warn",
      module: "loader",
      message: `Manifest has no "entries" object`,
      file: manifestPath,
    });
    return {};
  }

  const result: Record<string, ManifestEntry> = {};
  for (const [key, raw] of Object.entries(entries)) {
    if (!isRecord(raw)) {
      warnings.push({
        level: "warn",
        module: "loader",
        message: `Ignoring malformed manifest entry: ${key}`,
        file: manifestPath,
      });
      continue;
    }
    result[key] = {
      title: typeof raw.title === "string" ? raw.title : undefined,
      description: typeof raw.description === "string" ? raw.description : undefined,
      defaultSelected: typeof raw.defaultSelected === "boolean" ? raw.defaultSelected : undefined,
    };
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// src/frontmatter.ts — Leading YAML header parsing
// A header exists only when the first line is `---` and a later line closes it with `---`.

import yaml from "js-yaml";
import type { Frontmatter, FrontmatterValue } from "./types.js";

export interface ParsedDocument {
  hasHeader: boolean;
  frontmatter: Frontmatter | null;
  body: string;
  /** Set when a header is present but is not a parsable key/value mapping. */
  error?: string;
}

const MARKER = "---";
const BOM = "\uFEFF";

/**
 * Split a document into its frontmatter mapping and body.
 */
export function parseFrontmatter(raw: string): ParsedDocument {
  const text = raw.startsWith(BOM) ? raw.slice(BOM.length) : raw;
  const lines = text.split("\n");
  if (lines.length < 2 || !isMarker(lines[0])) {
    return { hasHeader: false, frontmatter: null, body: text };
  }

  let closing = -1;
  for (let i = 1; i < lines.length; i++) {
    if (isMarker(lines[i])) {
      closing = i;
      break;
    }
  }
  if (closing === -1) {
    return { hasHeader: false, frontmatter: null, body: text };
  }

  const header = lines.slice(1, closing).join("\n");
  const body = lines.slice(closing + 1).join("\n");

  let loaded: unknown;
  try {
    loaded = yaml.load(header, { schema: yaml.JSON_SCHEMA });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message.split("\n")[0] : String(err);
    return { hasHeader: true, frontmatter: null, body, error: msg };
  }

  // An empty header loads as undefined
  if (loaded === undefined || loaded === null) {
    return { hasHeader: true, frontmatter: {}, body };
  }

  if (!isRecord(loaded)) {
    return {
      hasHeader: true,
      frontmatter: null,
      body,
      error: "header is not a key/value mapping",
    };
  }

  const frontmatter: Frontmatter = {};
  for (const [key, value] of Object.entries(loaded)) {
    frontmatter[key] = toFrontmatterValue(value);
  }
  return { hasHeader: true, frontmatter, body };
}

/**
 * Render a frontmatter mapping back to a `---` delimited header.
 */
export function stringifyFrontmatter(frontmatter: Frontmatter): string {
  const dumped = yaml.dump(frontmatter, {
    schema: yaml.JSON_SCHEMA,
    lineWidth: -1,
    sortKeys: false,
  });
  return `${MARKER}\n${dumped}${MARKER}\n`;
}

function isMarker(line: string): boolean {
  return line.trimEnd() === MARKER;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toFrontmatterValue(value: unknown): FrontmatterValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toFrontmatterValue);
  }
  if (isRecord(value)) {
    const out: { [key: string]: FrontmatterValue } = {};
    for (const [k, v] of Object.entries(value)) out[k] = toFrontmatterValue(v);
    return out;
  }
  // JSON_SCHEMA yields nothing else
  return String(value);
}

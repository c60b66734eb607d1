// src/catalog.ts — Template Catalog
// Immutable registry of rule and command documents, keyed by output path.

import { parseFrontmatter } from "./frontmatter.js";
import type { TemplateCategory, TemplateDocument } from "./types.js";
import { DuplicateTemplateError } from "./types.js";

const CATEGORY_ORDER: Record<TemplateCategory, number> = { rule: 0, command: 1 };

export class TemplateCatalog {
  private readonly byPath: ReadonlyMap<string, TemplateDocument>;
  private readonly ordered: readonly TemplateDocument[];

  /** Extra non-selectable templates (e.g. the AGENTS.md scaffold), keyed by name. */
  readonly scaffold: Readonly<Record<string, string>>;

  constructor(
    documents: Iterable<TemplateDocument>,
    scaffold: Record<string, string> = {},
  ) {
    const byPath = new Map<string, TemplateDocument>();
    for (const doc of documents) {
      if (byPath.has(doc.path)) {
        throw new DuplicateTemplateError(doc.path);
      }
      byPath.set(doc.path, freezeDocument(doc));
    }

    this.byPath = byPath;
    this.ordered = Object.freeze([...byPath.values()].sort(compareDocuments));
    this.scaffold = Object.freeze({ ...scaffold });
  }

  get size(): number {
    return this.ordered.length;
  }

  /**
   * All documents, rules before commands, then by name.
   */
  listAll(): readonly TemplateDocument[] {
    return this.ordered;
  }

  list(category: TemplateCategory): TemplateDocument[] {
    return this.ordered.filter((d) => d.category === category);
  }

  defaults(): TemplateDocument[] {
    return this.ordered.filter((d) => d.defaultSelected);
  }

  get(path: string): TemplateDocument | undefined {
    return this.byPath.get(path);
  }

  has(path: string): boolean {
    return this.byPath.has(path);
  }

  /**
   * Look up by path, or by file name with or without extension when that is unambiguous.
   */
  find(ref: string): TemplateDocument | undefined {
    const exact = this.byPath.get(ref);
    if (exact) return exact;
    const matches = this.ordered.filter(
      (d) => d.name === ref || d.name.replace(/\.mdc?$/, "") === ref,
    );
    return matches.length === 1 ? matches[0] : undefined;
  }

  /**
   * Position of a path in listAll() order, or -1.
   */
  indexOf(path: string): number {
    return this.ordered.findIndex((d) => d.path === path);
  }
}

// ─── Document construction ───────────────────────────────────────────────────

export interface TemplateSource {
  path: string;
  category: TemplateCategory;
  content: string;
  title?: string;
  description?: string;
  defaultSelected?: boolean;
}

/**
 * Build a TemplateDocument from raw text, deriving name, title and description.
 * Rules fall back to their frontmatter description; titles fall back to the first `#` heading.
 */
export function createTemplateDocument(source: TemplateSource): TemplateDocument {
  const parsed = parseFrontmatter(source.content);
  const name = basename(source.path);
  const fmDescription = parsed.frontmatter?.description;

  return {
    path: source.path,
    name,
    category: source.category,
    title: source.title ?? firstHeading(parsed.body) ?? name.replace(/\.mdc?$/, ""),
    description:
      source.description ??
      (typeof fmDescription === "string" ? fmDescription : ""),
    content: source.content,
    frontmatter: parsed.frontmatter,
    defaultSelected: source.defaultSelected ?? true,
  };
}

function basename(path: string): string {
  const idx = path.lastIndexOf("/");
  return idx === -1 ? path : path.slice(idx + 1);
}

function firstHeading(body: string): string | undefined {
  const match = /^#\s+(.+)$/m.exec(body);
  return match ? match[1].trim() : undefined;
}

// ─── Ordering ────────────────────────────────────────────────────────────────

function compareDocuments(a: TemplateDocument, b: TemplateDocument): number {
  const byCategory = CATEGORY_ORDER[a.category] - CATEGORY_ORDER[b.category];
  if (byCategory !== 0) return byCategory;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

function freezeDocument(doc: TemplateDocument): TemplateDocument {
  const frontmatter = doc.frontmatter ? deepFreeze({ ...doc.frontmatter }) : null;
  return Object.freeze({ ...doc, frontmatter });
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

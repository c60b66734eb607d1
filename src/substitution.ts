// src/substitution.ts — `{{ name }}` placeholder substitution
// Non-strict: placeholders without a value stay verbatim so users can fill them in by hand.

import type { SubstitutionValue } from "./types.js";

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}/g;

export interface SubstitutionResult {
  text: string;
  /** Names that had a value, in order of first appearance. */
  substituted: string[];
  /** Names left verbatim, in order of first appearance. */
  unresolved: string[];
}

export function applySubstitutions(
  text: string,
  variables: Readonly<Record<string, SubstitutionValue>>,
): SubstitutionResult {
  const substituted = new Set<string>();
  const unresolved = new Set<string>();

  const out = text.replace(PLACEHOLDER, (whole: string, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(variables, name)) {
      unresolved.add(name);
      return whole;
    }
    substituted.add(name);
    return formatValue(variables[name]);
  });

  return { text: out, substituted: [...substituted], unresolved: [...unresolved] };
}

/**
 * Placeholder names used in a text, in order of first appearance.
 */
export function findPlaceholders(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER)) {
    names.add(match[1]);
  }
  return [...names];
}

function formatValue(value: SubstitutionValue): string {
  return Array.isArray(value) ? value.join(", ") : value;
}

// src/types.ts — Shared types for the starter-kit engine

// ─── Templates ───────────────────────────────────────────────────────────────

export type TemplateCategory = "rule" | "command";

export type FrontmatterValue =
  | string
  | number
  | boolean
  | null
  | FrontmatterValue[]
  | { [key: string]: FrontmatterValue };

export type Frontmatter = Record<string, FrontmatterValue>;

export interface TemplateDocument {
  /** Unique identity and output path inside the kit, e.g. `.cursor/rules/cursor-rules.md`. */
  path: string;
  name: string;
  category: TemplateCategory;
  title: string;
  description: string;
  content: string;
  frontmatter: Frontmatter | null;
  defaultSelected: boolean;
}

// ─── Frontmatter schema ──────────────────────────────────────────────────────

export type FieldType = "string" | "boolean" | "number" | "string[]";

export interface FieldSpec {
  type: FieldType;
  required: boolean;
  allowed?: readonly (string | number | boolean)[];
  description: string;
  example?: string;
}

export type FrontmatterSchema = Readonly<Record<string, FieldSpec>>;

// ─── Validation ──────────────────────────────────────────────────────────────

export type IssueCode =
  | "FrontmatterMissing"
  | "FrontmatterTypeMismatch"
  | "FrontmatterInvalidValue"
  | "UnknownFrontmatterField"
  | "NoFrontmatter"
  | "InvalidFrontmatter"
  | "InvalidGlob"
  | "InactiveRule"
  | "Oversized"
  | "UnknownTemplate";

export interface ValidationIssue {
  severity: "error" | "warning";
  code: IssueCode;
  message: string;
  field?: string;
}

export type SizeTier = "ok" | "warning";

export interface SizeEstimate {
  estimatedTokens: number;
  bytes: number;
  lines: number;
  tier: SizeTier;
}

export interface ValidationResult {
  path: string;
  category: TemplateCategory;
  isValid: boolean;
  issues: ValidationIssue[];
  size: SizeEstimate;
}

// ─── Selection ───────────────────────────────────────────────────────────────

export type SubstitutionValue = string | string[];

export interface SelectionRequest {
  /** Catalog paths to include. Omitted means the catalog's default selection. */
  templates?: string[];
  variables: Record<string, SubstitutionValue>;
  /** Replacement content for selected catalog paths. */
  overrides?: Record<string, string>;
  includeAgentsMd?: boolean;
  includeReadme?: boolean;
}

export interface ResolvedFile {
  path: string;
  content: Uint8Array;
}

export type ResolvedFileSet = ResolvedFile[];

export type SelectionOutcome =
  | {
      status: "resolved";
      files: ResolvedFileSet;
      validations: ValidationResult[];
      success: boolean;
      warnings: Warning[];
    }
  | {
      status: "unresolved";
      issues: ValidationIssue[];
      warnings: Warning[];
    };

// ─── Config ──────────────────────────────────────────────────────────────────

export type LLMProvider = "anthropic" | "openai";

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxOutputTokens: number;
}

export interface EstimatorOptions {
  charsPerToken: number;
  tokenWarningThreshold: number;
  lineWarningThreshold: number;
}

export interface ResolvedConfig extends EstimatorOptions {
  templatesDir: string;
  archiveRoot: string;
  output: string;
  includeAgentsMd: boolean;
  includeReadme: boolean;
  llm: LLMConfig;
  verbose: boolean;
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.3.0";

export const RULES_DIR = ".cursor/rules";
export const COMMANDS_DIR = ".cursor/commands";
export const README_PATH = "README.md";
export const AGENTS_MD_PATH = "AGENTS.md";

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    if (cause) this.cause = cause;
  }
}

export class DuplicateTemplateError extends Error {
  constructor(public readonly templatePath: string) {
    super(`duplicate template path: ${templatePath}`);
    this.name = "DuplicateTemplateError";
  }
}

export class ArchiveIOError extends Error {
  constructor(
    message: string,
    public readonly entryPath?: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = "ArchiveIOError";
    if (cause !== undefined) this.cause = cause;
  }
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "LLMError";
  }
}

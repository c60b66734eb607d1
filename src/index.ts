// src/index.ts — Library API
// Main entry points: loadCatalog() and createStarterKit(); the pipeline stages are exported too.

export type {
  TemplateCategory,
  TemplateDocument,
  Frontmatter,
  FrontmatterValue,
  FieldType,
  FieldSpec,
  FrontmatterSchema,
  IssueCode,
  ValidationIssue,
  ValidationResult,
  SizeEstimate,
  SizeTier,
  SubstitutionValue,
  SelectionRequest,
  ResolvedFile,
  ResolvedFileSet,
  SelectionOutcome,
  LLMProvider,
  LLMConfig,
  EstimatorOptions,
  ResolvedConfig,
  Warning,
} from "./types.js";

export {
  ENGINE_VERSION,
  RULES_DIR,
  COMMANDS_DIR,
  README_PATH,
  AGENTS_MD_PATH,
  FileNotFoundError,
  DuplicateTemplateError,
  ArchiveIOError,
  LLMError,
} from "./types.js";

export { TemplateCatalog, createTemplateDocument } from "./catalog.js";
export type { TemplateSource } from "./catalog.js";
export { loadCatalog, defaultTemplatesDir } from "./loader.js";
export type { ManifestEntry } from "./loader.js";

export { parseFrontmatter, stringifyFrontmatter } from "./frontmatter.js";
export type { ParsedDocument } from "./frontmatter.js";
export { RULE_SCHEMA, COMMAND_SCHEMA, schemaFor, formatSchemaTable } from "./frontmatter-schema.js";
export { validateDocument, isBlockingIssue, hasBlockingIssues } from "./validator.js";
export type { ValidateOptions } from "./validator.js";
export {
  estimateTokens,
  estimateSize,
  sizeIssues,
  countLines,
  DEFAULT_ESTIMATOR_OPTIONS,
} from "./token-estimator.js";

export { applySubstitutions, findPlaceholders } from "./substitution.js";
export type { SubstitutionResult } from "./substitution.js";
export { buildSelection } from "./selection.js";
export type { BuildOptions } from "./selection.js";
export { generateReadme } from "./scaffold.js";
export { packageArchive, readArchive, ARCHIVE_MTIME } from "./archive.js";
export type { ArchiveOptions, ArchiveEntry } from "./archive.js";
export {
  createStarterKit,
  optionsFromConfig,
  formatValidationReport,
} from "./pipeline.js";
export type { StarterKitOptions, StarterKitResult } from "./pipeline.js";

export {
  generateProjectStructure,
  generateTemplateStructure,
  stripCodeFence,
  PROJECT_STRUCTURE_PATH,
} from "./project-structure.js";
export type { ProjectStructureInput, ProjectStructureResult } from "./project-structure.js";
export { createTextGenerator, checkApiKeys, HttpTextGenerator, DEFAULT_MODELS } from "./llm/client.js";
export type { TextGenerator, GenerationContext } from "./llm/client.js";
export { resolveConfig, parseCliArgs, parseVariables } from "./config.js";
export type { ParsedArgs } from "./config.js";

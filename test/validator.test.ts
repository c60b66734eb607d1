import { describe, it, expect } from "vitest";
import { validateDocument, isBlockingIssue, hasBlockingIssues } from "../src/validator.js";
import type { FrontmatterSchema } from "../src/types.js";

function rule(header: string[], body = "# Rule\n\n- Use strict mode\n"): string {
  return ["---", ...header, "---", "", body].join("\n");
}

const VALID_HEADER = [
  "description: Guidelines for writing rules",
  "globs:",
  '  - ".cursor/rules/*"',
  "alwaysApply: false",
];

describe("validateDocument — rules", () => {
  it("accepts a header with every required field correctly typed", () => {
    const result = validateDocument("cursor-rules.md", rule(VALID_HEADER), "rule");
    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.path).toBe("cursor-rules.md");
    expect(result.category).toBe("rule");
  });

  it("accepts a rule saved with a byte order mark", () => {
    const result = validateDocument("bom.md", "\uFEFF" + rule(VALID_HEADER), "rule");
    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([]);
    expect(hasBlockingIssues(result)).toBe(false);
  });

  it("reports exactly the missing required field", () => {
    const text = rule(["description: No globs here", "alwaysApply: true"]);
    const result = validateDocument("r.md", text, "rule");

    expect(result.isValid).toBe(false);
    expect(result.issues).toEqual([
      {
        severity: "error",
        code: "FrontmatterMissing",
        message: "missing field: globs",
        field: "globs",
      },
    ]);
  });

  it("reports missing fields in schema order, then unknown fields", () => {
    const result = validateDocument("r.md", rule(["owner: platform"]), "rule");
    expect(result.issues.map((i) => i.message)).toEqual([
      "missing field: description",
      "missing field: globs",
      "missing field: alwaysApply",
      "unknown field: owner",
    ]);
  });

  it("treats a null value as missing", () => {
    const text = rule(["description:", "globs: []", "alwaysApply: true"]);
    const result = validateDocument("r.md", text, "rule");
    expect(result.issues.map((i) => i.message)).toEqual(["missing field: description"]);
  });

  it("reports globs given as a plain string as a type mismatch", () => {
    const text = rule(["description: TS files", "globs: src/**/*.ts", "alwaysApply: false"]);
    const result = validateDocument("r.md", text, "rule");

    expect(result.isValid).toBe(false);
    expect(result.issues).toEqual([
      {
        severity: "error",
        code: "FrontmatterTypeMismatch",
        message: "type mismatch: globs",
        field: "globs",
      },
    ]);
  });

  it("reports alwaysApply given as a string as a type mismatch", () => {
    const text = rule(["description: d", "globs: []", 'alwaysApply: "yes"']);
    const result = validateDocument("r.md", text, "rule");
    expect(result.issues.map((i) => i.message)).toEqual(["type mismatch: alwaysApply"]);
  });

  it("rejects globs arrays containing non-strings", () => {
    const text = rule(["description: d", "globs: [1, 2]", "alwaysApply: true"]);
    const result = validateDocument("r.md", text, "rule");
    expect(result.issues.map((i) => i.message)).toEqual(["type mismatch: globs"]);
  });

  it("keeps the rule valid when only unknown fields are present", () => {
    const result = validateDocument("r.md", rule([...VALID_HEADER, "priority: high"]), "rule");
    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([
      {
        severity: "warning",
        code: "UnknownFrontmatterField",
        message: "unknown field: priority",
        field: "priority",
      },
    ]);
  });

  it("fails a rule with no frontmatter", () => {
    const result = validateDocument("r.md", "# Just markdown\n", "rule");
    expect(result.isValid).toBe(false);
    expect(result.issues).toEqual([
      { severity: "error", code: "NoFrontmatter", message: "no frontmatter found" },
    ]);
  });

  it("fails a rule whose header is not valid YAML", () => {
    const result = validateDocument("r.md", "---\ndescription: [oops\n---\n", "rule");
    expect(result.isValid).toBe(false);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].code).toBe("InvalidFrontmatter");
    expect(result.issues[0].message.startsWith("invalid frontmatter: ")).toBe(true);
  });

  it("warns about globs that cannot be compiled", () => {
    const text = rule(["description: d", "globs:", '  - "src/[abc"', '  - "src/**"', "alwaysApply: false"]);
    const result = validateDocument("r.md", text, "rule");

    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([
      {
        severity: "warning",
        code: "InvalidGlob",
        message: "invalid glob: src/[abc",
        field: "globs",
      },
    ]);
  });

  it("warns about a rule that can never be activated", () => {
    const text = rule(['description: ""', "globs: []", "alwaysApply: false"]);
    const result = validateDocument("r.md", text, "rule");

    expect(result.isValid).toBe(true);
    expect(result.issues.map((i) => i.code)).toEqual(["InactiveRule"]);
  });

  it("checks allowed values from a custom schema", () => {
    const schema: FrontmatterSchema = {
      mode: { type: "string", required: true, allowed: ["auto", "manual"], description: "" },
      weight: { type: "number", required: false, description: "" },
    };
    const ok = validateDocument("r.md", rule(["mode: auto", "weight: 2"]), "rule", { schema });
    const bad = validateDocument("r.md", rule(["mode: sometimes", "weight: heavy"]), "rule", { schema });

    expect(ok.issues).toEqual([]);
    expect(bad.issues.map((i) => i.message)).toEqual(["invalid value: mode", "type mismatch: weight"]);
  });
});

describe("validateDocument — commands", () => {
  it("accepts commands without any header", () => {
    const result = validateDocument("debug.md", "# Debug\n\nFind the bug.\n", "command");
    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it("skips schema checks even when a command has a header", () => {
    const result = validateDocument("c.md", "---\nglobs: nope\n---\n# C\n", "command");
    expect(result.isValid).toBe(true);
    expect(result.issues).toEqual([]);
  });
});

describe("validateDocument — size", () => {
  it("attaches a size estimate", () => {
    const result = validateDocument("c.md", "x".repeat(40), "command");
    expect(result.size).toEqual({ estimatedTokens: 10, bytes: 40, lines: 1, tier: "ok" });
  });

  it("adds an advisory warning above the token threshold", () => {
    const result = validateDocument("c.md", "x".repeat(40), "command", {
      estimator: { tokenWarningThreshold: 5 },
    });
    expect(result.isValid).toBe(true);
    expect(result.size.tier).toBe("warning");
    expect(result.issues).toEqual([
      {
        severity: "warning",
        code: "Oversized",
        message: "oversized: 10 estimated tokens (threshold 5)",
      },
    ]);
  });

  it("adds an advisory warning above the line threshold", () => {
    const result = validateDocument("c.md", "line\n".repeat(200), "command");
    expect(result.issues.map((i) => i.message)).toEqual(["oversized: 200 lines (threshold 150)"]);
  });
});

describe("blocking issues", () => {
  it("treats missing fields as blocking and type mismatches as non-blocking", () => {
    const missing = validateDocument("a.md", rule(["globs: []", "alwaysApply: true"]), "rule");
    const mismatch = validateDocument("b.md", rule(["description: d", "globs: x", "alwaysApply: true"]), "rule");

    expect(missing.issues.every(isBlockingIssue)).toBe(true);
    expect(hasBlockingIssues(missing)).toBe(true);
    expect(hasBlockingIssues(mismatch)).toBe(false);
  });

  it("never treats a command as blocking", () => {
    const result = validateDocument("c.md", "x".repeat(8000), "command");
    expect(hasBlockingIssues(result)).toBe(false);
  });
});

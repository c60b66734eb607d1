import { describe, it, expect, afterAll } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  DEFAULT_ARCHIVE_ROOT,
  DEFAULT_OUTPUT,
  parseCliArgs,
  parseVariables,
  resolveConfig,
  splitList,
  type ParsedArgs,
} from "../src/config.js";
import { defaultTemplatesDir } from "../src/loader.js";
import type { Warning } from "../src/types.js";

const FIXTURES_BASE = join(import.meta.dirname, "fixtures", "config-test");

function setupFixture(name: string, files: Record<string, string>): string {
  const dir = join(FIXTURES_BASE, name);
  rmSync(dir, { recursive: true, force: true });
  mkdirSync(dir, { recursive: true });
  for (const [path, content] of Object.entries(files)) {
    writeFileSync(join(dir, path), content);
  }
  return dir;
}

function args(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return {
    positionals: [],
    vars: [],
    ai: false,
    force: false,
    dryRun: false,
    quiet: false,
    verbose: false,
    help: false,
    ...overrides,
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe("resolveConfig", () => {
  afterAll(() => rmSync(FIXTURES_BASE, { recursive: true, force: true }));

  it("uses defaults when nothing is configured", () => {
    const cwd = setupFixture("empty", {});
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, {}, cwd);

    expect(config).toEqual({
      templatesDir: defaultTemplatesDir(),
      archiveRoot: DEFAULT_ARCHIVE_ROOT,
      output: DEFAULT_OUTPUT,
      charsPerToken: 4,
      tokenWarningThreshold: 1000,
      lineWarningThreshold: 150,
      includeAgentsMd: true,
      includeReadme: true,
      llm: {
        provider: "anthropic",
        model: "claude-sonnet-4-20250514",
        maxOutputTokens: 4096,
        baseUrl: undefined,
        apiKey: undefined,
      },
      verbose: false,
    });
    expect(warnings).toEqual([]);
  });

  it("reads kickstart.config.json from the working directory", () => {
    const cwd = setupFixture("json-config", {
      "kickstart.config.json": JSON.stringify({
        templatesDir: "my-templates",
        archiveRoot: "kit",
        tokenWarningThreshold: 500,
        includeReadme: false,
        llm: { provider: "openai", model: "test-model" },
      }),
    });
    const config = resolveConfig(args(), [], {}, cwd);
    expect(config.templatesDir).toBe(join(cwd, "my-templates"));
    expect(config.archiveRoot).toBe("kit");
    expect(config.tokenWarningThreshold).toBe(500);
    expect(config.includeReadme).toBe(false);
    expect(config.llm.provider).toBe("openai");
    expect(config.llm.model).toBe("test-model");
  });

  it("falls back to the kickstart key in package.json", () => {
    const cwd = setupFixture("pkg-config", {
      "package.json": JSON.stringify({ name: "app", kickstart: { output: "starter.zip" } }),
    });
    expect(resolveConfig(args(), [], {}, cwd).output).toBe("starter.zip");
  });

  it("lets CLI args win over the config file", () => {
    const cwd = setupFixture("cli-wins", {
      "kickstart.config.json": JSON.stringify({ output: "file.zip", includeAgentsMd: true }),
    });
    const config = resolveConfig(args({ output: "cli.zip", agents: false, root: "" }), [], {}, cwd);
    expect(config.output).toBe("cli.zip");
    expect(config.includeAgentsMd).toBe(false);
    expect(config.archiveRoot).toBe("");
  });

  it("takes provider, model and key from the environment", () => {
    const cwd = setupFixture("env", {});
    const config = resolveConfig(
      args(),
      [],
      { KICKSTART_LLM_PROVIDER: "openai", KICKSTART_LLM_MODEL: "env-model", OPENAI_API_KEY: "test-key" },
      cwd,
    );
    expect(config.llm).toMatchObject({ provider: "openai", model: "env-model", apiKey: "test-key" });
  });

  it("picks OpenAI when only an OpenAI key is set", () => {
    const cwd = setupFixture("openai-only", {});
    const config = resolveConfig(args(), [], { OPENAI_API_KEY: "test-key" }, cwd);
    expect(config.llm.provider).toBe("openai");
    expect(config.llm.model).toBe("gpt-4o-mini");
  });

  it("warns about an unknown provider and uses anthropic", () => {
    const cwd = setupFixture("bad-provider", {});
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, { KICKSTART_LLM_PROVIDER: "acme" }, cwd);
    expect(config.llm.provider).toBe("anthropic");
    expect(warnings.map((w) => w.message)).toEqual([
      'Unknown LLM provider "acme". Expected one of: anthropic, openai. Using anthropic.',
    ]);
  });

  it("ignores non-positive numbers with a warning", () => {
    const cwd = setupFixture("bad-numbers", {
      "kickstart.config.json": JSON.stringify({ charsPerToken: 0 }),
    });
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, {}, cwd);
    expect(config.charsPerToken).toBe(4);
    expect(warnings.map((w) => w.message)).toEqual([
      "Ignoring charsPerToken=0: must be a positive number. Using 4.",
    ]);
  });

  it("warns when an API key is stored in the config file", () => {
    const cwd = setupFixture("file-key", {
      "kickstart.config.json": JSON.stringify({ llm: { apiKey: "test-key" } }),
    });
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, {}, cwd);
    expect(config.llm.apiKey).toBe("test-key");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toMatch(/^API keys should not be stored in config files/);
  });

  it("warns about a missing explicit config file", () => {
    const cwd = setupFixture("missing-explicit", {});
    const warnings: Warning[] = [];
    resolveConfig(args({ config: "nope.json" }), warnings, {}, cwd);
    expect(warnings.map((w) => w.message)).toEqual(["Config file not found: nope.json"]);
  });

  it("warns about a config file that is not JSON", () => {
    const cwd = setupFixture("broken-json", { "kickstart.config.json": "{" });
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, {}, cwd);
    expect(config.output).toBe(DEFAULT_OUTPUT);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toMatch(/^Failed to parse config file /);
  });
});

describe("parseCliArgs", () => {
  it("splits the command from its positionals", async () => {
    const parsed = await parseCliArgs(["build", "debug", "commit", "-o", "kit.zip", "--force"]);
    expect(parsed.command).toBe("build");
    expect(parsed.positionals).toEqual(["debug", "commit"]);
    expect(parsed.output).toBe("kit.zip");
    expect(parsed.force).toBe(true);
    expect(parsed.dryRun).toBe(false);
  });

  it("collects repeated --var flags", async () => {
    const parsed = await parseCliArgs(["build", "--var", "a=1", "--var", "b=2"]);
    expect(parsed.vars).toEqual(["a=1", "b=2"]);
  });

  it("leaves scaffold flags undefined unless given", async () => {
    const plain = await parseCliArgs(["build"]);
    expect(plain.agents).toBeUndefined();
    expect(plain.readme).toBeUndefined();

    const negated = await parseCliArgs(["build", "--no-agents", "--readme"]);
    expect(negated.agents).toBe(false);
    expect(negated.readme).toBe(true);
  });

  it("reads --dry-run and project flags", async () => {
    const parsed = await parseCliArgs(["build", "--dry-run", "--name", "Acme", "--stack", "Go, Postgres"]);
    expect(parsed.dryRun).toBe(true);
    expect(parsed.name).toBe("Acme");
    expect(parsed.stack).toBe("Go, Postgres");
  });
});

describe("parseVariables", () => {
  it("parses key=value pairs and splits techStack", () => {
    expect(parseVariables(["projectName=Acme", "techStack=Go, Postgres", "note=a=b"])).toEqual({
      projectName: "Acme",
      techStack: ["Go", "Postgres"],
      note: "a=b",
    });
  });

  it("warns about entries without a key", () => {
    const warnings: Warning[] = [];
    expect(parseVariables(["=x", "plain"], warnings)).toEqual({});
    expect(warnings.map((w) => w.message)).toEqual([
      'Ignoring --var "=x": expected key=value',
      'Ignoring --var "plain": expected key=value',
    ]);
  });
});

describe("splitList", () => {
  it("drops blanks and trims", () => {
    expect(splitList(" a, ,b ,")).toEqual(["a", "b"]);
  });
});

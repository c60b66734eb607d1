import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    exclude: ["test/fixtures/**"],
    testTimeout: 10_000,
    // fetch is stubbed per test in the LLM client tests
    unstubGlobals: true,
  },
});

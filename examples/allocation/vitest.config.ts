import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

/**
 * Runs the allocation unit tests and the Gherkin step files.
 */
export default defineConfig({
  root: fileURLToPath(new URL(".", import.meta.url)),
  test: {
    name: "@gatehouse/example-allocation",
    environment: "node",
    include: ["tests/unit/**/*.test.ts", "tests/steps/**/*.steps.ts"],
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});

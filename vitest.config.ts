import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Suppress stdout/stderr from tests to reduce noise in the terminal.
    // Tests that need to see output spy on console explicitly.
    silent: true,
    include: ["src/test/ts/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});

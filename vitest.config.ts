import * as path from "node:path";
import { defineConfig } from "vitest/config";

// Avoid import.meta for IDE TS compatibility; use CWD
const projectRoot = path.resolve(process.cwd());

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./vitest.setup.ts"],
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
  resolve: {
    alias: {
      "@": projectRoot,
    },
  },
});

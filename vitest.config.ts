import * as path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@mits11-bootstrap/engine": path.resolve(__dirname, "engine/src/index.ts"),
    },
  },
  test: {
    root: ".",
    include: ["engine/tests/**/*.test.ts", "cli/tests/**/*.test.ts"],
    globals: false,
    testTimeout: 10000,
  },
});

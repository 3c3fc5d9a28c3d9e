import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@stepwright/shared": path.resolve(__dirname, "packages/shared/src/index.ts"),
      "@stepwright/synthesizer": path.resolve(__dirname, "synthesizer/src/index.ts"),
    },
  },
  test: {
    include: [
      "packages/shared/tests/**/*.test.ts",
      "synthesizer/tests/**/*.spec.ts",
      "orchestrator/tests/**/*.test.ts",
    ],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});

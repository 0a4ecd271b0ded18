import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["server/**/*.test.ts"],
    env: {
      LOG_LEVEL: "error",
      LOG_TO_FILE: "false",
    },
  },
});

import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      TR_DEBUG_LOG_FILE: "false",
    },
  },
  resolve: {
    alias: {
      "@": path.resolve(rootDir, "./src"),
      "@test": path.resolve(rootDir, "./test"),
    },
  },
});

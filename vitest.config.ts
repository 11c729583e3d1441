import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@\//,
        replacement: fileURLToPath(new URL("./apps/cli/src/", import.meta.url)),
      },
    ],
  },
  test: {
    environment: "node",
    include: ["apps/**/tests/**/*.test.ts"],
  },
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // Resolve @topicwire/shared to its source so vitest can follow its deps
      "@topicwire/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    server: {
      deps: {
        inline: [/^@topicwire\//, "zod", "neo4j-driver"],
      },
    },
  },
});

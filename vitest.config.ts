import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // Resolve workspace packages to their sources so vitest can follow their deps
      "@trendwire/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url),
      ),
      "@trendwire/worker": fileURLToPath(
        new URL("./packages/worker/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    // Let vitest resolve transitive deps from workspace packages
    server: {
      deps: {
        inline: [/^@trendwire\//, "zod", "@google/genai", "neo4j-driver"],
      },
    },
  },
});

import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
  resolve: {
    alias: {
      sqlgraph: fileURLToPath(new URL("./packages/sqlgraph/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/__tests__/**/*.{test,spec}.ts"],
    environment: "node",
    testTimeout: 30000,
  },
})

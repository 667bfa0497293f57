import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "adapters/*/src/**/*.test.ts"],
    setupFiles: ["./packages/engine/src/test-setup.ts"],
    environment: "node",
  },
})

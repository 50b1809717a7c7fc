import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const root = fileURLToPath(new URL(".", import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text"], // Only terminal output
      exclude: [
        "src/types/**",
        "database/**",
        "**/node_modules/**", // Exclude dependencies
        "tests/**", // Exclude test helpers
        "**/*.test.ts", // Exclude test files from coverage
        "**/*.config.ts", // Exclude config files
      ],
    },
    testTimeout: 5000,
  },
  resolve: {
    alias: {
      "@": `${root}src`,
      "@database": `${root}database`,
      "@tests": `${root}tests`,
    },
  },
})

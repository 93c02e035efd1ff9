import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    coverage: {
      provider: "istanbul",
      reporter: ["text", "text-summary", "lcov"],
      include: ["src/**/*.ts"],
    },
    projects: [
      {
        test: {
          name: "engine",
          pool: "forks",
          include: ["test/**/*.spec.ts"],
        },
      },
    ],
  },
});

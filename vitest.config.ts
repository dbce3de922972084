import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    pool: "forks",
    typecheck: {
      enabled: false,
    },
  },
});

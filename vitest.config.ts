import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/tests/**/*.spec.ts", "packages/*/src/**/*.spec.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
    },
    restoreMocks: true,
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["daemon/tests/**/*.test.ts"],
    environment: "node",
  },
});

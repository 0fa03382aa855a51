import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["api/tests/**/*.test.ts"],
    environment: "node",
  },
});

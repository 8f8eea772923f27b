import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["stylecascade/tests/**/*.test.ts"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["qualityctl/test/**/*.test.ts"],
    environment: "node",
  },
});

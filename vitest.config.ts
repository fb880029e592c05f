import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/**/src/test/**/*.test.ts"],
    setupFiles: ["services/call-push/src/test/setup.ts"],
  },
});

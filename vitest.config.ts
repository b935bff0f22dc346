import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["shared-types/test/**/*.test.ts", "client/test/**/*.test.ts"],
    restoreMocks: true,
  },
});

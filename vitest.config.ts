// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,          // describe/it/expect as globals
    environment: "jsdom",   // localStorage for the persistence tests
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});

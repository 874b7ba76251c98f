import { defineConfig } from "vitest/config";

// Engine and route tests live under tests/ and run in plain Node.
export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"]
  }
});

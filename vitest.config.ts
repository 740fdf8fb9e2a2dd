import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Building a compiler program per fixture project is slow on cold caches.
    testTimeout: 30_000
  }
});

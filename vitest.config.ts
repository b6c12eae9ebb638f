import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // Tests stub fetch; make sure no stub leaks into the next file
    unstubGlobals: true,
    restoreMocks: true,
  },
});

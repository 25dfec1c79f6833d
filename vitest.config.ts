import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    globals: true,
    include: ["libs/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
      include: ["libs/**/src/**"]
    }
  }
});

import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@cellgate/shared": path.resolve(__dirname, "packages/shared/src"),
      "@cellgate/at": path.resolve(__dirname, "packages/at/src"),
    },
  },
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@conda-portable/shared": src("./packages/shared/src/index.ts"),
      "@conda-portable/core": src("./packages/core/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/*.test.ts", "apps/*/src/**/__tests__/*.test.ts"],
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts", "packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@salvage/types": src("types"),
      "@salvage/core": src("core"),
      "@salvage/tools": src("tools"),
      "@salvage/runtime": src("runtime"),
    },
  },
});

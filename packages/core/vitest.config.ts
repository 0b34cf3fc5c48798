import { createRequire } from "module";
import { defineConfig } from "vitest/config";

const require = createRequire(import.meta.url);

export default defineConfig({
  test: {
    globals: true,
    testTimeout: 15_000,
    include: ["__tests__/**/*.test.ts"],
  },
  resolve: {
    alias: {
      // The package's ESM entry fails to load its sumo core; use the CommonJS build.
      "libsodium-wrappers-sumo": require.resolve("libsodium-wrappers-sumo"),
    },
  },
});

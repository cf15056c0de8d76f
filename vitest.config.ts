import swc from "unplugin-swc"
import { defineConfig } from "vitest/config"

export default defineConfig({
  // esbuild renames inner functions that shadow an outer name (inRange -> inRange2);
  // SWC keeps Function.name as written, which the processing hooks rely on.
  esbuild: false,
  plugins: [swc.vite({ jsc: { target: "es2022" } })],
  test: {
    environment: "node",
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/__tests__/**", "**/*.test.*", "**/dist/**", "**/node_modules/**"],
    },
  },
})

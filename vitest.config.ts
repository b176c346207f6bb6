// /vitest.config.ts (workspace root)
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@rxdispatch/shared": fileURLToPath(
        new URL("./backend/services/shared/src", import.meta.url)
      ),
    },
  },
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/*/src/**/*.test.ts",
      "backend/services/*/test/**/*.spec.ts",
    ],
    setupFiles: ["backend/services/shared/src/testing/setup.ts"],
  },
});

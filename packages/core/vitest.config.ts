import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    name: "core",
    setupFiles: [fileURLToPath(new URL("./test/setup.ts", import.meta.url))],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});

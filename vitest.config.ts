import { defineConfig } from "vitest/config";
import path from "path";

const packagesDir = path.resolve(__dirname, "packages");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"]
  },
  resolve: {
    alias: [
      { find: "@fleetwarden/shared", replacement: path.join(packagesDir, "shared/src/index.ts") },
      { find: "@fleetwarden/logger", replacement: path.join(packagesDir, "logger/src/index.ts") },
      { find: "@fleetwarden/monitor", replacement: path.join(packagesDir, "monitor/src/index.ts") }
    ]
  }
});

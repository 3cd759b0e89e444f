import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@issueroll/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@issueroll/provider-github": path.join(rootDir, "packages/provider-github/src/index.ts"),
      "@issueroll/renderer-markdown": path.join(rootDir, "packages/renderer-markdown/src/index.ts"),
      "@issueroll/cli": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"]
  }
});

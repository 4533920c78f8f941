import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages are tested from their sources, as the "source" export condition describes.
    alias: [
      { find: /^@appsource\/schema$/, replacement: source("./packages/schema/src/index.ts") },
      { find: /^@appsource\/core$/, replacement: source("./packages/core/src/index.ts") },
      { find: /^@appsource\/cli$/, replacement: source("./packages/cli/src/program.ts") }
    ]
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node"
  }
});

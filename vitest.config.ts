import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const root = fileURLToPath(new URL(".", import.meta.url));

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

// Workspace packages resolve to their sources so tests need no build first
const aliases = [
  { find: "@framevis/core", replacement: `${root}packages/core/src/index.ts` },
  { find: "@framevis/shared", replacement: `${root}packages/shared/src/index.ts` },
  { find: "@framevis/visibility", replacement: `${root}packages/visibility/src/index.ts` },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    exclude: defaultExclude,
  },
});

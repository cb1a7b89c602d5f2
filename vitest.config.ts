import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const sdkEntry = fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url));
const testkitEntry = fileURLToPath(new URL("./packages/testkit/src/index.ts", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@ordtab\/sdk$/, replacement: sdkEntry },
      { find: /^@ordtab\/testkit$/, replacement: testkitEntry },
    ],
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});

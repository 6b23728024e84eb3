import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const core = fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url));
const store = fileURLToPath(new URL("./packages/store/src/index.ts", import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@attendee-sync/core": core,
      "@attendee-sync/store": store,
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
  },
});

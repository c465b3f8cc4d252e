import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      "packages/types",
      "packages/event-store",
      "packages/ledger",
      "packages/governance",
      "packages/bridge",
      "packages/node",
    ],
  },
});

import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  esbuild: {
    jsx: "automatic"
  },
  resolve: {
    alias: {
      "@pathsense/nav-core": fromRoot("./packages/nav-core/src"),
      "@pathsense/routing": fromRoot("./packages/routing/src"),
      "@pathsense/modules": fromRoot("./packages/modules/src"),
      "@pathsense/ui-kit": fromRoot("./packages/ui-kit/src"),
      "@pathsense/relay-server": fromRoot("./apps/relay-server/src/api.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.{ts,tsx}", "apps/*/src/**/*.test.{ts,tsx}"],
    testTimeout: 10_000
  }
});

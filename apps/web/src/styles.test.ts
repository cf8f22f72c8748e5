import { readFileSync } from "node:fs";

import { describe, expect, it } from "vitest";

import tailwindConfig from "../tailwind.config";

const globals = readFileSync(new URL("./app/globals.css", import.meta.url), "utf8");

describe("styles", () => {
  it("scans the shared packages for utility classes", () => {
    expect(tailwindConfig.content).toEqual([
      "./src/**/*.{ts,tsx}",
      "../../packages/modules/src/**/*.{ts,tsx}",
      "../../packages/ui-kit/src/**/*.{ts,tsx}"
    ]);
  });

  it("leaves utilities to tailwind", () => {
    expect(globals.startsWith("@tailwind base;\n@tailwind components;\n@tailwind utilities;\n")).toBe(true);
    expect(globals).not.toMatch(/^\s*\.(text|mt|w|bg|rounded|font)-[\w-]+ \{/m);
  });
});

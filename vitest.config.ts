import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function packageEntry(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@inkwell/vault-core": packageEntry("vault-core"),
      "@inkwell/doc-engine": packageEntry("doc-engine"),
      "@inkwell/indexer": packageEntry("indexer"),
      "@inkwell/ui-features": packageEntry("ui-features")
    }
  },
  esbuild: {
    jsx: "automatic"
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.{ts,tsx}"]
  }
});

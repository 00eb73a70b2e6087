import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  // The engine is a source-only workspace package; inline it into the binary.
  noExternal: ["@grna-designer/engine"],
});

import { defineConfig } from "tsup";

export default defineConfig({
  entry: { cli: "src/cli.ts" },
  format: "esm",
  target: "node20",
  outDir: "dist",
  sourcemap: true,
  splitting: false,
  clean: true,
  // Runtime dependencies stay in node_modules
  external: ["commander", "chalk", "zod"],
  banner: { js: "#!/usr/bin/env node" },
});

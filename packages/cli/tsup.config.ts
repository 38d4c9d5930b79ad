/**
 * @summary Build configuration for @ipgeo/cli package using tsup.
 *
 * This configuration produces an ESM executable with a node shebang.
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  banner: {
    js: "#!/usr/bin/env node",
  },
  external: ["@ipgeo/core", "@ipgeo/client", "commander", "chalk"],
});

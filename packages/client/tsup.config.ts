/**
 * @summary Build configuration for @ipgeo/client package using tsup.
 *
 * This configuration produces both ESM and CJS outputs with declaration files.
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  dts: true,
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  external: ["@ipgeo/core"],
});

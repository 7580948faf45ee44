import { defineConfig, type Options } from "tsup";

const base: Options = {
  format: ["esm"],
  target: "es2022",
  platform: "node",
  splitting: false,
  sourcemap: true,
  outDir: "dist",
  bundle: false,
};

export default defineConfig([
  {
    ...base,
    // declarations only are read back as the engine catalog
    entry: ["src/stubs/*.ts"],
    outDir: "dist/stubs",
    dts: true,
    clean: true,
  },
  {
    ...base,
    entry: ["src/cli/index.ts"],
    bundle: true,
    dts: false,
    clean: false,
    // keeps the entry's hashbang
    outDir: "dist/cli",
  },
]);

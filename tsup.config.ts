import { readFileSync } from "fs";
import { defineConfig } from "tsup";
import type { Options } from "tsup";

const pkg: { version: string } = JSON.parse(readFileSync("package.json", "utf-8"));

const configs: Options[] = [
  {
    entry: ["src/index.ts"],
    format: ["esm"],
    target: "node20",
    outDir: "dist",
    clean: true,
    dts: true,
  },
  {
    entry: ["src/cli.ts"],
    format: ["esm"],
    target: "node20",
    outDir: "dist",
    clean: false,
    banner: { js: "#!/usr/bin/env node" },
    define: {
      __VERSION__: JSON.stringify(pkg.version),
    },
  },
];

export default defineConfig(configs);

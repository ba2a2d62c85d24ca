import { defineConfig } from "tsup";
import { readFileSync } from "fs";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// read tsconfig paths
const tsconfig = JSON.parse(
  readFileSync(resolve("tsconfig.json"), "utf8")
);

const paths = (tsconfig.compilerOptions?.paths ?? {}) as Record<string, string[]>;
const baseUrl = tsconfig.compilerOptions?.baseUrl ?? ".";
const projectRoot = dirname(fileURLToPath(import.meta.url));
const baseDir = resolve(projectRoot, baseUrl);

export default defineConfig({
  entry: {
    "cli/index": "src/cli/index.ts",
    "index": "src/index.ts"
  },
  format: ["esm"],
  dts: {
    entry: {
      "index": "src/index.ts"
    }
  },
  outDir: "dist",
  clean: true,
  banner: { js: "#!/usr/bin/env node" },
  esbuildOptions(options) {
    options.alias = { ...(options.alias ?? {}) };
    for (const [key, values] of Object.entries(paths)) {
      const aliasKey = key.replace("/*", "");
      const aliasValue = values[0]?.replace("/*", "");
      if (aliasValue) {
        options.alias[aliasKey] = resolve(baseDir, aliasValue);
      }
    }
  },
});

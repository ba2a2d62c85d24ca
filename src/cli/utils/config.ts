import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { build, type Plugin } from "esbuild";
import { z } from "zod";
import { ConfigError } from "@core/errors";
import type { TracepackConfig } from "@core/types/config";
import { logError, logInfo } from "./logger";

const CONFIG_BASENAMES = [
  "tracepack.config.ts",
  "tracepack.config.mts",
  "tracepack.config.js",
  "tracepack.config.mjs",
  "tracepack.config.cjs",
];

export const TracepackConfigSchema: z.ZodType<TracepackConfig> = z
  .object({
    outDir: z.string().min(1).optional(),
    excludeUnits: z.array(z.string()).optional(),
    excludeFiles: z.array(z.string()).optional(),
    unownedDir: z.string().min(1).optional(),
    handles: z.enum(["auto", "procfs", "lsof", "none"]).optional(),
    searchDirs: z.array(z.string()).optional(),
    builtins: z
      .object({
        reference: z.string().min(1).optional(),
        siteDirs: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    manifest: z.boolean().optional(),
  })
  .strict();

let cachedConfig: TracepackConfig | null = null;
let configLoaded = false;

// `import { defineConfig } from "tracepack"` must work before the package is installed next to the config.
const inlineTracepackPlugin: Plugin = {
  name: "inline-tracepack",
  setup(pluginBuild) {
    pluginBuild.onResolve({ filter: /^tracepack$/ }, () => ({
      path: "tracepack-virtual",
      namespace: "tracepack-ns",
    }));
    pluginBuild.onLoad({ filter: /.*/, namespace: "tracepack-ns" }, () => ({
      contents: `
        export function defineConfig(config) {
          return typeof config === 'function' ? config : () => config;
        }
      `,
      loader: "js",
    }));
  },
};

/**
 * Bundle a config file into one ESM module that can be imported from a data:
 * URL. The file's own location is substituted at build time, since the
 * bundled module no longer has one.
 */
async function bundleConfig(entry: string): Promise<string> {
  const result = await build({
    entryPoints: [entry],
    bundle: true,
    platform: "node",
    format: "esm",
    target: "node20",
    write: false,
    logLevel: "silent",
    absWorkingDir: path.dirname(entry),
    define: {
      __dirname: JSON.stringify(path.dirname(entry)),
      __filename: JSON.stringify(entry),
      "import.meta.url": JSON.stringify(pathToFileURL(entry).href),
    },
    plugins: [inlineTracepackPlugin],
  });
  const output = result.outputFiles?.[0];
  if (!output) throw new ConfigError(`esbuild produced no output for ${entry}`);
  return output.text;
}

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_BASENAMES) {
    const candidate = path.resolve(cwd, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }
  return null;
}

async function unwrapExport(imported: unknown): Promise<unknown> {
  let resolved: unknown = imported;
  if (resolved && typeof resolved === "object" && "default" in resolved) {
    resolved = resolved.default;
  }
  // defineConfig() output, or a plain function export
  if (typeof resolved === "function") {
    resolved = resolved({ mode: process.env.NODE_ENV || "production" });
  }
  return await resolved;
}

export function parseConfig(raw: unknown, source = "tracepack config"): TracepackConfig {
  const parsed = TracepackConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${source}: ${issues}`, { details: { source } });
  }
  return parsed.data;
}

export async function loadTracepackConfig(cwd = process.cwd()): Promise<TracepackConfig | null> {
  if (configLoaded) return cachedConfig;
  configLoaded = true;

  const configPath = findConfigFile(cwd);
  if (!configPath) {
    cachedConfig = null;
    return cachedConfig;
  }

  try {
    const bundled = await bundleConfig(configPath);
    const dataUrl = `data:text/javascript;base64,${Buffer.from(bundled).toString("base64")}`;
    const imported: unknown = await import(dataUrl);
    cachedConfig = parseConfig(await unwrapExport(imported), path.relative(cwd, configPath));
    logInfo(`Loaded tracepack config from ${path.relative(cwd, configPath)}`);
  } catch (err) {
    logError("Failed to load tracepack.config", err);
    cachedConfig = null;
  }
  return cachedConfig;
}

export function resetTracepackConfigCache() {
  cachedConfig = null;
  configLoaded = false;
}

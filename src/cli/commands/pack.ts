import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";
import { logInfo, logWarn } from "@cli/utils/logger";
import { loadTracepackConfig } from "@cli/utils/config";
import { resolveHandleSource } from "@cli/utils/handles";
import { resolveExclusions } from "@cli/utils/exclusions";
import { PackRunner } from "@core/runner";
import { ledgerToRecord } from "@core/materializer";
import { formatBytes } from "@core/utils/size";
import { ConfigError } from "@core/errors";

export const DEFAULT_OUT_DIR = "tracepack_build";
// The runner's own code runs inside the trace window; it is never a dependency of the target.
const SELF_UNIT = "tracepack";

export interface PackOptions {
  outDir?: string;
  excludeUnit?: string[];
  excludeFile?: string[];
  handles?: string;
  call?: string;
  args?: string[];
  dryRun?: boolean;
  manifest?: boolean;
  json?: boolean;
  cwd?: string;
}

function readExport(mod: unknown, name: string): unknown {
  if (!mod || typeof mod !== "object") return undefined;
  if (name in mod) return Reflect.get(mod, name);
  // CommonJS entries expose module.exports as the default export
  const fallback: unknown = "default" in mod ? mod.default : undefined;
  if (fallback && typeof fallback === "object" && name in fallback) return Reflect.get(fallback, name);
  return undefined;
}

/** Import the entry (and optionally await one of its exports) while the runner records. */
export async function runTarget(runner: PackRunner, entry: string, call?: string, args: string[] = []) {
  const previousArgv = process.argv;
  process.argv = [previousArgv[0] ?? process.execPath, entry, ...args];
  try {
    await runner.trace(async () => {
      const mod: unknown = await import(pathToFileURL(entry).href);
      if (!call) return;
      const fn = readExport(mod, call);
      if (typeof fn !== "function") {
        throw new ConfigError(`${path.basename(entry)} has no exported function "${call}"`);
      }
      await fn();
    });
  } finally {
    process.argv = previousArgv;
  }
}

export async function runPackCommand(entry: string, options: PackOptions = {}) {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadTracepackConfig(cwd);

  const target = path.resolve(cwd, entry);
  if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
    throw new ConfigError(`Entry ${entry} does not exist`);
  }

  const handles = resolveHandleSource(config, { cliFlag: options.handles, envVar: process.env.TRACEPACK_HANDLES });
  const exclusions = resolveExclusions(config, {
    cliUnits: options.excludeUnit,
    cliFiles: options.excludeFile,
    envUnits: process.env.TRACEPACK_EXCLUDE_UNITS,
    envFiles: process.env.TRACEPACK_EXCLUDE_FILES,
  });
  const outDir = path.resolve(cwd, options.outDir ?? process.env.TRACEPACK_OUT_DIR ?? config?.outDir ?? DEFAULT_OUT_DIR);

  const runner = new PackRunner({
    cwd,
    handles,
    unitBlacklist: [...exclusions.units, SELF_UNIT],
    fileBlacklist: exclusions.files,
    unownedDir: config?.unownedDir,
    searchDirs: config?.searchDirs?.map((dir) => path.resolve(cwd, dir)),
    builtins: config?.builtins,
  });
  logInfo(`Indexed ${runner.index.size} units (${runner.builtins.size} built-in), open files via ${handles}`);

  await runTarget(runner, target, options.call, options.args);

  const entries = runner.buildList();
  if (runner.skippedFiles.length > 0) {
    logWarn(`${runner.skippedFiles.length} touched paths no longer exist and were skipped`);
  }

  if (options.json) {
    console.log(
      JSON.stringify({ entries, ledger: ledgerToRecord(runner.ledger), builtins: [...runner.builtins].sort() }, null, 2)
    );
    return;
  }

  const report = runner.materialize(outDir, {
    dryRun: options.dryRun,
    manifest: options.manifest ?? config?.manifest ?? true,
  });

  const ledger = ledgerToRecord(runner.ledger);
  const top = Object.entries(ledger).slice(0, 10);
  if (top.length > 0) {
    console.log("\n Largest units:");
    for (const [unit, bytes] of top) {
      console.log(`  • ${unit} (${formatBytes(bytes)})`);
    }
  }
  logInfo(
    options.dryRun
      ? `Dry run: ${report.files} entries would be written to ${report.outputRoot}`
      : `Wrote ${report.files} entries (${formatBytes(report.bytes)}) to ${report.outputRoot}`
  );
}

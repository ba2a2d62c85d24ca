import path from "path";
import { logInfo } from "@cli/utils/logger";
import { loadTracepackConfig } from "@cli/utils/config";
import { buildIndex } from "@core/units";
import { builtinSet, deriveBuiltinRoots } from "@core/builtins";

interface UnitsOptions {
  json?: boolean;
  limit?: number;
  cwd?: string;
}

interface UnitsSummary {
  units: number;
  builtins: string[];
  baseRoot: string;
  siteDirs: string[];
  skipped: Array<{ slot: string; reason: string }>;
  thirdParty: Array<{ name: string; root: string }>;
}

export async function collectUnitsSummary(options: UnitsOptions = {}): Promise<UnitsSummary> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadTracepackConfig(cwd);
  const { index, skipped } = buildIndex({
    cwd,
    searchDirs: config?.searchDirs?.map((dir) => path.resolve(cwd, dir)),
  });
  const roots = deriveBuiltinRoots(index, config?.builtins);
  const builtins = builtinSet(index, config?.builtins);
  const thirdParty = [...index.values()]
    .filter((unit) => !builtins.has(unit.name))
    .map((unit) => ({ name: unit.name, root: unit.root }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return {
    units: index.size,
    builtins: [...builtins].sort(),
    baseRoot: roots.baseRoot,
    siteDirs: roots.siteDirs,
    skipped: skipped.map((error) => ({ slot: error.candidate.slot, reason: error.reason })),
    thirdParty,
  };
}

export async function runUnitsCommand(options: UnitsOptions = {}) {
  const summary = await collectUnitsSummary(options);
  const limit = options.limit ?? 10;

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  logInfo("Unit index");
  console.log(` Units: ${summary.units}`);
  console.log(` Built-in root: ${summary.baseRoot}`);
  console.log(` Built-in units: ${summary.builtins.join(", ") || "(none)"}`);

  if (summary.thirdParty.length > 0) {
    console.log("\n Third-party units:");
    for (const unit of summary.thirdParty.slice(0, limit)) {
      console.log(`  • ${unit.name} → ${unit.root}`);
    }
    if (summary.thirdParty.length > limit) {
      console.log(`  • …and ${summary.thirdParty.length - limit} more`);
    }
  }

  if (summary.skipped.length > 0) {
    console.log(`\n Skipped candidates: ${summary.skipped.length}`);
    for (const skipped of summary.skipped.slice(0, limit)) {
      console.log(`  • ${skipped.slot} (${skipped.reason})`);
    }
  }
}

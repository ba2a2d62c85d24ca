import path from "path";
import picomatch from "picomatch";
import { ConfigError } from "@core/errors";
import { toPosix } from "@core/utils/paths";
import { UnitLookup } from "@core/unit-lookup";
import type { Classification, UnitIndex } from "@core/types/bundle";

export const DEFAULT_UNOWNED_DIR = "lib";

export interface ClassifierOptions {
  builtins?: Iterable<string>;
  unitBlacklist?: Iterable<string>;
  fileBlacklist?: string[];
  unownedDir?: string;
}

export interface ClassifyContext {
  lookup: UnitLookup;
  builtins: ReadonlySet<string>;
  unitBlacklist: ReadonlySet<string>;
  isBlacklistedFile: (baseName: string) => boolean;
  unownedDir: string;
}

function compileFileBlacklist(patterns: string[]): (baseName: string) => boolean {
  if (patterns.length === 0) return () => false;
  const matchers = patterns.map((pattern) => picomatch(pattern, { dot: true }));
  return (baseName) => matchers.some((matches) => matches(baseName));
}

export function createClassifyContext(index: UnitIndex, options: ClassifierOptions = {}): ClassifyContext {
  const unownedDir = toPosix(options.unownedDir ?? DEFAULT_UNOWNED_DIR).replace(/^\/+|\/+$/g, "");
  if (!unownedDir || unownedDir.split("/").includes("..")) {
    throw new ConfigError(`Invalid catch-all directory "${options.unownedDir}"`);
  }
  return {
    lookup: new UnitLookup(index),
    builtins: new Set(options.builtins ?? []),
    unitBlacklist: new Set(options.unitBlacklist ?? []),
    isBlacklistedFile: compileFileBlacklist(options.fileBlacklist ?? []),
    unownedDir,
  };
}

/**
 * Decide whether a touched file is bundled and where it goes. Returns null
 * for blacklisted files and for files of built-in or blacklisted units;
 * files no unit owns go to the catch-all directory.
 */
export function classify(filePath: string, context: ClassifyContext): Classification {
  const baseName = path.basename(filePath);
  if (context.isBlacklistedFile(baseName)) return null;

  const unit = context.lookup.owner(filePath);
  if (!unit) {
    return { unit: null, destination: `${context.unownedDir}/${baseName}` };
  }

  if (context.builtins.has(unit.name)) return null;
  if (context.unitBlacklist.has(unit.name)) return null;

  const inner = toPosix(path.relative(unit.root, filePath));
  const destination = inner ? `${unit.slot}/${inner}` : unit.slot;
  return { unit, destination };
}

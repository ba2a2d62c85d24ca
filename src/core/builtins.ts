import path from "path";
import { MissingReferenceUnitError } from "@core/errors";
import { expandLexical, isWithin } from "@core/utils/paths";
import { userGlobalDirs } from "@core/units";
import type { UnitIndex } from "@core/types/bundle";

export const DEFAULT_REFERENCE_UNIT = "npm";

export interface BuiltinLayout {
  reference?: string;
  /** Folders under the base root whose units count as third-party. */
  siteDirs?: string[];
}

export interface BuiltinRoots {
  reference: string;
  baseRoot: string;
  siteDirs: string[];
}

/**
 * Locate the distribution's package folder through the reference unit.
 * Throws when the reference unit is not indexed.
 */
export function deriveBuiltinRoots(index: UnitIndex, layout: BuiltinLayout = {}): BuiltinRoots {
  const reference = layout.reference ?? DEFAULT_REFERENCE_UNIT;
  const unit = index.get(reference);
  if (!unit) {
    throw new MissingReferenceUnitError(reference);
  }
  // "@scope/name" units sit two levels below the folder, plain ones one.
  const depth = unit.slot.split("/").length;
  let baseRoot = unit.root;
  for (let i = 0; i < depth; i++) baseRoot = path.dirname(baseRoot);

  const siteDirs = (layout.siteDirs ?? userGlobalDirs())
    .map(expandLexical)
    .filter((dir) => isWithin(dir, baseRoot) && dir !== baseRoot);
  return { reference, baseRoot, siteDirs };
}

/** Units installed in the distribution's own folder, minus those in user site folders below it. */
export function builtinSet(index: UnitIndex, layout: BuiltinLayout = {}): Set<string> {
  const { baseRoot, siteDirs } = deriveBuiltinRoots(index, layout);
  const builtins = new Set<string>();
  for (const [name, unit] of index) {
    if (!isWithin(unit.root, baseRoot)) continue;
    if (siteDirs.some((site) => isWithin(unit.root, site))) continue;
    builtins.add(name);
  }
  return builtins;
}

import fs from "fs";
import os from "os";
import path from "path";
import { expand, expandHome } from "@core/utils/paths";
import { logDebug } from "@cli/utils/logger";
import type { Unit, UnitIndex } from "@core/types/bundle";

const LOADABLE_EXTS = [".js", ".cjs", ".mjs", ".json", ".node"];
const INDEX_FILES = LOADABLE_EXTS.map((ext) => `index${ext}`);

export interface UnitCandidate {
  /** Path as listed in the search directory (may be a symlink). */
  location: string;
  /** Name relative to the search directory, e.g. "@scope/pkg" or "left-pad.js". */
  slot: string;
  searchDir: string;
}

export type ResolutionFailure = "broken-link" | "no-entry" | "unreadable" | "shadowed";

export interface ResolutionError {
  candidate: UnitCandidate;
  reason: ResolutionFailure;
  message: string;
}

export type ResolutionResult =
  | { ok: true; unit: Unit; candidate: UnitCandidate }
  | { ok: false; error: ResolutionError };

export interface BuildIndexOptions {
  cwd?: string;
  searchDirs?: string[];
  env?: NodeJS.ProcessEnv;
}

export interface IndexBuild {
  index: UnitIndex;
  skipped: ResolutionError[];
}

function installPrefix(): string {
  const binDir = path.dirname(process.execPath);
  return process.platform === "win32" ? binDir : path.dirname(binDir);
}

/** Folder the Node.js distribution installs its own packages (npm, corepack) into. */
export function distributionModulesDir(): string {
  const prefix = installPrefix();
  return process.platform === "win32"
    ? path.join(prefix, "node_modules")
    : path.join(prefix, "lib", "node_modules");
}

/** NODE_PATH plus the per-user global folders Node consults for bare specifiers. */
export function userGlobalDirs(env: NodeJS.ProcessEnv = process.env): string[] {
  const fromEnv = (env.NODE_PATH ?? "")
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map(expandHome);
  const home = os.homedir();
  return [
    ...fromEnv,
    path.join(home, ".node_modules"),
    path.join(home, ".node_libraries"),
    path.join(installPrefix(), "lib", "node"),
  ];
}

/**
 * Directories Node searches for packages, nearest first. Missing directories
 * are dropped and every entry is a real path.
 */
export function defaultSearchDirs(cwd = process.cwd(), env: NodeJS.ProcessEnv = process.env): string[] {
  const raw: string[] = [];
  let dir = path.resolve(cwd);
  for (;;) {
    if (path.basename(dir) !== "node_modules") {
      raw.push(path.join(dir, "node_modules"));
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  raw.push(...userGlobalDirs(env), distributionModulesDir());
  return normalizeDirs(raw);
}

function normalizeDirs(dirs: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const dir of dirs) {
    const real = expand(dir);
    if (!real || seen.has(real)) continue;
    if (!fs.statSync(real).isDirectory()) continue;
    seen.add(real);
    out.push(real);
  }
  return out;
}

function isLoadableFile(name: string): boolean {
  return LOADABLE_EXTS.includes(path.extname(name));
}

function listDir(dir: string): fs.Dirent[] {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    logDebug(`Cannot list ${dir}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}

/** Every entry of every search directory that could be a unit; `@scope` folders are opened one level. */
export function enumerateCandidates(searchDirs: string[]): UnitCandidate[] {
  const candidates: UnitCandidate[] = [];
  for (const searchDir of searchDirs) {
    for (const entry of listDir(searchDir)) {
      if (entry.name.startsWith(".")) continue;
      const location = path.join(searchDir, entry.name);
      if (entry.name.startsWith("@") && entry.isDirectory()) {
        for (const scoped of listDir(location)) {
          if (scoped.name.startsWith(".")) continue;
          candidates.push({
            location: path.join(location, scoped.name),
            slot: `${entry.name}/${scoped.name}`,
            searchDir,
          });
        }
        continue;
      }
      if (entry.isFile() && !isLoadableFile(entry.name)) continue;
      candidates.push({ location, slot: entry.name, searchDir });
    }
  }
  return candidates;
}

function fail(candidate: UnitCandidate, reason: ResolutionFailure, message: string): ResolutionResult {
  return { ok: false, error: { candidate, reason, message } };
}

function readManifestError(manifestPath: string): Error | null {
  try {
    JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    return null;
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
}

/**
 * Resolve one candidate to a unit, or to the reason it cannot be one. A unit
 * is named by the specifier Node loads it under (its slot), not by the
 * manifest's `name`: `npm install foo2@npm:foo` lives at `foo2`.
 */
export function resolveCandidate(candidate: UnitCandidate): ResolutionResult {
  const real = expand(candidate.location);
  if (!real) {
    return fail(candidate, "broken-link", `${candidate.location} does not resolve to an existing path`);
  }

  let stat: fs.Stats;
  try {
    stat = fs.statSync(real);
  } catch (err) {
    return fail(candidate, "unreadable", err instanceof Error ? err.message : String(err));
  }

  if (stat.isFile()) {
    if (!isLoadableFile(real)) {
      return fail(candidate, "no-entry", `${real} is not a loadable file`);
    }
    const name = path.basename(candidate.slot, path.extname(candidate.slot));
    return { ok: true, unit: { name, root: real, slot: candidate.slot }, candidate };
  }

  if (!stat.isDirectory()) {
    return fail(candidate, "no-entry", `${real} is neither a file nor a directory`);
  }

  const manifestPath = path.join(real, "package.json");
  if (fs.existsSync(manifestPath)) {
    const manifestError = readManifestError(manifestPath);
    if (manifestError) {
      return fail(candidate, "unreadable", `${manifestPath}: ${manifestError.message}`);
    }
    return { ok: true, unit: { name: candidate.slot, root: real, slot: candidate.slot }, candidate };
  }

  if (INDEX_FILES.some((file) => fs.existsSync(path.join(real, file)))) {
    return { ok: true, unit: { name: candidate.slot, root: real, slot: candidate.slot }, candidate };
  }

  return fail(candidate, "no-entry", `${real} has no package.json or index file`);
}

/**
 * Keep the successful resolutions. A name already taken by a nearer search
 * directory shadows later ones, the way Node resolves bare specifiers.
 */
export function collectUnits(results: ResolutionResult[]): IndexBuild {
  const index: UnitIndex = new Map();
  const skipped: ResolutionError[] = [];
  for (const result of results) {
    if (!result.ok) {
      skipped.push(result.error);
      continue;
    }
    const existing = index.get(result.unit.name);
    if (existing) {
      skipped.push({
        candidate: result.candidate,
        reason: "shadowed",
        message: `${result.unit.name} at ${result.unit.root} is shadowed by ${existing.root}`,
      });
      continue;
    }
    index.set(result.unit.name, result.unit);
  }
  return { index, skipped };
}

export function buildIndex(options: BuildIndexOptions = {}): IndexBuild {
  const searchDirs = options.searchDirs
    ? normalizeDirs(options.searchDirs)
    : defaultSearchDirs(options.cwd, options.env);
  const results = enumerateCandidates(searchDirs).map(resolveCandidate);
  const build = collectUnits(results);
  for (const error of build.skipped) {
    logDebug(`Skipped unit candidate ${error.candidate.slot} (${error.reason}): ${error.message}`);
  }
  logDebug(`Indexed ${build.index.size} units from ${searchDirs.length} search directories`);
  return build;
}

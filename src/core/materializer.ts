import fs from "fs";
import path from "path";
import { classify, type ClassifyContext } from "@core/classifier";
import { CopyError, DestinationCollisionError } from "@core/errors";
import { expand, expandLexical, isWithin } from "@core/utils/paths";
import { formatBytes, measure } from "@core/utils/size";
import { logInfo } from "@cli/utils/logger";
import type {
  BundleEntry,
  BundleList,
  BundleManifest,
  MaterializeReport,
  SizeLedger,
  TouchOrigin,
  TouchedFile,
} from "@core/types/bundle";

export const MANIFEST_FILE = "tracepack.manifest.json";

export interface TouchedSets {
  executed: Iterable<string>;
  opened: Iterable<string>;
}

/**
 * Merge executed and opened paths by real path. Paths that no longer exist,
 * dangling links, and anything that is neither a file nor a directory are
 * returned separately in `skipped`.
 */
export function collectTouched(sets: TouchedSets): { touched: TouchedFile[]; skipped: string[] } {
  const byPath = new Map<string, TouchedFile>();
  const skipped: string[] = [];

  const add = (raw: string, origin: TouchOrigin) => {
    const real = expand(raw);
    if (!real) {
      skipped.push(raw);
      return;
    }
    const existing = byPath.get(real);
    if (existing) {
      existing.origins.add(origin);
      return;
    }
    const stat = fs.statSync(real);
    if (!stat.isFile() && !stat.isDirectory()) {
      skipped.push(raw);
      return;
    }
    byPath.set(real, { path: real, origins: new Set([origin]) });
  };

  for (const file of sets.executed) add(file, "executed");
  for (const file of sets.opened) add(file, "opened");

  const touched = [...byPath.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { touched, skipped };
}

/**
 * `package.json` files between a touched file and its unit root. Node reads
 * them (for `main`, `exports` and `type`) without running or holding them,
 * so neither the tracer nor a snapshot sees them.
 */
export function impliedManifests(touched: TouchedFile[], context: ClassifyContext): TouchedFile[] {
  const seen = new Set(touched.map((file) => file.path));
  const manifests: TouchedFile[] = [];
  for (const file of touched) {
    const unit = context.lookup.owner(file.path);
    if (!unit || unit.root === file.path) continue;
    let dir = path.dirname(file.path);
    while (isWithin(dir, unit.root)) {
      const manifest = path.join(dir, "package.json");
      if (!seen.has(manifest) && fs.existsSync(manifest) && fs.statSync(manifest).isFile()) {
        seen.add(manifest);
        manifests.push({ path: manifest, origins: new Set(["manifest"]) });
      }
      if (dir === unit.root) break;
      dir = path.dirname(dir);
    }
  }
  return manifests;
}

/** Classify every touched file and tally bytes per unit. */
export function buildList(sets: TouchedSets, context: ClassifyContext): BundleList {
  const collected = collectTouched(sets);
  const { skipped } = collected;
  const touched = [...collected.touched, ...impliedManifests(collected.touched, context)].sort((a, b) =>
    a.path < b.path ? -1 : a.path > b.path ? 1 : 0
  );
  const ledger: SizeLedger = new Map();
  const entries: BundleEntry[] = [];

  for (const file of touched) {
    const result = classify(file.path, context);
    if (!result) continue;
    const kind = fs.statSync(file.path).isDirectory() ? "directory" : "file";
    const size = measure(file.path);
    const key = result.unit?.name ?? context.unownedDir;
    ledger.set(key, (ledger.get(key) ?? 0) + size);
    entries.push({
      source: file.path,
      destination: result.destination,
      unit: result.unit?.name ?? null,
      kind,
      size,
      origins: [...file.origins].sort(),
    });
  }

  return { entries, ledger, skipped };
}

/** Throws when two different sources would be written to one destination. */
export function assertNoCollisions(entries: BundleEntry[]) {
  const sourcesByDestination = new Map<string, Set<string>>();
  for (const entry of entries) {
    const sources = sourcesByDestination.get(entry.destination) ?? new Set<string>();
    sources.add(entry.source);
    sourcesByDestination.set(entry.destination, sources);
  }
  for (const [destination, sources] of sourcesByDestination) {
    if (sources.size > 1) {
      throw new DestinationCollisionError(destination, [...sources].sort());
    }
  }
}

export interface MaterializeOptions {
  dryRun?: boolean;
  /** Written to tracepack.manifest.json at the bundle root when given. */
  manifest?: Pick<BundleManifest, "builtins" | "ledger">;
  onProgress?: (index: number, total: number, entry: BundleEntry) => void;
}

function copyEntry(entry: BundleEntry, target: string) {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  if (entry.kind === "directory") {
    fs.cpSync(entry.source, target, { recursive: true, errorOnExist: true, force: false });
  } else {
    fs.copyFileSync(entry.source, target);
  }
}

/**
 * Copy the bundle entries under `outputRoot`. Collisions are checked before
 * anything is written; the first failing copy aborts the rest.
 */
export function materialize(
  entries: BundleEntry[],
  outputRoot: string,
  options: MaterializeOptions = {}
): MaterializeReport {
  assertNoCollisions(entries);

  // The same source listed twice (e.g. executed and opened) is copied once.
  const unique = new Map<string, BundleEntry>();
  for (const entry of entries) {
    if (!unique.has(entry.source)) unique.set(entry.source, entry);
  }
  const work = [...unique.values()];

  const root = expandLexical(outputRoot);
  const totalBytes = work.reduce((sum, entry) => sum + entry.size, 0);
  logInfo(`total package looks like: ${formatBytes(totalBytes)}`);

  const report =
    options.onProgress ??
    ((index: number, total: number, entry: BundleEntry) => logInfo(`copying ${index}/${total}: ${entry.destination}`));

  work.forEach((entry, i) => {
    report(i + 1, work.length, entry);
    if (options.dryRun) return;
    const target = path.join(root, ...entry.destination.split("/"));
    try {
      copyEntry(entry, target);
    } catch (err) {
      throw new CopyError(entry.source, target, err);
    }
  });

  let manifestPath: string | null = null;
  if (options.manifest && !options.dryRun) {
    manifestPath = path.join(root, MANIFEST_FILE);
    const manifest: BundleManifest = {
      version: 1,
      createdAt: new Date().toISOString(),
      outputRoot: root,
      totalBytes,
      builtins: options.manifest.builtins,
      ledger: options.manifest.ledger,
      entries: work,
    };
    fs.mkdirSync(root, { recursive: true });
    fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2));
  }

  return { outputRoot: root, files: work.length, bytes: totalBytes, manifestPath };
}

export function ledgerToRecord(ledger: SizeLedger): Record<string, number> {
  return Object.fromEntries([...ledger.entries()].sort((a, b) => b[1] - a[1]));
}

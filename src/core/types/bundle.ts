export interface Unit {
  name: string;
  /** Real absolute path: the package directory, or the file for single-file units. */
  root: string;
  /**
   * Where the unit sits inside a search directory ("lodash", "@scope/pkg", "left-pad.js").
   * Bundle destinations start with it.
   */
  slot: string;
}

export type UnitIndex = Map<string, Unit>;

/** "manifest": a package.json Node read while loading a touched file. */
export type TouchOrigin = "executed" | "opened" | "manifest";

export interface TouchedFile {
  path: string;
  origins: Set<TouchOrigin>;
}

export interface ClassifiedFile {
  unit: Unit | null;
  destination: string;
}

export type Classification = ClassifiedFile | null;

export type SizeLedger = Map<string, number>;

export type BundleEntryKind = "file" | "directory";

export interface BundleEntry {
  source: string;
  destination: string;
  unit: string | null;
  kind: BundleEntryKind;
  size: number;
  origins: TouchOrigin[];
}

export interface BundleList {
  entries: BundleEntry[];
  ledger: SizeLedger;
  /** Touched paths that were dropped before classification (missing, broken links, sockets). */
  skipped: string[];
}

export interface MaterializeReport {
  outputRoot: string;
  files: number;
  bytes: number;
  manifestPath: string | null;
}

export interface BundleManifest {
  version: 1;
  createdAt: string;
  outputRoot: string;
  totalBytes: number;
  builtins: string[];
  ledger: Record<string, number>;
  entries: BundleEntry[];
}

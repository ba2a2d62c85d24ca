export type HandleSourceMode = "auto" | "procfs" | "lsof" | "none";

export interface TracepackBuiltinsConfig {
  /** Unit that always ships with the Node.js distribution; its folder is the base root. */
  reference?: string;
  /** User-level folders under the base root whose units stay third-party. */
  siteDirs?: string[];
}

export interface TracepackConfig {
  /** Output directory for the materialized bundle. */
  outDir?: string;
  /** Unit names that are never bundled. */
  excludeUnits?: string[];
  /** Base-name globs that are never bundled, whatever unit owns them. */
  excludeFiles?: string[];
  /** Catch-all directory for files no unit owns (defaults to "lib"). */
  unownedDir?: string;
  /**
   * How open files are listed around the traced run.
   * - "auto" picks procfs when available and falls back to lsof.
   * - "none" disables the snapshot and keeps tracer results only.
   */
  handles?: HandleSourceMode;
  /** Replaces the default Node search directories when set. */
  searchDirs?: string[];
  builtins?: TracepackBuiltinsConfig;
  /** Write tracepack.manifest.json next to the bundle. */
  manifest?: boolean;
}

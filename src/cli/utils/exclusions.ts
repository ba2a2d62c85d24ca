import type { TracepackConfig } from "@core/types/config";

export interface Exclusions {
  units: string[];
  files: string[];
}

export interface ResolveExclusionOptions {
  cliUnits?: string[];
  cliFiles?: string[];
  envUnits?: string | undefined; // TRACEPACK_EXCLUDE_UNITS
  envFiles?: string | undefined; // TRACEPACK_EXCLUDE_FILES
}

function splitList(raw: string | undefined): string[] | null {
  if (raw === undefined) return null;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function pick(cli: string[] | undefined, env: string | undefined, config: string[] | undefined): string[] {
  if (cli && cli.length > 0) return [...cli];
  return splitList(env) ?? [...(config ?? [])];
}

/**
 * Each list is taken whole from the first source that sets it:
 * CLI flags > env vars > tracepack.config.ts. Lists are not merged.
 */
export function resolveExclusions(
  config: TracepackConfig | null | undefined,
  opts: ResolveExclusionOptions = {}
): Exclusions {
  return {
    units: pick(opts.cliUnits, opts.envUnits, config?.excludeUnits),
    files: pick(opts.cliFiles, opts.envFiles, config?.excludeFiles),
  };
}

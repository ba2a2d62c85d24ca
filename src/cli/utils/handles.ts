import type { HandleSourceMode, TracepackConfig } from "@core/types/config";

function normalize(value: unknown): HandleSourceMode | null {
  if (typeof value !== "string") return null;
  const v = value.trim().toLowerCase();
  if (v === "auto" || v === "procfs" || v === "lsof" || v === "none") return v;
  if (v === "off" || v === "false") return "none";
  return null;
}

export interface ResolveHandlesOptions {
  cliFlag?: string | undefined; // --handles
  envVar?: string | undefined; // TRACEPACK_HANDLES
}

/**
 * Precedence: CLI flag > Env var > tracepack.config.ts > default ('auto').
 */
export function resolveHandleSource(
  config: TracepackConfig | null | undefined,
  opts: ResolveHandlesOptions = {}
): HandleSourceMode {
  const fromCli = normalize(opts.cliFlag);
  if (fromCli) return fromCli;
  const fromEnv = normalize(opts.envVar);
  if (fromEnv) return fromEnv;
  return normalize(config?.handles) ?? "auto";
}

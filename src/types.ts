export * from "./core/types/config";
export * from "./core/types/bundle";

import type { TracepackConfig } from "./core/types/config";

export function defineConfig(config: TracepackConfig): TracepackConfig;
export function defineConfig(
  config: (env: { mode: string }) => TracepackConfig | Promise<TracepackConfig>
): TracepackConfig | Promise<TracepackConfig>;
export function defineConfig(
  config: TracepackConfig | ((env: { mode: string }) => TracepackConfig | Promise<TracepackConfig>)
): TracepackConfig | Promise<TracepackConfig> {
  if (typeof config === "function") {
    return config({ mode: process.env.NODE_ENV || "production" });
  }
  return config;
}

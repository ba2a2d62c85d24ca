export * from "./types";
export { PackRunner, type PackRunnerOptions, type RunnerMaterializeOptions } from "./core/runner";
export {
  buildIndex,
  collectUnits,
  defaultSearchDirs,
  enumerateCandidates,
  resolveCandidate,
  type ResolutionError,
  type ResolutionResult,
  type UnitCandidate,
} from "./core/units";
export { builtinSet, deriveBuiltinRoots, type BuiltinLayout } from "./core/builtins";
export { UnitLookup } from "./core/unit-lookup";
export { classify, createClassifyContext, type ClassifyContext, type ClassifierOptions } from "./core/classifier";
export { ExecutionTracer, InspectorTraceHook, type TraceHook, type TraceHookHandle } from "./core/tracer";
export {
  OpenHandleSnapshotter,
  createHandleSource,
  diffSnapshots,
  type HandleSource,
} from "./core/handles";
export { buildList, materialize, assertNoCollisions, type MaterializeOptions } from "./core/materializer";
export * from "./core/errors";

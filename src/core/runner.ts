import { builtinSet, type BuiltinLayout } from "@core/builtins";
import { createClassifyContext, type ClassifyContext } from "@core/classifier";
import { TracerStateError } from "@core/errors";
import { createHandleSource, diffSnapshots, OpenHandleSnapshotter } from "@core/handles";
import { buildList, ledgerToRecord, materialize, type MaterializeOptions } from "@core/materializer";
import { ExecutionTracer, type TraceHook } from "@core/tracer";
import { buildIndex, type ResolutionError } from "@core/units";
import { logDebug } from "@cli/utils/logger";
import type { HandleSourceMode } from "@core/types/config";
import type { BundleEntry, BundleList, MaterializeReport, SizeLedger, UnitIndex } from "@core/types/bundle";

export interface PackRunnerOptions {
  unitBlacklist?: string[];
  fileBlacklist?: string[];
  unownedDir?: string;
  handles?: HandleSourceMode;
  searchDirs?: string[];
  builtins?: BuiltinLayout;
  cwd?: string;
  /** Prebuilt index; skips the search directory walk. */
  index?: UnitIndex;
  hook?: TraceHook;
  snapshotter?: OpenHandleSnapshotter;
}

export interface RunnerMaterializeOptions extends Omit<MaterializeOptions, "manifest"> {
  manifest?: boolean;
}

/**
 * One monitored run: start() before the target program runs, stop() after
 * it returns, then buildList() and materialize(). The unit index and
 * built-in set are computed once, at construction.
 */
export class PackRunner {
  readonly index: UnitIndex;
  readonly builtins: Set<string>;
  readonly skippedUnits: ResolutionError[];

  private readonly context: ClassifyContext;
  private readonly tracer: ExecutionTracer;
  private readonly snapshotter: OpenHandleSnapshotter;
  private baseline: Set<string> | null = null;
  private final: Set<string> | null = null;
  private list: BundleList | null = null;

  constructor(options: PackRunnerOptions = {}) {
    if (options.index) {
      this.index = options.index;
      this.skippedUnits = [];
    } else {
      const build = buildIndex({ cwd: options.cwd, searchDirs: options.searchDirs });
      this.index = build.index;
      this.skippedUnits = build.skipped;
    }
    this.builtins = builtinSet(this.index, options.builtins);
    logDebug(`Built-in units: ${[...this.builtins].sort().join(", ") || "(none)"}`);

    this.context = createClassifyContext(this.index, {
      builtins: this.builtins,
      unitBlacklist: options.unitBlacklist,
      fileBlacklist: options.fileBlacklist,
      unownedDir: options.unownedDir,
    });
    this.tracer = new ExecutionTracer(options.hook);
    this.snapshotter = options.snapshotter ?? new OpenHandleSnapshotter(createHandleSource(options.handles ?? "auto"));
  }

  get classifyContext(): ClassifyContext {
    return this.context;
  }

  start() {
    if (this.tracer.current !== "idle") {
      throw new TracerStateError(`Runner already ${this.tracer.current}; create a new runner for another run`);
    }
    this.baseline = this.snapshotter.snapshot();
    this.tracer.start();
  }

  stop() {
    this.tracer.stop();
    this.final = this.snapshotter.snapshot();
  }

  /** Run the target between start() and stop(); the hook is removed even if the target throws. */
  async trace<T>(fn: () => T | Promise<T>): Promise<T> {
    this.start();
    try {
      return await fn();
    } finally {
      this.stop();
    }
  }

  executedFiles(): string[] {
    return this.tracer.executedFiles();
  }

  openedFiles(): Set<string> {
    if (!this.baseline || !this.final) return new Set();
    return diffSnapshots(this.baseline, this.final);
  }

  buildList(): BundleEntry[] {
    if (this.tracer.current !== "stopped") {
      throw new TracerStateError(`Cannot build the bundle list while the tracer is ${this.tracer.current}`);
    }
    this.list = buildList({ executed: this.executedFiles(), opened: this.openedFiles() }, this.context);
    return this.list.entries;
  }

  /** Bytes per unit from the last buildList(). */
  get ledger(): SizeLedger {
    return this.list?.ledger ?? new Map();
  }

  get skippedFiles(): string[] {
    return this.list?.skipped ?? [];
  }

  materialize(outputRoot: string, options: RunnerMaterializeOptions = {}): MaterializeReport {
    const entries = this.list?.entries ?? this.buildList();
    const { manifest, ...rest } = options;
    return materialize(entries, outputRoot, {
      ...rest,
      manifest: manifest
        ? { builtins: [...this.builtins].sort(), ledger: ledgerToRecord(this.ledger) }
        : undefined,
    });
  }
}

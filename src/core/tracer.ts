import { Session, type Profiler } from "inspector";
import { TracerStateError } from "@core/errors";
import { scriptUrlToPath } from "@core/utils/paths";

export type TracerState = "idle" | "recording" | "stopped";

/** Handle returned by an installed hook; release() removes it. */
export interface TraceHookHandle {
  release(): void;
}

export interface TraceHook {
  /**
   * Start observing. `onScript` receives the location of every script whose
   * code ran; a hook may report as it goes or all at once on release().
   */
  install(onScript: (url: string) => void): TraceHookHandle;
}

/** True when any function of the script was entered since counting started. */
function hasExecuted(script: Profiler.ScriptCoverage): boolean {
  return script.functions.some((fn) => fn.ranges.some((range) => range.count > 0));
}

/**
 * Reports executed scripts through V8 precise coverage on an in-process
 * inspector session. Starting precise counting resets every call counter, so
 * a module loaded before install() is reported only if one of its functions
 * runs while the hook is installed. Counts are read once, on release().
 */
export class InspectorTraceHook implements TraceHook {
  install(onScript: (url: string) => void): TraceHookHandle {
    const session = new Session();
    session.connect();

    // Same-thread sessions dispatch synchronously; errors thrown from a
    // callback would only surface as process warnings, so they are collected.
    const failures: Error[] = [];
    const collect = (err: Error | null) => {
      if (err) failures.push(err);
    };
    const check = (step: string) => {
      const [failure] = failures;
      if (!failure) return;
      session.disconnect();
      throw new TracerStateError(`Inspector ${step} failed: ${failure.message}`, { cause: failure });
    };

    session.post("Profiler.enable", collect);
    session.post("Profiler.startPreciseCoverage", { callCount: true, detailed: false }, collect);
    check("coverage start");

    let released = false;
    return {
      release() {
        if (released) return;
        released = true;
        const scripts: Profiler.ScriptCoverage[] = [];
        session.post("Profiler.takePreciseCoverage", (err, params) => {
          if (err) failures.push(err);
          else scripts.push(...params.result);
        });
        session.post("Profiler.stopPreciseCoverage", collect);
        session.post("Profiler.disable", collect);
        check("coverage collection");
        session.disconnect();
        for (const script of scripts) {
          if (hasExecuted(script)) onScript(script.url);
        }
      },
    };
  }
}

/**
 * Records which source files run between start() and stop(). A tracer is
 * single-use: once stopped, create a new one.
 */
export class ExecutionTracer {
  private state: TracerState = "idle";
  private scripts: string[] = [];
  private handle: TraceHookHandle | null = null;

  constructor(private readonly hook: TraceHook = new InspectorTraceHook()) {}

  get current(): TracerState {
    return this.state;
  }

  start() {
    if (this.state !== "idle") {
      throw new TracerStateError(`Cannot start a tracer that is ${this.state}; create a new tracer instead`);
    }
    const scripts = this.scripts;
    this.handle = this.hook.install((url) => {
      scripts.push(url);
    });
    this.state = "recording";
  }

  stop() {
    if (this.state !== "recording") {
      throw new TracerStateError(`Cannot stop a tracer that is ${this.state}`);
    }
    this.state = "stopped";
    const handle = this.handle;
    this.handle = null;
    handle?.release();
  }

  /** Run `fn` with the hook installed; the hook is removed even when `fn` throws. */
  async trace<T>(fn: () => T | Promise<T>): Promise<T> {
    this.start();
    try {
      return await fn();
    } finally {
      this.stop();
    }
  }

  /** Absolute paths of the files that ran, deduplicated, in first-seen order. */
  executedFiles(): string[] {
    const files = new Set<string>();
    for (const url of this.scripts) {
      const file = scriptUrlToPath(url);
      if (file) files.add(file);
    }
    return [...files];
  }
}

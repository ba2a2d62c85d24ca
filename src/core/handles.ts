import fs from "fs";
import path from "path";
import { execFileSync } from "child_process";
import { logDebug, logWarn } from "@cli/utils/logger";
import type { HandleSourceMode } from "@core/types/config";

const DEFAULT_TIMEOUT_MS = 10_000;

export interface HandleSource {
  readonly name: string;
  /** Raw paths the process holds open or mapped; throws when the OS query fails. */
  list(pid: number): string[];
}

/** Parse `lsof -F tn` output, keeping names of regular files. */
export function parseLsofOutput(output: string): string[] {
  const files: string[] = [];
  let type: string | null = null;
  for (const line of output.split(/\r?\n/)) {
    if (!line) continue;
    const field = line[0];
    const value = line.slice(1);
    if (field === "p" || field === "f") {
      type = null;
    } else if (field === "t") {
      type = value;
    } else if (field === "n" && type === "REG" && path.isAbsolute(value)) {
      files.push(value);
    }
  }
  return files;
}

/** Pull file paths out of /proc/<pid>/maps; anonymous and pseudo mappings are skipped. */
export function parseProcMaps(maps: string): string[] {
  const files = new Set<string>();
  for (const line of maps.split("\n")) {
    // address perms offset dev inode pathname
    const match = /^\S+\s+\S+\s+\S+\s+\S+\s+(\d+)\s+(\/.*)$/.exec(line);
    if (!match) continue;
    const [, inode, file] = match;
    if (inode === "0" || file.endsWith(" (deleted)")) continue;
    files.add(file);
  }
  return [...files];
}

export class LsofHandleSource implements HandleSource {
  readonly name = "lsof";

  constructor(private readonly timeoutMs = DEFAULT_TIMEOUT_MS) {}

  list(pid: number): string[] {
    const output = execFileSync("lsof", ["-F", "tn", "-p", String(pid)], {
      encoding: "utf8",
      timeout: this.timeoutMs,
      maxBuffer: 64 * 1024 * 1024,
      stdio: ["ignore", "pipe", "ignore"],
    });
    return parseLsofOutput(output);
  }
}

/** Linux: descriptor links plus file-backed mappings (native add-ons are mapped, not held open). */
export class ProcfsHandleSource implements HandleSource {
  readonly name = "procfs";

  constructor(private readonly procRoot = "/proc") {}

  list(pid: number): string[] {
    const base = path.join(this.procRoot, String(pid));
    const fdDir = path.join(base, "fd");
    const files: string[] = [];
    for (const fd of fs.readdirSync(fdDir).sort((a, b) => Number(a) - Number(b))) {
      try {
        const target = fs.readlinkSync(path.join(fdDir, fd));
        if (path.isAbsolute(target)) files.push(target);
      } catch {
        // descriptor closed between readdir and readlink
        continue;
      }
    }
    files.push(...parseProcMaps(fs.readFileSync(path.join(base, "maps"), "utf8")));
    return files;
  }
}

export class NullHandleSource implements HandleSource {
  readonly name = "none";

  list(): string[] {
    return [];
  }
}

export function createHandleSource(mode: HandleSourceMode, pid = process.pid): HandleSource {
  switch (mode) {
    case "procfs":
      return new ProcfsHandleSource();
    case "lsof":
      return new LsofHandleSource();
    case "none":
      return new NullHandleSource();
    case "auto":
      return fs.existsSync(path.join("/proc", String(pid), "fd"))
        ? new ProcfsHandleSource()
        : new LsofHandleSource();
  }
}

/**
 * Lists the regular files a process has open. A failed query gives an empty
 * snapshot and a warning; discovery then relies on the tracer alone.
 */
export class OpenHandleSnapshotter {
  constructor(
    private readonly source: HandleSource,
    private readonly pid = process.pid
  ) {}

  get sourceName(): string {
    return this.source.name;
  }

  snapshot(): Set<string> {
    let raw: string[];
    try {
      raw = this.source.list(this.pid);
    } catch (err) {
      logWarn(
        `Open file snapshot via ${this.source.name} failed, continuing with traced files only: ${
          err instanceof Error ? err.message : String(err)
        }`
      );
      return new Set();
    }

    const files = new Set<string>();
    for (const entry of raw) {
      try {
        if (fs.statSync(entry).isFile()) files.add(entry);
      } catch {
        logDebug(`Ignoring vanished handle ${entry}`);
      }
    }
    return files;
  }
}

/** Files present in `final` but not in `baseline`. */
export function diffSnapshots(baseline: ReadonlySet<string>, final: ReadonlySet<string>): Set<string> {
  const opened = new Set<string>();
  for (const file of final) {
    if (!baseline.has(file)) opened.add(file);
  }
  return opened;
}

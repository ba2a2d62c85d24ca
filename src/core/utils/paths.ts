import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";

export function expandHome(p: string): string {
  if (p === "~" || p.startsWith("~/") || p.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

/** Expand `~` and resolve symbolic links; null when the target does not exist. */
export function expand(p: string): string | null {
  try {
    return fs.realpathSync(path.resolve(expandHome(p)));
  } catch {
    return null;
  }
}

/** Like expand(), but keeps the absolute path when it does not exist yet (output dirs). */
export function expandLexical(p: string): string {
  return expand(p) ?? path.resolve(expandHome(p));
}

/** True when `child` is `parent` itself or sits beneath it, on whole segments. */
export function isWithin(child: string, parent: string): boolean {
  if (child === parent) return true;
  const prefix = parent.endsWith(path.sep) ? parent : parent + path.sep;
  return child.startsWith(prefix);
}

export function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/**
 * Turn a script location reported by V8 into an absolute path.
 * CommonJS scripts report plain paths, ES modules `file:` URLs;
 * built-ins (`node:`), eval'd code and anything else yield null.
 */
export function scriptUrlToPath(url: string): string | null {
  if (!url) return null;
  if (url.startsWith("file:")) {
    try {
      return fileURLToPath(url);
    } catch {
      return null;
    }
  }
  return path.isAbsolute(url) ? url : null;
}

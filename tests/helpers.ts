import fs from "fs";
import os from "os";
import path from "path";
import type { Unit, UnitIndex } from "../src/core/types/bundle";

export function unit(name: string, root: string, slot = path.basename(root)): Unit {
  return { name, root, slot };
}

export function indexOf(...units: Unit[]): UnitIndex {
  return new Map(units.map((u) => [u.name, u]));
}

/** Temp directory with symlinks resolved, so paths compare equal to realpath output. */
export function makeTempDir(prefix: string): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function writeFile(root: string, relative: string, content = ""): string {
  const full = path.join(root, relative);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
  return full;
}

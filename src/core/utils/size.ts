import fs from "fs";
import path from "path";

/** Size of a file, or the recursive size of a directory; links are not followed. */
export function measure(target: string): number {
  const stat = fs.lstatSync(target);
  if (!stat.isDirectory()) return stat.size;
  let total = 0;
  for (const entry of fs.readdirSync(target)) {
    total += measure(path.join(target, entry));
  }
  return total;
}

export function formatBytes(bytes: number): string {
  return `${(bytes / 1e6).toFixed(2)}mb`;
}

import path from "path";
import type { Unit, UnitIndex } from "@core/types/bundle";

/**
 * Finds the unit owning a file: the one whose root is the longest
 * whole-segment prefix of the path. Lookup walks the path's ancestors from
 * the file upward, so the first root hit is the most specific one.
 */
export class UnitLookup {
  private byRoot = new Map<string, Unit>();

  constructor(index: UnitIndex) {
    for (const unit of index.values()) {
      const current = this.byRoot.get(unit.root);
      // Two names on one root: keep the lexicographically smaller for stable output.
      if (!current || unit.name < current.name) {
        this.byRoot.set(unit.root, unit);
      }
    }
  }

  get size(): number {
    return this.byRoot.size;
  }

  owner(filePath: string): Unit | null {
    let current = path.resolve(filePath);
    for (;;) {
      const unit = this.byRoot.get(current);
      if (unit) return unit;
      const parent = path.dirname(current);
      if (parent === current) return null;
      current = parent;
    }
  }

  roots(): string[] {
    return [...this.byRoot.keys()].sort();
  }
}

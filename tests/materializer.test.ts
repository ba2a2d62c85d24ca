import fs from "fs";
import path from "path";
import { createRequire } from "module";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createClassifyContext } from "../src/core/classifier";
import { assertNoCollisions, buildList, collectTouched, materialize, MANIFEST_FILE } from "../src/core/materializer";
import { CopyError, DestinationCollisionError } from "../src/core/errors";
import type { BundleEntry, BundleManifest } from "../src/core/types/bundle";
import { indexOf, makeTempDir, unit, writeFile } from "./helpers";

describe("bundle list", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("tracepack-list-");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("maps a single executed file of a third-party unit", () => {
    const mod = writeFile(root, "a/pkg/mod.js", "module.exports = {};\n");
    const context = createClassifyContext(indexOf(unit("pkg", path.join(root, "a", "pkg"))));
    const list = buildList({ executed: [mod], opened: [] }, context);
    expect(list.entries.map((e) => [e.source, e.destination])).toEqual([[mod, "pkg/mod.js"]]);
  });

  it("lists a file that was both executed and opened once", () => {
    const mod = writeFile(root, "a/pkg/mod.js", "x");
    const context = createClassifyContext(indexOf(unit("pkg", path.join(root, "a", "pkg"))));
    const list = buildList({ executed: [mod], opened: [mod] }, context);
    expect(list.entries).toHaveLength(1);
    expect(list.entries[0]?.origins).toEqual(["executed", "opened"]);
  });

  it("never lists files of built-in units", () => {
    const builtinFile = writeFile(root, "dist/npm/index.js", "npm");
    const thirdParty = writeFile(root, "app/node_modules/alpha/index.js", "alpha");
    const index = indexOf(
      unit("npm", path.join(root, "dist", "npm")),
      unit("alpha", path.join(root, "app", "node_modules", "alpha"))
    );
    const context = createClassifyContext(index, { builtins: ["npm"] });
    const list = buildList({ executed: [builtinFile, thirdParty], opened: [] }, context);
    expect(list.entries.map((e) => e.source)).toEqual([thirdParty]);
  });

  it("collapses symlinks onto their targets and skips dangling ones", () => {
    const real = writeFile(root, "a/pkg/real.js", "r");
    const link = path.join(root, "link.js");
    fs.symlinkSync(real, link);
    const dangling = path.join(root, "dangling.js");
    fs.symlinkSync(path.join(root, "nowhere.js"), dangling);

    const { touched, skipped } = collectTouched({ executed: [link], opened: [real, dangling] });
    expect(touched.map((t) => t.path)).toEqual([real]);
    expect([...(touched[0]?.origins ?? [])].sort()).toEqual(["executed", "opened"]);
    expect(skipped).toEqual([dangling]);
  });

  it("adds the package.json files Node reads to load a kept file", () => {
    const beta = path.join(root, "node_modules", "beta");
    const manifest = writeFile(beta, "package.json", JSON.stringify({ name: "beta", main: "lib/main.js" }));
    const nested = writeFile(beta, "lib/package.json", JSON.stringify({ type: "commonjs" }));
    const main = writeFile(beta, "lib/main.js", "exports.greet = () => 'hi from beta';\n");
    writeFile(beta, "lib/unused.js", "exports.unused = true;\n");
    const context = createClassifyContext(indexOf(unit("beta", beta)));

    const list = buildList({ executed: [main], opened: [] }, context);
    expect(list.entries.map((e) => [e.destination, e.origins])).toEqual([
      ["beta/lib/main.js", ["executed"]],
      ["beta/lib/package.json", ["manifest"]],
      ["beta/package.json", ["manifest"]],
    ]);
    expect(list.entries.map((e) => e.source)).toEqual([main, nested, manifest]);

    const out = path.join(root, "out");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    materialize(list.entries, out, { onProgress: () => undefined });
    const load = createRequire(path.join(out, "index.js"));
    const loaded: unknown = load(path.join(out, "beta"));
    const greet: unknown = loaded && typeof loaded === "object" ? Reflect.get(loaded, "greet") : undefined;
    expect(typeof greet === "function" ? greet() : undefined).toBe("hi from beta");
    expect(fs.existsSync(path.join(out, "beta", "lib", "unused.js"))).toBe(false);
  });

  it("does not add manifests for built-in units or unowned files", () => {
    const npmRoot = path.join(root, "dist", "npm");
    writeFile(npmRoot, "package.json", JSON.stringify({ name: "npm" }));
    const npmMain = writeFile(npmRoot, "index.js", "npm");
    writeFile(root, "loose/package.json", "{}");
    const loose = writeFile(root, "loose/tool.js", "tool");
    const context = createClassifyContext(indexOf(unit("npm", npmRoot)), { builtins: ["npm"] });

    const list = buildList({ executed: [npmMain, loose], opened: [] }, context);
    expect(list.entries.map((e) => e.destination)).toEqual(["lib/tool.js"]);
  });

  it("tallies bytes per unit and for unowned files", () => {
    const one = writeFile(root, "a/pkg/one.js", "12345");
    const two = writeFile(root, "a/pkg/two.js", "123");
    const loose = writeFile(root, "native/libx.so", "1234567");
    const context = createClassifyContext(indexOf(unit("pkg", path.join(root, "a", "pkg"))));
    const list = buildList({ executed: [one, two], opened: [loose] }, context);
    expect(Object.fromEntries(list.ledger)).toEqual({ pkg: 8, lib: 7 });
    expect(list.entries.find((e) => e.source === loose)).toMatchObject({ destination: "lib/libx.so", unit: null });
  });

  it("treats a touched unit directory as one directory entry", () => {
    writeFile(root, "a/pkg/one.js", "12");
    writeFile(root, "a/pkg/sub/two.js", "345");
    const pkg = path.join(root, "a", "pkg");
    const context = createClassifyContext(indexOf(unit("pkg", pkg)));
    const list = buildList({ executed: [], opened: [pkg] }, context);
    expect(list.entries).toEqual([
      { source: pkg, destination: "pkg", unit: "pkg", kind: "directory", size: 5, origins: ["opened"] },
    ]);
  });
});

describe("materialize", () => {
  let root: string;
  let out: string;

  const entry = (source: string, destination: string, overrides: Partial<BundleEntry> = {}): BundleEntry => ({
    source,
    destination,
    unit: destination.split("/")[0] ?? null,
    kind: "file",
    size: fs.existsSync(source) ? fs.statSync(source).size : 0,
    origins: ["executed"],
    ...overrides,
  });

  beforeEach(() => {
    root = makeTempDir("tracepack-materialize-");
    out = path.join(root, "out");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("copies files under their destinations, creating parents", () => {
    const a = writeFile(root, "src/pkg/a.js", "alpha");
    const b = writeFile(root, "src/pkg/deep/b.js", "beta");
    const report = materialize([entry(a, "pkg/a.js"), entry(b, "pkg/deep/b.js")], out);
    expect(fs.readFileSync(path.join(out, "pkg", "a.js"), "utf8")).toBe("alpha");
    expect(fs.readFileSync(path.join(out, "pkg", "deep", "b.js"), "utf8")).toBe("beta");
    expect(report).toEqual({ outputRoot: out, files: 2, bytes: 9, manifestPath: null });
  });

  it("copies directory entries recursively", () => {
    writeFile(root, "src/pkg/one.js", "1");
    writeFile(root, "src/pkg/nested/two.js", "2");
    const pkg = path.join(root, "src", "pkg");
    materialize([entry(pkg, "pkg", { kind: "directory", size: 2 })], out);
    expect(fs.readFileSync(path.join(out, "pkg", "nested", "two.js"), "utf8")).toBe("2");
  });

  it("reports progress for every entry", () => {
    const a = writeFile(root, "src/pkg/a.js", "a");
    const b = writeFile(root, "src/pkg/b.js", "b");
    const lines: string[] = [];
    materialize([entry(a, "pkg/a.js"), entry(b, "pkg/b.js")], out, {
      onProgress: (i, total, e) => lines.push(`copying ${i}/${total}: ${e.destination}`),
    });
    expect(lines).toEqual(["copying 1/2: pkg/a.js", "copying 2/2: pkg/b.js"]);
  });

  it("copies a source listed twice only once", () => {
    const a = writeFile(root, "src/pkg/a.js", "a");
    const report = materialize([entry(a, "pkg/a.js"), entry(a, "pkg/a.js", { origins: ["opened"] })], out);
    expect(report.files).toBe(1);
    expect(report.bytes).toBe(1);
  });

  it("refuses to write when two sources share a destination", () => {
    const first = writeFile(root, "one/util.js", "1");
    const second = writeFile(root, "two/util.js", "2");
    const early = writeFile(root, "src/pkg/a.js", "a");
    expect(() =>
      materialize([entry(early, "pkg/a.js"), entry(first, "lib/util.js"), entry(second, "lib/util.js")], out)
    ).toThrow(DestinationCollisionError);
    expect(fs.existsSync(out)).toBe(false);
  });

  it("names both sources of a collision", () => {
    try {
      assertNoCollisions([entry("/x/util.js", "lib/util.js"), entry("/y/util.js", "lib/util.js")]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DestinationCollisionError);
      expect(err instanceof DestinationCollisionError ? err.sources : []).toEqual(["/x/util.js", "/y/util.js"]);
    }
  });

  it("stops at the first failing copy", () => {
    const a = writeFile(root, "src/pkg/a.js", "a");
    const c = writeFile(root, "src/pkg/c.js", "c");
    const missing = path.join(root, "src", "pkg", "gone.js");
    expect(() => materialize([entry(a, "pkg/a.js"), entry(missing, "pkg/gone.js"), entry(c, "pkg/c.js")], out)).toThrow(
      CopyError
    );
    expect(fs.existsSync(path.join(out, "pkg", "a.js"))).toBe(true);
    expect(fs.existsSync(path.join(out, "pkg", "c.js"))).toBe(false);
  });

  it("writes nothing on a dry run", () => {
    const a = writeFile(root, "src/pkg/a.js", "a");
    const report = materialize([entry(a, "pkg/a.js")], out, {
      dryRun: true,
      manifest: { builtins: [], ledger: {} },
    });
    expect(report.files).toBe(1);
    expect(report.manifestPath).toBeNull();
    expect(fs.existsSync(out)).toBe(false);
  });

  it("writes a manifest beside the bundle", () => {
    const a = writeFile(root, "src/pkg/a.js", "abc");
    const report = materialize([entry(a, "pkg/a.js")], out, {
      manifest: { builtins: ["npm"], ledger: { pkg: 3 } },
    });
    expect(report.manifestPath).toBe(path.join(out, MANIFEST_FILE));
    const manifest: BundleManifest = JSON.parse(fs.readFileSync(path.join(out, MANIFEST_FILE), "utf8"));
    expect(manifest.version).toBe(1);
    expect(manifest.totalBytes).toBe(3);
    expect(manifest.builtins).toEqual(["npm"]);
    expect(manifest.ledger).toEqual({ pkg: 3 });
    expect(manifest.entries.map((e) => e.destination)).toEqual(["pkg/a.js"]);
  });
});

import { Command } from "commander";
import { logError } from "./utils/logger";
import { runPackCommand } from "./commands/pack";
import { runUnitsCommand } from "./commands/units";

const program = new Command();

const collect = (value: string, previous: string[] = []) => [...previous, value];

program
  .name("tracepack")
  .description("Trace a Node.js program and bundle the third-party files it actually touched")
  .version("0.1.0");

program
  .command("pack")
  .description("Run an entry under trace and copy its dependencies into a bundle directory")
  .argument("<entry>", "Entry module to import while tracing")
  .argument("[args...]", "Arguments exposed to the entry through process.argv")
  .option("-o, --out-dir <dir>", "Output directory (default: tracepack_build)")
  .option("--exclude-unit <name>", "Unit to leave out of the bundle (repeatable)", collect)
  .option("--exclude-file <glob>", "File name pattern to leave out (repeatable)", collect)
  .option("--handles <mode>", "Open file listing: auto, procfs, lsof or none")
  .option("--call <export>", "Exported function to await after importing the entry")
  .option("--dry-run", "Report what would be copied without writing")
  .option("--no-manifest", "Do not write tracepack.manifest.json")
  .option("--json", "Print the bundle list as JSON instead of copying")
  .action(async (entry: string, args: string[], options) => {
    try {
      await runPackCommand(entry, {
        outDir: options.outDir,
        excludeUnit: options.excludeUnit,
        excludeFile: options.excludeFile,
        handles: options.handles,
        call: options.call,
        args,
        dryRun: !!options.dryRun,
        manifest: options.manifest === false ? false : undefined,
        json: !!options.json,
      });
    } catch (err) {
      logError("Pack failed", err);
      process.exit(1);
    }
  });

program
  .command("units")
  .description("List the installed units and which of them count as built-in")
  .option("--json", "Output summary as JSON")
  .option("-l, --limit <count>", "Limit list outputs", "10")
  .action(async (options) => {
    try {
      const limit = parseInt(options.limit ?? "10", 10);
      await runUnitsCommand({ json: !!options.json, limit: Number.isFinite(limit) ? limit : 10 });
    } catch (err) {
      logError("Listing units failed", err);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logError("tracepack failed", err);
  process.exit(1);
});

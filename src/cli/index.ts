import { Command } from "commander";

import type { MatrixMode } from "../app/matrix/run-matrix.js";

import { formatIndexCommand } from "./format-index.js";
import { addDeterminismOptions, addToolchainOptions, addVersionOptions } from "./options.js";
import { runCommand, type RunCommandDeps } from "./run.js";

export function buildCli(deps: RunCommandDeps = {}): Command {
  const program = new Command();

  program
    .name("buildmatrix")
    .description("Build and test a matrix of external projects against a compiler under test")
    .version("0.1.0");

  const runMode = async (mode: MatrixMode, opts: Record<string, unknown>): Promise<void> => {
    const outcome = await runCommand(mode, opts, deps);
    process.exitCode = outcome.exitCode;
  };

  const run = program
    .command("run")
    .description("Check out, build and test every selected project version and action");
  addVersionOptions(addToolchainOptions(run)).action(async (opts: Record<string, unknown>) => {
    await runMode("compat", opts);
  });

  const incremental = program
    .command("incremental")
    .description("Build each project's commit sequences incrementally and check determinism");
  addDeterminismOptions(addToolchainOptions(incremental)).action(async (opts: Record<string, unknown>) => {
    await runMode("incremental", opts);
  });

  program
    .command("format-index")
    .description("Validate a project index, sort it by path and rewrite it")
    .argument("<path>", "Project index (JSON)")
    .option("--check", "Report an unformatted index without rewriting it", false)
    .option("--debug", "Show stack traces and error causes")
    .action(async (indexPath: string, opts: { check: boolean }) => {
      const result = await formatIndexCommand(indexPath, { check: opts.check });
      if (opts.check && result.changed) {
        process.exitCode = 1;
      }
    });

  return program;
}

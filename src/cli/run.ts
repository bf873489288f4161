import { TimeReporter } from "../app/matrix/build-tool/time-reporter.js";
import type { Reporter } from "../app/matrix/ports.js";
import { createDefaultPorts, createRunContext } from "../app/matrix/run-context.js";
import { runMatrix, type MatrixMode, type MatrixRunOutcome } from "../app/matrix/run-matrix.js";
import { CommandRunner, type ProcessLauncher } from "../core/command-runner.js";
import { resolveMatrixConfig } from "../core/config.js";
import { openRunEventLog } from "../core/logger.js";
import { loadProjectIndex } from "../core/project-index.js";
import type { PlatformName } from "../core/utils.js";

import { toConfigOverrides } from "./options.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

export type RunCommandDeps = {
  launcher?: ProcessLauncher;
  platform?: PlatformName;
  reporter?: Reporter;
  runId?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export async function runCommand(
  mode: MatrixMode,
  opts: Record<string, unknown>,
  deps: RunCommandDeps = {},
): Promise<MatrixRunOutcome> {
  const config = resolveMatrixConfig({
    overrides: toConfigOverrides(opts),
    configPath: typeof opts.config === "string" ? opts.config : undefined,
    env: deps.env,
    cwd: deps.cwd,
  });
  const index = loadProjectIndex(config.projects);
  const ctx = createRunContext(config, { runId: deps.runId, platform: deps.platform });

  const events = openRunEventLog(config.log_dir, ctx.runId);
  const runner = new CommandRunner({
    defaultTimeoutMs: config.default_timeout * 1000,
    defaultMaxRetries: config.max_retries,
    launcher: deps.launcher,
  });
  const timeReporter = config.report_time_path ? new TimeReporter(config.report_time_path) : undefined;
  const ports = createDefaultPorts(ctx, { runner, events, timeReporter, reporter: deps.reporter });

  const stopHandler = createRunStopSignalHandler({
    onSignal: (signal) => console.error(`Received ${signal}; stopping the run.`),
  });

  try {
    const outcome = await runMatrix({ ctx, ports, index, mode, signal: stopHandler.signal });
    await timeReporter?.write();
    return outcome;
  } finally {
    stopHandler.cleanup();
    events.close();
  }
}

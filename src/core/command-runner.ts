/*
Purpose: run external commands with a deadline and bounded retries, logging every attempt.
Assumptions: output is streamed straight into the leaf log descriptor; callers classify
  CommandFailure, everything else propagates.
Usage: await runner.run(["swift", "build"], { log, cwd, timeoutMs: 3_600_000 });
*/

import { execa } from "execa";

import { CommandFailure, RunAbortedError } from "./errors.js";
import type { CommandLog } from "./leaf-log.js";
import { shellJoin } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

/** Exit status reported for a command killed at its deadline. */
export const TIMEOUT_EXIT_STATUS = 124;

export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

const FORCE_KILL_AFTER_MS = 5_000;

export type LaunchRequest = {
  command: readonly string[];
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Descriptor receiving stderr, and stdout unless it is captured. */
  logFd: number;
  captureStdout: boolean;
};

export type LaunchOutcome = {
  exitCode: number;
  timedOut: boolean;
  canceled: boolean;
  stdout: string;
};

/** Spawns one process and waits for it. Swapped out in tests. */
export type ProcessLauncher = (request: LaunchRequest) => Promise<LaunchOutcome>;

export type RunCommandOptions = {
  log: CommandLog;
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  /** Total attempts, at least one. */
  maxRetries?: number;
  signal?: AbortSignal;
};

export type CommandRunnerOptions = {
  defaultTimeoutMs?: number;
  defaultMaxRetries?: number;
  launcher?: ProcessLauncher;
};

// =============================================================================
// RUNNER
// =============================================================================

export class CommandRunner {
  readonly defaultTimeoutMs: number;
  private readonly defaultMaxRetries: number;
  private readonly launcher: ProcessLauncher;

  constructor(options: CommandRunnerOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxRetries = options.defaultMaxRetries ?? 1;
    this.launcher = options.launcher ?? execaLauncher;
  }

  /** Resolves with 0 once an attempt succeeds; throws CommandFailure when retries run out. */
  async run(command: readonly string[], options: RunCommandOptions): Promise<number> {
    const attempts = Math.max(1, options.maxRetries ?? this.defaultMaxRetries);
    let last: LaunchOutcome | undefined;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      last = await this.attempt(command, options, attempt, attempts, false);
      if (last.exitCode === 0) {
        return 0;
      }
    }

    throw failureFrom(command, last);
  }

  /** Single attempt with stdout captured; stderr still goes to the log. */
  async output(command: readonly string[], options: RunCommandOptions): Promise<string> {
    const outcome = await this.attempt(command, options, 1, 1, true);
    if (outcome.exitCode !== 0) {
      throw failureFrom(command, outcome);
    }
    return outcome.stdout;
  }

  private async attempt(
    command: readonly string[],
    options: RunCommandOptions,
    attempt: number,
    attempts: number,
    captureStdout: boolean,
  ): Promise<LaunchOutcome> {
    if (options.signal?.aborted) {
      throw new RunAbortedError(`Run aborted before: ${shellJoin(command)}`);
    }

    const { log } = options;
    const suffix = attempts > 1 ? `  # attempt ${attempt}/${attempts}` : "";
    log.write(`$ ${shellJoin(command)}${suffix}`);

    const outcome = await this.launcher({
      command,
      cwd: options.cwd,
      env: options.env,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
      signal: options.signal,
      logFd: log.fd,
      captureStdout,
    });

    if (outcome.canceled) {
      log.write(`${command[0]}: Canceled`);
      throw new RunAbortedError(`Run aborted during: ${shellJoin(command)}`);
    }
    if (outcome.timedOut) {
      log.write(`${command[0]}: Timed out`);
    } else if (outcome.exitCode !== 0) {
      log.write(`${command[0]}: Exited with ${outcome.exitCode}`);
    }

    return outcome;
  }
}

// =============================================================================
// DEFAULT LAUNCHER
// =============================================================================

export const execaLauncher: ProcessLauncher = async (request) => {
  const [file, ...args] = request.command;
  const res = await execa(file, args, {
    cwd: request.cwd,
    env: request.env,
    extendEnv: true,
    stdin: "ignore",
    stdout: request.captureStdout ? "pipe" : request.logFd,
    stderr: request.logFd,
    timeout: request.timeoutMs,
    killSignal: "SIGTERM",
    forceKillAfterTimeout: FORCE_KILL_AFTER_MS,
    signal: request.signal,
    reject: false,
  });

  const stdout = typeof res.stdout === "string" ? res.stdout : String(res.stdout ?? "");
  return {
    exitCode: res.timedOut ? TIMEOUT_EXIT_STATUS : res.exitCode ?? -1,
    timedOut: res.timedOut,
    canceled: res.isCanceled,
    stdout,
  };
};

// =============================================================================
// INTERNALS
// =============================================================================

function failureFrom(command: readonly string[], outcome: LaunchOutcome | undefined): CommandFailure {
  if (!outcome) {
    return new CommandFailure(command, -1);
  }
  return new CommandFailure(command, outcome.exitCode, outcome.timedOut);
}

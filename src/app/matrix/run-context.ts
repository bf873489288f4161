/**
 * RunContext + default adapters for matrix runs.
 * Purpose: hold run-wide settings (branch, job type, platform, filters) in one immutable value
 *   built before any worker starts, so nothing below reads global state.
 * Usage: const ctx = createRunContext(config); const ports = createDefaultPorts(ctx, { runner, events });
 */

import { setTimeout as delay } from "node:timers/promises";

import type { CommandRunner } from "../../core/command-runner.js";
import type { MatrixConfig } from "../../core/config.js";
import type { EventSink } from "../../core/logger.js";
import { compilePredicates, type Predicate } from "../../core/predicate.js";
import { defaultRunId, hostPlatformName, type PlatformName } from "../../core/utils.js";

import { SwiftBuildTool } from "./build-tool/swift-build-tool.js";
import type { TimeReporter } from "./build-tool/time-reporter.js";
import type { MatrixPorts, Reporter } from "./ports.js";
import { GitVcs } from "./vcs/git-vcs.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunFilters = {
  includeRepos: readonly Predicate[];
  excludeRepos: readonly Predicate[];
  includeVersions: readonly Predicate[];
  excludeVersions: readonly Predicate[];
  includeActions: readonly Predicate[];
  excludeActions: readonly Predicate[];
};

export type RunContext = Readonly<{
  runId: string;
  config: MatrixConfig;
  platform: PlatformName;
  filters: RunFilters;
}>;

export type RunContextOptions = {
  runId?: string;
  platform?: PlatformName;
};

// =============================================================================
// CONTEXT
// =============================================================================

/** Compiles every predicate up front, so syntax errors abort before any checkout. */
export function createRunContext(config: MatrixConfig, opts: RunContextOptions = {}): RunContext {
  const filters: RunFilters = {
    includeRepos: compilePredicates(config.include_repos),
    excludeRepos: compilePredicates(config.exclude_repos),
    includeVersions: compilePredicates(config.include_versions),
    excludeVersions: compilePredicates(config.exclude_versions),
    includeActions: compilePredicates(config.include_actions),
    excludeActions: compilePredicates(config.exclude_actions),
  };

  return Object.freeze({
    runId: opts.runId ?? defaultRunId(),
    config,
    platform: opts.platform ?? hostPlatformName(),
    filters: Object.freeze(filters),
  });
}

// =============================================================================
// DEFAULT PORTS
// =============================================================================

export function createDefaultPorts(
  ctx: RunContext,
  deps: { runner: CommandRunner; events: EventSink; timeReporter?: TimeReporter; reporter?: Reporter },
): MatrixPorts {
  const { config } = ctx;

  return {
    vcs: new GitVcs({ runner: deps.runner, platform: ctx.platform }),
    buildTool: new SwiftBuildTool({
      runner: deps.runner,
      platform: ctx.platform,
      swiftc: config.swiftc,
      swiftBranch: config.swift_branch,
      buildConfig: config.build_config,
      sandboxProfileXcodebuild: config.sandbox_profile_xcodebuild,
      sandboxProfilePackage: config.sandbox_profile_package,
      addedSwiftFlags: config.add_swift_flags,
      addedXcodebuildFlags: config.add_xcodebuild_flags,
      overrideSwiftExec: config.override_swift_exec,
      timeReporter: deps.timeReporter,
      maxRetries: config.max_retries,
    }),
    events: deps.events,
    reporter: deps.reporter ?? { line: (text) => console.log(text) },
    clock: { sleep: async (ms) => delay(ms) },
  };
}

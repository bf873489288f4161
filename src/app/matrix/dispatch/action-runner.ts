/**
 * Leaf of the dispatch tree: one action of one project version.
 * Purpose: check out, build or test, and classify the outcome against xfail rules.
 * Assumptions: only CommandFailure is classified; any other error escapes to the worker pool.
 * Usage: await runCompatAction(env, { project, version, action })
 */

import path from "node:path";

import { formatErrorMessage } from "../../../core/error-format.js";
import { CommandFailure, ConfigError } from "../../../core/errors.js";
import { LeafLog, leafLogName, type LeafLogNameParts } from "../../../core/leaf-log.js";
import { logActionResult } from "../../../core/logger.js";
import {
  assertCommitRevision,
  latestVersionLabel,
  type ProjectAction,
  type ProjectEntry,
  type ProjectVersion,
} from "../../../core/project-index.js";
import { actionResult, type ActionResult } from "../../../core/result.js";
import { resolveXfail, type XfailContext } from "../../../core/xfail.js";

import { actionTargetName } from "../build-tool/build-tool.js";
import type { MatrixPorts } from "../ports.js";
import type { RunContext } from "../run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type DispatchEnv = {
  ctx: RunContext;
  ports: MatrixPorts;
  signal?: AbortSignal;
};

export type CompatLeaf = {
  project: ProjectEntry;
  version: ProjectVersion;
  action: ProjectAction;
};

// =============================================================================
// LEAF
// =============================================================================

/** Returns null when the leaf is skipped; its log is then removed. */
export async function runCompatAction(env: DispatchEnv, leaf: CompatLeaf): Promise<ActionResult | null> {
  const { project, version, action } = leaf;
  const log = openLeafLog(env.ctx, {
    projectPath: project.path,
    actionProject: action.project,
    version: version.version,
    action: action.action,
    schemeOrTarget: actionTargetName(action),
    destination: action.destination,
  });

  let result: ActionResult | null;
  try {
    result = await executeLeaf(env, leaf, log);
  } catch (err) {
    await abandonLeafLog(log, err);
    throw err;
  }

  await log.finish(result?.kind ?? null);
  if (result) {
    reportLeaf(env, project, result, { version: version.version, action: action.action });
  }
  return result;
}

async function executeLeaf(
  env: DispatchEnv,
  leaf: CompatLeaf,
  log: LeafLog,
): Promise<ActionResult | null> {
  const { ctx, ports, signal } = env;
  const { project, version, action } = leaf;

  if (ctx.config.only_latest_versions && version.version !== latestVersionLabel(project)) {
    return null;
  }

  assertCommitRevision(version.commit, `${project.path} ${version.version}`);
  const issue = resolveXfail(action.xfail, xfailContext(ctx, action, version.version));
  const identifier = compatIdentifier(leaf);
  const projectDir = projectCheckoutDir(ctx, project);

  try {
    await ports.vcs.checkoutRevision({
      project,
      projectDir,
      commit: version.commit,
      incremental: ctx.config.skip_clean,
      log,
      signal,
    });
  } catch (err) {
    if (!(err instanceof CommandFailure)) throw err;
    log.write(err.message);
    return actionResult("FAIL", `FAIL: ${identifier}`);
  }

  try {
    await ports.buildTool.dispatch({
      project,
      action,
      projectDir,
      swiftVersion: ctx.config.swift_version ?? version.version,
      incremental: ctx.config.skip_clean,
      stripResourcePhases: ctx.config.strip_resource_phases,
      log,
      signal,
    });
  } catch (err) {
    if (!(err instanceof CommandFailure)) throw err;
    log.write(err.message);
    return classifyLeaf(identifier, false, issue);
  }

  return classifyLeaf(identifier, true, issue);
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Success is PASS, or UPASS when an xfail rule matched; a failed command is FAIL, or
 * XFAIL when a rule matched. Expected outcomes carry the issue id first.
 */
export function classifyLeaf(identifier: string, succeeded: boolean, issue: string | null): ActionResult {
  if (issue === null) {
    return succeeded
      ? actionResult("PASS", `PASS: ${identifier}`)
      : actionResult("FAIL", `FAIL: ${identifier}`);
  }
  return succeeded
    ? actionResult("UPASS", `UPASS: ${issue}, ${identifier}`)
    : actionResult("XFAIL", `XFAIL: ${issue}, ${identifier}`);
}

export function xfailContext(ctx: RunContext, action: ProjectAction, compatibility: string): XfailContext {
  return {
    compatibility,
    branch: ctx.config.swift_branch,
    platform: ctx.platform,
    job: ctx.config.job_type,
    configuration: ctx.config.build_config ?? action.configuration,
  };
}

// `<path>, <version>, <commit[0..6]>, <scheme|target|Swift Package>[, <destination>]`
export function compatIdentifier(leaf: CompatLeaf): string {
  const { project, version, action } = leaf;
  const parts = [
    project.path,
    version.version,
    version.commit.slice(0, 6),
    actionTargetName(action) ?? "Swift Package",
  ];
  if (action.destination) parts.push(action.destination);
  return parts.join(", ");
}

// =============================================================================
// HELPERS
// =============================================================================

export function projectCheckoutDir(ctx: RunContext, project: ProjectEntry): string {
  return path.join(ctx.config.project_cache_path, project.path);
}

export function openLeafLog(ctx: RunContext, parts: LeafLogNameParts): LeafLog {
  return ctx.config.verbose ? LeafLog.stdout() : LeafLog.open(ctx.config.log_dir, leafLogName(parts));
}

/**
 * Records an error that escaped a leaf. The worker pool turns it into a FAIL leaf, so the log is
 * renamed to match; a ConfigError aborts the run instead and the log keeps its bare name.
 */
export async function abandonLeafLog(log: LeafLog, err: unknown): Promise<void> {
  log.write(`error: ${formatErrorMessage(err)}`);
  if (err instanceof ConfigError) {
    log.close();
    return;
  }
  await log.finish("FAIL");
}

export function reportLeaf(
  env: DispatchEnv,
  project: ProjectEntry,
  result: ActionResult,
  details: { version?: string; action: string },
): void {
  env.ports.reporter.line(result.message);
  logActionResult(env.ports.events, {
    project: project.path,
    action: details.action,
    version: details.version,
    kind: result.kind,
    message: result.message,
  });
}

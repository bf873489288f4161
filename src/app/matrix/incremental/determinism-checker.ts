/**
 * Incremental determinism check for one action over each of the project's commit sequences.
 * Purpose: build c0 from scratch, then each later commit incrementally, optionally proving that
 *   every incremental build state matches a full build of the same commit.
 * Assumptions: the build tool reports its state directory; a checkout or build that does not
 *   come out PASS or XFAIL ends the action early with that result.
 * Usage: await runIncrementalProject(env, project) as the project runner of the project list.
 */

import path from "node:path";

import { CommandFailure } from "../../../core/errors.js";
import type { LeafLog } from "../../../core/leaf-log.js";
import { logMatrixEvent } from "../../../core/logger.js";
import { included } from "../../../core/predicate.js";
import {
  assertCommitRevision,
  type IncrementalSequence,
  type ProjectAction,
  type ProjectEntry,
} from "../../../core/project-index.js";
import { actionResult, resultKind, type ActionResult, type Result } from "../../../core/result.js";
import { resolveXfail } from "../../../core/xfail.js";

import { actionTargetName } from "../build-tool/build-tool.js";
import {
  abandonLeafLog,
  classifyLeaf,
  openLeafLog,
  projectCheckoutDir,
  reportLeaf,
  xfailContext,
  type DispatchEnv,
} from "../dispatch/action-runner.js";
import { runLevel } from "../dispatch/dispatch-tree.js";

import { SnapshotStore, snapshotName, type SnapshotKey } from "./snapshot-store.js";
import { diffTrees, formatDifference } from "./tree-diff.js";

// =============================================================================
// TYPES
// =============================================================================

type CheckState = "full-build" | "incremental-build" | "verify";

/** `stop` ends the action's remaining sequences. */
type StepOutcome = { stop: boolean; result: ActionResult };

type SequenceRun = {
  env: DispatchEnv;
  project: ProjectEntry;
  action: ProjectAction;
  label: string;
  projectDir: string;
  buildState: string;
  store: SnapshotStore;
  log: LeafLog;
  issue: string | null;
};

// =============================================================================
// PROJECT LEVEL
// =============================================================================

export async function runIncrementalProject(env: DispatchEnv, project: ProjectEntry): Promise<Result> {
  logMatrixEvent(env.ports.events, "project.start", { project: project.path });

  const result = await runLevel(project, {
    level: "project",
    subtargets: (entry) => entry.actions,
    included: (action) =>
      included(action, env.ctx.filters.includeActions, env.ctx.filters.excludeActions),
    runChild: (action) => runIncrementalAction(env, project, action),
  });

  logMatrixEvent(env.ports.events, "project.complete", {
    project: project.path,
    kind: resultKind(result),
  });
  return result;
}

/** Sequences whose `limit` fields all equal the action's, in index order. */
export function applicableSequences(
  project: ProjectEntry,
  action: ProjectAction,
): Array<[string, IncrementalSequence]> {
  return Object.entries(project.incremental ?? {}).filter(([, sequence]) =>
    Object.entries(sequence.limit ?? {}).every(([field, value]) => action[field] === value),
  );
}

// =============================================================================
// ACTION
// =============================================================================

/** Null when no sequence applies to the action. */
export async function runIncrementalAction(
  env: DispatchEnv,
  project: ProjectEntry,
  action: ProjectAction,
): Promise<ActionResult | null> {
  const sequences = applicableSequences(project, action);
  if (sequences.length === 0) return null;

  const log = openLeafLog(env.ctx, {
    projectPath: project.path,
    actionProject: action.project,
    action: action.action,
    schemeOrTarget: actionTargetName(action),
    destination: action.destination,
  });
  const projectDir = projectCheckoutDir(env.ctx, project);

  let result: ActionResult | null = null;
  try {
    for (const [label, sequence] of sequences) {
      const run: SequenceRun = {
        env,
        project,
        action,
        label,
        projectDir,
        buildState: env.ports.buildTool.buildStatePath(projectDir, action),
        store: new SnapshotStore(`${projectDir}-incr`),
        log,
        issue: resolveXfail(action.xfail, xfailContext(env.ctx, action, label)),
      };
      const outcome = await checkSequence(run, sequence.commits);
      result = outcome.result;
      if (outcome.stop) break;
    }
  } catch (err) {
    await abandonLeafLog(log, err);
    throw err;
  }

  await log.finish(result?.kind ?? null);
  if (result) {
    reportLeaf(env, project, result, { action: action.action });
  }
  return result;
}

// =============================================================================
// SEQUENCE
// =============================================================================

async function checkSequence(run: SequenceRun, commits: readonly string[]): Promise<StepOutcome> {
  await run.store.init();

  let last: StepOutcome = {
    stop: false,
    result: actionResult("PASS", `PASS: ${run.project.path}-incr-${run.label}`),
  };
  let prev: string | null = null;

  for (const [seq, commit] of commits.entries()) {
    assertCommitRevision(commit, `${run.project.path} incremental sequence ${run.label}`);
    const ident = `${run.project.path}-incr-${run.label}-${String(seq).padStart(3, "0")}-${commit.slice(0, 7)}`;

    last =
      prev === null
        ? await fullBuildStep(run, seq, commit, ident)
        : await incrementalStep(run, seq, prev, commit, ident);
    if (last.stop) return last;
    prev = commit;
  }

  return last;
}

async function fullBuildStep(
  run: SequenceRun,
  seq: number,
  commit: string,
  ident: string,
): Promise<StepOutcome> {
  enterState(run, "full-build", seq, commit);
  run.log.write(`Doing full build #${String(seq).padStart(3, "0")} of ${run.project.path}: ${commit.slice(0, 7)}`);

  const checkoutFailure = await fullCheckout(run, commit, ident);
  if (checkoutFailure) return checkoutFailure;

  const result = await build(run, ident, false);
  if (result.kind !== "PASS") return { stop: true, result };

  await saveSnapshot(run, { seq, side: "full", commit });
  return { stop: false, result };
}

async function incrementalStep(
  run: SequenceRun,
  seq: number,
  prev: string,
  commit: string,
  ident: string,
): Promise<StepOutcome> {
  enterState(run, "incremental-build", seq, commit);
  run.log.write(`Doing incr build #${seq} of ${run.project.path}: ${prev.slice(0, 7)} -> ${commit.slice(0, 7)}`);

  try {
    await run.env.ports.vcs.switchRevision({
      projectDir: run.projectDir,
      commit,
      log: run.log,
      signal: run.env.signal,
    });
  } catch (err) {
    if (!(err instanceof CommandFailure)) throw err;
    return { stop: true, result: actionResult("FAIL", `FAIL: ${ident}: ${err.message}`) };
  }

  const result = await build(run, ident, true);
  if (!continues(result)) return { stop: true, result };

  await saveSnapshot(run, { seq, side: "incr", commit });

  if (run.env.ctx.config.verify_determinism) {
    const mismatch = await verifyStep(run, seq, commit, ident);
    if (mismatch) return mismatch;
  }
  return { stop: false, result };
}

/**
 * Rebuilds `commit` from scratch, compares it with the incremental state and puts the
 * incremental state back. A mismatch only fails the action when determinism is expected.
 */
async function verifyStep(
  run: SequenceRun,
  seq: number,
  commit: string,
  ident: string,
): Promise<StepOutcome | null> {
  enterState(run, "verify", seq, commit);

  const checkoutFailure = await fullCheckout(run, commit, ident);
  if (checkoutFailure) return checkoutFailure;

  const full = await build(run, ident, false);
  if (!continues(full)) return { stop: true, result: full };

  const fullKey: SnapshotKey = { seq, side: "full", commit };
  const incrKey: SnapshotKey = { seq, side: "incr", commit };
  await saveSnapshot(run, fullKey);

  const fullPath = run.store.pathFor(fullKey);
  const incrPath = run.store.pathFor(incrKey);
  run.log.write(`Comparing dirs ${fullPath} vs. ${snapshotName(incrKey)}`);
  const differences = await diffTrees(fullPath, incrPath, {
    ignore: run.env.ports.buildTool.ignoredDifferences(run.action),
  });
  for (const difference of differences) {
    run.log.write(formatDifference(difference));
  }

  run.log.write(`Restoring incr build-state #${seq} of ${run.project.path} from ${incrPath}`);
  await run.store.restore(incrKey, run.buildState);

  if (differences.length === 0) return null;

  const message = `Dirs differ: ${fullPath} vs. ${path.basename(incrPath)}`;
  logMatrixEvent(run.env.ports.events, "determinism.mismatch", {
    project: run.project.path,
    action: run.action.action,
    sequence: run.label,
    seq,
    commit,
    differences: differences.map(formatDifference),
  });
  run.log.write(message);

  if (!run.env.ctx.config.expect_determinism) return null;
  return { stop: true, result: actionResult("FAIL", `FAIL: ${ident}: ${message}`) };
}

// =============================================================================
// HELPERS
// =============================================================================

function continues(result: ActionResult): boolean {
  return result.kind === "PASS" || result.kind === "XFAIL";
}

async function fullCheckout(run: SequenceRun, commit: string, ident: string): Promise<StepOutcome | null> {
  try {
    await run.env.ports.vcs.checkoutRevision({
      project: run.project,
      projectDir: run.projectDir,
      commit,
      incremental: false,
      log: run.log,
      signal: run.env.signal,
    });
    return null;
  } catch (err) {
    if (!(err instanceof CommandFailure)) throw err;
    return { stop: true, result: actionResult("FAIL", `FAIL: ${ident}: ${err.message}`) };
  }
}

// Settles before and after so timestamps of the next build differ.
async function build(run: SequenceRun, ident: string, incremental: boolean): Promise<ActionResult> {
  const { env } = run;
  await env.ports.clock.sleep(env.ctx.config.settle_ms);

  let result: ActionResult;
  try {
    await env.ports.buildTool.dispatch({
      project: run.project,
      action: run.action,
      projectDir: run.projectDir,
      swiftVersion: env.ctx.config.swift_version,
      incremental,
      stripResourcePhases: false,
      log: run.log,
      signal: env.signal,
    });
    result = classifyLeaf(ident, true, run.issue);
  } catch (err) {
    if (!(err instanceof CommandFailure)) throw err;
    run.log.write(err.message);
    result = classifyLeaf(`${ident}: ${err.message}`, false, run.issue);
  }

  await env.ports.clock.sleep(env.ctx.config.settle_ms);
  return result;
}

async function saveSnapshot(run: SequenceRun, key: SnapshotKey): Promise<void> {
  run.log.write(`Saving ${key.side} state #${key.seq} of ${run.project.path} to ${run.store.pathFor(key)}`);
  await run.store.save(key, run.buildState);
}

function enterState(run: SequenceRun, state: CheckState, seq: number, commit: string): void {
  logMatrixEvent(run.env.ports.events, "incremental.state", {
    project: run.project.path,
    action: run.action.action,
    state,
    sequence: run.label,
    seq,
    commit,
  });
}

/**
 * The dispatch tree: project list → project → version → action.
 * Purpose: one level routine, instantiated per level, that selects children, runs them and
 *   folds their results into a composite.
 * Assumptions: everything below a project runs sequentially in index order; only the
 *   project list fans out through the worker pool.
 * Usage: const result = await runProjectList(env, index);
 */

import { logMatrixEvent } from "../../../core/logger.js";
import { included } from "../../../core/predicate.js";
import type { ProjectEntry, ProjectIndex, ProjectVersion } from "../../../core/project-index.js";
import {
  addResult,
  createComposite,
  resultKind,
  type CompositeLevel,
  type CompositeResult,
  type Result,
} from "../../../core/result.js";

import type { RunContext } from "../run-context.js";
import { runAll } from "../workers/worker-pool.js";

import { runCompatAction, type DispatchEnv } from "./action-runner.js";

// =============================================================================
// LEVEL ROUTINE
// =============================================================================

export type ChildRunner<TChild> = (child: TChild) => Promise<Result | null>;

export type LevelSpec<TParent, TChild> = {
  level: CompositeLevel;
  subtargets: (parent: TParent) => readonly TChild[];
  included: (child: TChild) => boolean;
  runChild: ChildRunner<TChild>;
  /** Runs the selected children; sequential in order unless overridden. */
  runChildren?: (children: readonly TChild[], runChild: ChildRunner<TChild>) => Promise<Array<Result | null>>;
};

/** Children returning null (skipped leaves) contribute nothing. */
export async function runLevel<TParent, TChild>(
  parent: TParent,
  spec: LevelSpec<TParent, TChild>,
): Promise<CompositeResult> {
  const children = spec.subtargets(parent).filter(spec.included);
  const results = spec.runChildren
    ? await spec.runChildren(children, spec.runChild)
    : await runSequentially(children, spec.runChild);

  let composite = createComposite(spec.level);
  for (const result of results) {
    if (result) composite = addResult(composite, result);
  }
  return composite;
}

async function runSequentially<TChild>(
  children: readonly TChild[],
  runChild: ChildRunner<TChild>,
): Promise<Array<Result | null>> {
  const results: Array<Result | null> = [];
  for (const child of children) {
    results.push(await runChild(child));
  }
  return results;
}

// =============================================================================
// LEVELS
// =============================================================================

export type ProjectRunner = (env: DispatchEnv, project: ProjectEntry) => Promise<Result>;

/** A project runs when it supports the host platform and passes the repository predicates. */
export function projectIncluded(ctx: RunContext, project: ProjectEntry): boolean {
  if (project.platforms && !project.platforms.includes(ctx.platform)) {
    return false;
  }
  return included(project, ctx.filters.includeRepos, ctx.filters.excludeRepos);
}

export async function runProjectList(
  env: DispatchEnv,
  index: ProjectIndex,
  runProjectFn: ProjectRunner = runProject,
): Promise<CompositeResult> {
  return runLevel(index, {
    level: "project-list",
    subtargets: (projects) => projects,
    included: (project) => projectIncluded(env.ctx, project),
    runChild: (project) => runProjectFn(env, project),
    runChildren: (projects) =>
      runAll(projects, (project, signal) => runProjectFn({ ...env, signal }, project), {
        workers: env.ctx.config.jobs,
        describe: (project) => project.path,
        signal: env.signal,
        onCrash: (project, error) =>
          logMatrixEvent(env.ports.events, "worker.crash", {
            project: project.path,
            message: error.message,
          }),
      }),
  });
}

export async function runProject(env: DispatchEnv, project: ProjectEntry): Promise<Result> {
  logMatrixEvent(env.ports.events, "project.start", { project: project.path });

  const result = await runLevel(project, {
    level: "project",
    subtargets: (entry) => entry.compatibility,
    included: (version) =>
      included(version, env.ctx.filters.includeVersions, env.ctx.filters.excludeVersions),
    runChild: (version) => runVersion(env, project, version),
  });

  logMatrixEvent(env.ports.events, "project.complete", {
    project: project.path,
    kind: resultKind(result),
  });
  return result;
}

export async function runVersion(
  env: DispatchEnv,
  project: ProjectEntry,
  version: ProjectVersion,
): Promise<Result> {
  return runLevel(version, {
    level: "version",
    subtargets: () => project.actions,
    included: (action) =>
      included(action, env.ctx.filters.includeActions, env.ctx.filters.excludeActions),
    runChild: (action) => runCompatAction(env, { project, version, action }),
  });
}

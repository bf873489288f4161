/**
 * Entry point of the engine: one matrix or incremental run over a loaded index.
 * Purpose: run the project list, log start/complete events and print the summary.
 * Usage: const outcome = await runMatrix({ ctx, ports, index, mode: "compat" });
 */

import { logMatrixEvent } from "../../core/logger.js";
import type { ProjectIndex } from "../../core/project-index.js";
import {
  countLeaves,
  formatSummary,
  isSuccessfulKind,
  resultKind,
  type CompositeResult,
  type ResultKind,
} from "../../core/result.js";

import { runProject, runProjectList } from "./dispatch/dispatch-tree.js";
import { runIncrementalProject } from "./incremental/determinism-checker.js";
import type { MatrixPorts } from "./ports.js";
import type { RunContext } from "./run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type MatrixMode = "compat" | "incremental";

export type MatrixRunInput = {
  ctx: RunContext;
  ports: MatrixPorts;
  index: ProjectIndex;
  mode: MatrixMode;
  signal?: AbortSignal;
};

export type MatrixRunOutcome = {
  result: CompositeResult;
  kind: ResultKind;
  summary: string;
  /** 0 when nothing failed and nothing unexpectedly passed. */
  exitCode: 0 | 1;
};

// =============================================================================
// RUN
// =============================================================================

export async function runMatrix(input: MatrixRunInput): Promise<MatrixRunOutcome> {
  const { ctx, ports, index, mode } = input;

  logMatrixEvent(ports.events, "matrix.start", {
    mode,
    platform: ctx.platform,
    branch: ctx.config.swift_branch,
    job: ctx.config.job_type,
    projects: index.length,
    workers: ctx.config.jobs,
  });

  const result = await runProjectList(
    { ctx, ports, signal: input.signal },
    index,
    mode === "incremental" ? runIncrementalProject : runProject,
  );

  const kind = resultKind(result);
  logMatrixEvent(ports.events, "matrix.complete", { kind, counts: countLeaves(result) });

  const summary = formatSummary(result);
  ports.reporter.line(summary);

  return { result, kind, summary, exitCode: isSuccessfulKind(kind) ? 0 : 1 };
}

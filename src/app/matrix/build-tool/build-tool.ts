/**
 * Build tool port for matrix runs.
 * Purpose: keep command assembly for the toolchain under test out of the dispatch engine.
 * Assumptions: a failed build or test surfaces as CommandFailure; anything else is a bug
 *   or a configuration problem.
 * Usage: inject into MatrixPorts; the action runner and determinism checker call dispatch().
 */

import { ConfigError } from "../../../core/errors.js";
import type { CommandLog } from "../../../core/leaf-log.js";
import type { ProjectAction, ProjectEntry } from "../../../core/project-index.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildRequest = {
  project: ProjectEntry;
  action: ProjectAction;
  /** Checkout directory of the project. */
  projectDir: string;
  /** Language mode to build in; defaults to the version label at the leaf. */
  swiftVersion?: string;
  incremental: boolean;
  stripResourcePhases: boolean;
  log: CommandLog;
  signal?: AbortSignal;
};

export interface BuildTool {
  dispatch(request: BuildRequest): Promise<void>;
  /** Directory holding the tool's incremental state for this action. */
  buildStatePath(projectDir: string, action: ProjectAction): string;
  /** Names inside the build state that legitimately differ between builds. */
  ignoredDifferences(action: ProjectAction): readonly string[];
}

export type ActionKind =
  | { tool: "package"; verb: "Build" | "Test" }
  | {
      tool: "xcode";
      verb: "Build" | "Test";
      container: "workspace" | "project";
      selector: "scheme" | "target";
    };

// =============================================================================
// ACTION KINDS
// =============================================================================

const XCODE_ACTION_PATTERN = /^(Build|Test)Xcode(Workspace|Project)(Scheme|Target)$/;

export function parseActionKind(action: string): ActionKind {
  if (action === "BuildSwiftPackage") return { tool: "package", verb: "Build" };
  if (action === "TestSwiftPackage") return { tool: "package", verb: "Test" };

  const match = XCODE_ACTION_PATTERN.exec(action);
  if (!match) {
    throw new ConfigError(`Unknown action: ${action}`);
  }

  return {
    tool: "xcode",
    verb: match[1] === "Build" ? "Build" : "Test",
    container: match[2] === "Workspace" ? "workspace" : "project",
    selector: match[3] === "Scheme" ? "scheme" : "target",
  };
}

/** The scheme or target an action names, used in result messages and log names. */
export function actionTargetName(action: ProjectAction): string | undefined {
  return action.scheme ?? action.target;
}

/**
 * Matrix ports define the boundary between the dispatch engine and adapters.
 * Purpose: make toolchain, VCS and output dependencies explicit and replaceable for testing.
 * Assumptions: ports stay small; the engine never reaches past them to spawn processes.
 * Usage: build defaults with `createDefaultPorts` in `run-context.ts` and override in tests.
 */

import type { EventSink } from "../../core/logger.js";

import type { BuildTool } from "./build-tool/build-tool.js";
import type { Vcs } from "./vcs/vcs.js";

// =============================================================================
// PORTS
// =============================================================================

export interface Clock {
  sleep(ms: number): Promise<void>;
}

/** Human-facing progress lines (`PASS: ...`) and the final summary. */
export interface Reporter {
  line(text: string): void;
}

export type MatrixPorts = {
  vcs: Vcs;
  buildTool: BuildTool;
  events: EventSink;
  reporter: Reporter;
  clock: Clock;
};

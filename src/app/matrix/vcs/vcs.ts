import type { CommandLog } from "../../../core/leaf-log.js";
import type { ProjectEntry } from "../../../core/project-index.js";

// =============================================================================
// TYPES
// =============================================================================

export type CheckoutRequest = {
  project: ProjectEntry;
  /** Where the checkout lives: `<project cache>/<project path>`. */
  projectDir: string;
  commit: string;
  /** Keep untracked build products from the previous checkout. */
  incremental: boolean;
  log: CommandLog;
  signal?: AbortSignal;
};

export type SwitchRequest = {
  projectDir: string;
  commit: string;
  log: CommandLog;
  signal?: AbortSignal;
};

/** Version-control port. Failures surface as CommandFailure or ConfigError. */
export interface Vcs {
  /** Clones on first use, otherwise updates the cached checkout to `commit`. */
  checkoutRevision(request: CheckoutRequest): Promise<void>;
  /** Moves an existing checkout to `commit` without cleaning it. */
  switchRevision(request: SwitchRequest): Promise<void>;
}

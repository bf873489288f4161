/*
Purpose: plain-text log for one leaf action, shared by the command runner and child processes.
Assumptions: writes are synchronous so a tailing reader sees each line as it is produced;
  child processes inherit the descriptor directly.
Usage: const log = LeafLog.open(dir, name); ...; await log.finish("PASS");
*/

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

/** Where command lines and process output for one leaf go. */
export interface CommandLog {
  /** Descriptor handed to child processes for stdout/stderr. */
  readonly fd: number;
  write(line: string): void;
}

export type LeafLogNameParts = {
  projectPath: string;
  /** The action's `project` field; only the part before the first `-` is used. */
  actionProject?: string;
  version?: string;
  action: string;
  schemeOrTarget?: string;
  destination?: string;
};

const STDOUT_FD = 1;

// =============================================================================
// LEAF LOG
// =============================================================================

export class LeafLog implements CommandLog {
  private closed = false;

  private constructor(
    public readonly fd: number,
    public readonly filePath: string | null,
  ) {}

  static open(dir: string, fileName: string): LeafLog {
    fse.ensureDirSync(dir);
    const filePath = path.join(dir, fileName);
    return new LeafLog(fs.openSync(filePath, "w"), filePath);
  }

  /** Verbose mode: everything goes to the process stdout, nothing is kept on disk. */
  static stdout(): LeafLog {
    return new LeafLog(STDOUT_FD, null);
  }

  write(line: string): void {
    if (this.closed) return;
    fs.writeSync(this.fd, line.endsWith("\n") ? line : `${line}\n`);
  }

  close(): void {
    if (this.closed || this.filePath === null) {
      this.closed = true;
      return;
    }
    this.closed = true;
    fs.fsyncSync(this.fd);
    fs.closeSync(this.fd);
  }

  /**
   * Closes the log and renames it to `<KIND>_<name>`. A null kind means the leaf
   * produced no result, so the file is removed. Returns the final path, if any.
   */
  async finish(kind: string | null): Promise<string | null> {
    this.close();
    if (this.filePath === null) return null;

    if (kind === null) {
      await fse.remove(this.filePath);
      return null;
    }

    const target = path.join(path.dirname(this.filePath), `${kind}_${path.basename(this.filePath)}`);
    await fse.move(this.filePath, target, { overwrite: true });
    return target;
  }
}

// =============================================================================
// NAMING
// =============================================================================

export function leafLogName(parts: LeafLogNameParts): string {
  const projectPrefix = (parts.actionProject ?? "").split("-")[0];
  const projectIdentifier = `${parts.projectPath} ${projectPrefix}`.trim();

  const segments = [projectIdentifier];
  if (parts.version !== undefined) segments.push(parts.version.trim());
  segments.push(parts.action.trim());
  if (parts.schemeOrTarget) segments.push(parts.schemeOrTarget);
  if (parts.destination) segments.push(parts.destination);

  const sanitized = segments
    .join("_")
    .replace(/[^\w.]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .replace(/^_+|_+$/g, "");

  return `${sanitized}.log`;
}

/**
 * Recursive comparison of two build-state trees.
 * Purpose: find what an incremental build left different from a full build of the same commit.
 * Assumptions: both roots are directories; symlinks are compared by target, never followed.
 * Usage: const diff = await diffTrees(fullDir, incrDir, { ignore: buildTool.ignoredDifferences(action) });
 */

import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";
import { minimatch } from "minimatch";

// =============================================================================
// TYPES
// =============================================================================

export type TreeDifference =
  | { kind: "missing-incr"; path: string }
  | { kind: "missing-full"; path: string }
  | { kind: "content"; path: string };

export type TreeDiffOptions = {
  /** Names whose whole subtree is skipped wherever they appear. */
  ignore?: readonly string[];
};

type EntryType = "file" | "dir" | "symlink";

// Present on one side only, e.g. diagnostics written lazily and editor backups.
const MISSING_IGNORED = ["*.dia", "*~"];
// Rewritten on every build even when nothing changed.
const CONTENT_IGNORED = ["*-master.swiftdeps", "dependency_info.dat"];

// =============================================================================
// DIFF
// =============================================================================

/** Differences in path order; a subtree missing on one side is reported once, at its root. */
export async function diffTrees(
  fullRoot: string,
  incrRoot: string,
  opts: TreeDiffOptions = {},
): Promise<TreeDifference[]> {
  const ignore = opts.ignore ?? [];
  const [full, incr] = await Promise.all([listTree(fullRoot, ignore), listTree(incrRoot, ignore)]);

  const differences: TreeDifference[] = [];
  const missingRoots: string[] = [];
  const allPaths = [...new Set([...full.keys(), ...incr.keys()])].sort();

  for (const rel of allPaths) {
    if (missingRoots.some((root) => rel.startsWith(`${root}/`))) continue;

    const fullType = full.get(rel);
    const incrType = incr.get(rel);
    const name = path.posix.basename(rel);

    if (fullType === undefined || incrType === undefined) {
      missingRoots.push(rel);
      if (matchesAny(name, MISSING_IGNORED)) continue;
      differences.push({ kind: fullType === undefined ? "missing-full" : "missing-incr", path: rel });
      continue;
    }

    if (fullType !== incrType) {
      differences.push({ kind: "content", path: rel });
      continue;
    }
    if (fullType === "dir" || matchesAny(name, CONTENT_IGNORED)) continue;

    const same =
      fullType === "symlink"
        ? (await fse.readlink(path.join(fullRoot, rel))) === (await fse.readlink(path.join(incrRoot, rel)))
        : await sameFileContents(path.join(fullRoot, rel), path.join(incrRoot, rel));
    if (!same) differences.push({ kind: "content", path: rel });
  }

  return differences;
}

export function formatDifference(difference: TreeDifference): string {
  switch (difference.kind) {
    case "missing-incr":
      return `Missing 'incr' file: ${difference.path}`;
    case "missing-full":
      return `Missing 'full' file: ${difference.path}`;
    case "content":
      return `File difference: ${difference.path}`;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listTree(root: string, ignore: readonly string[]): Promise<Map<string, EntryType>> {
  const entries = await fg("**", {
    cwd: root,
    onlyFiles: false,
    markDirectories: true,
    dot: true,
    followSymbolicLinks: false,
    objectMode: true,
  });

  const tree = new Map<string, EntryType>();
  for (const entry of entries) {
    const rel = entry.path.replace(/\/$/, "");
    if (rel.split("/").some((segment) => matchesAny(segment, ignore))) continue;

    const type: EntryType = entry.dirent.isSymbolicLink()
      ? "symlink"
      : entry.dirent.isDirectory()
        ? "dir"
        : "file";
    tree.set(rel, type);
  }
  return tree;
}

function matchesAny(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(name, pattern, { dot: true }));
}

async function sameFileContents(a: string, b: string): Promise<boolean> {
  const [statA, statB] = await Promise.all([fse.stat(a), fse.stat(b)]);
  if (statA.size !== statB.size) return false;

  const [bufA, bufB] = await Promise.all([fse.readFile(a), fse.readFile(b)]);
  return bufA.equals(bufB);
}

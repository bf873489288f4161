import path from "node:path";

import fse from "fs-extra";

export type SnapshotSide = "full" | "incr";

export type SnapshotKey = {
  seq: number;
  side: SnapshotSide;
  commit: string;
};

/** `build-state-<seq:03d>-<full|incr>-<commit:7>` */
export function snapshotName(key: SnapshotKey): string {
  return `build-state-${String(key.seq).padStart(3, "0")}-${key.side}-${key.commit.slice(0, 7)}`;
}

/**
 * Copies of a build tool's state directory under `<cache>/<project>-incr/`.
 * A snapshot is written once and afterwards only read, restored from or deleted.
 */
export class SnapshotStore {
  constructor(readonly root: string) {}

  /** Starts from an empty directory. */
  async init(): Promise<void> {
    await fse.emptyDir(this.root);
  }

  pathFor(key: SnapshotKey): string {
    return path.join(this.root, snapshotName(key));
  }

  async save(key: SnapshotKey, buildState: string): Promise<string> {
    const target = this.pathFor(key);
    await fse.remove(target);
    if (await fse.pathExists(buildState)) {
      await fse.copy(buildState, target, { dereference: false, preserveTimestamps: true });
    } else {
      // No state on disk snapshots as an empty directory.
      await fse.ensureDir(target);
    }
    return target;
  }

  /** Replaces the live build state with a snapshot. */
  async restore(key: SnapshotKey, buildState: string): Promise<void> {
    await fse.remove(buildState);
    await fse.copy(this.pathFor(key), buildState, { dereference: false, preserveTimestamps: true });
  }
}

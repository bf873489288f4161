import fse from "fs-extra";

import type { CommandRunner } from "../core/command-runner.js";
import { CommandFailure } from "../core/errors.js";
import type { CommandLog } from "../core/leaf-log.js";
import type { PlatformName } from "../core/utils.js";

export type GitContext = {
  runner: CommandRunner;
  log: CommandLog;
  platform: PlatformName;
  signal?: AbortSignal;
};

export async function git(ctx: GitContext, repoPath: string | null, args: string[]): Promise<void> {
  const command = repoPath === null ? ["git", ...args] : ["git", "-C", repoPath, ...args];
  await ctx.runner.run(command, { log: ctx.log, signal: ctx.signal });
}

export async function headSha(ctx: GitContext, repoPath: string): Promise<string> {
  const stdout = await ctx.runner.output(["git", "-C", repoPath, "rev-parse", "HEAD"], {
    log: ctx.log,
    signal: ctx.signal,
  });
  return stdout.trim();
}

export async function checkout(
  ctx: GitContext,
  repoPath: string,
  tree: string,
  opts: { force?: boolean } = {},
): Promise<void> {
  await git(ctx, repoPath, opts.force ? ["checkout", "-f", tree] : ["checkout", tree]);
}

export async function submoduleUpdate(ctx: GitContext, repoPath: string): Promise<void> {
  await git(ctx, repoPath, ["submodule", "update", "--init", "--recursive"]);
}

export async function clean(ctx: GitContext, repoPath: string): Promise<void> {
  if (ctx.platform === "Darwin") {
    // Locked files survive `git clean` on macOS.
    await ctx.runner.run(["chflags", "-R", "nouchg", repoPath], { log: ctx.log, signal: ctx.signal });
  }
  await git(ctx, repoPath, ["clean", "-ffdx"]);
}

export async function clone(
  ctx: GitContext,
  url: string,
  repoPath: string,
  tree?: string,
): Promise<void> {
  await git(ctx, null, ["clone", url, repoPath]);
  if (tree) {
    await checkout(ctx, repoPath, tree, { force: true });
  }
  await submoduleUpdate(ctx, repoPath);
}

/**
 * Brings an existing checkout to `sha`, fetching only when HEAD differs. Any command
 * failure discards the checkout and clones it again.
 */
export async function updateToRevision(
  ctx: GitContext,
  url: string,
  sha: string,
  repoPath: string,
  opts: { incremental: boolean },
): Promise<void> {
  try {
    if (!opts.incremental) {
      await clean(ctx, repoPath);
    }
    const current = await headSha(ctx, repoPath);
    ctx.log.write(`current_sha: ${current}`);
    ctx.log.write(`configured_sha: ${sha}`);

    if (current !== sha) {
      await git(ctx, repoPath, ["fetch"]);
      await checkout(ctx, repoPath, sha, { force: true });
      await submoduleUpdate(ctx, repoPath);
    } else {
      await checkout(ctx, repoPath, sha, { force: true });
    }
  } catch (err) {
    if (!(err instanceof CommandFailure)) throw err;

    ctx.log.write("warning: Unable to update. Falling back to a clone.");
    await fse.remove(repoPath);
    await clone(ctx, url, repoPath, sha);
  }
}

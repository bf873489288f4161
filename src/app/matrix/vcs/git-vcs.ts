import path from "node:path";

import type { CommandRunner } from "../../../core/command-runner.js";
import { ConfigError } from "../../../core/errors.js";
import { ensureDir, pathExists, type PlatformName } from "../../../core/utils.js";
import { checkout, clone, submoduleUpdate, updateToRevision, type GitContext } from "../../../git/git.js";

import type { CheckoutRequest, SwitchRequest, Vcs } from "./vcs.js";

export type GitVcsOptions = {
  runner: CommandRunner;
  platform: PlatformName;
};

export class GitVcs implements Vcs {
  constructor(private readonly options: GitVcsOptions) {}

  async checkoutRevision(request: CheckoutRequest): Promise<void> {
    const { project, projectDir, commit } = request;
    if (project.repository !== "Git") {
      throw new ConfigError(`Unsupported repository: ${project.repository}`);
    }

    await ensureDir(path.dirname(projectDir));
    const ctx = this.context(request);

    if (await pathExists(projectDir)) {
      await updateToRevision(ctx, project.url, commit, projectDir, {
        incremental: request.incremental,
      });
    } else {
      await clone(ctx, project.url, projectDir, commit);
    }
  }

  async switchRevision(request: SwitchRequest): Promise<void> {
    const ctx = this.context(request);
    await checkout(ctx, request.projectDir, request.commit);
    await submoduleUpdate(ctx, request.projectDir);
  }

  private context(request: { log: GitContext["log"]; signal?: AbortSignal }): GitContext {
    return {
      runner: this.options.runner,
      platform: this.options.platform,
      log: request.log,
      signal: request.signal,
    };
  }
}

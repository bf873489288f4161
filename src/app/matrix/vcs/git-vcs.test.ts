import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { commandStartsWith, createFakeRunner, MemoryLog } from "../../../__tests__/helpers/fake-runner.js";
import { ConfigError } from "../../../core/errors.js";
import type { ProjectEntry } from "../../../core/project-index.js";

import { GitVcs } from "./git-vcs.js";

const SHA = "a".repeat(40);
const OTHER_SHA = "b".repeat(40);
const URL = "https://example.invalid/foo.git";

function project(repository = "Git"): ProjectEntry {
  return { path: "Foo", repository, url: URL, branch: "main", compatibility: [], actions: [] };
}

let cacheRoot: string;

beforeEach(() => {
  cacheRoot = fs.mkdtempSync(path.join(os.tmpdir(), "git-vcs-"));
});

afterEach(() => {
  fs.rmSync(cacheRoot, { recursive: true, force: true });
});

// =============================================================================
// TESTS
// =============================================================================

describe("GitVcs.checkoutRevision", () => {
  it("clones a project that is not cached yet", async () => {
    const fake = createFakeRunner();
    const vcs = new GitVcs({ runner: fake.runner, platform: "Linux" });
    const projectDir = path.join(cacheRoot, "Foo");

    await vcs.checkoutRevision({
      project: project(),
      projectDir,
      commit: SHA,
      incremental: false,
      log: new MemoryLog(),
    });

    expect(fake.commands()).toEqual([
      `git clone ${URL} ${projectDir}`,
      `git -C ${projectDir} checkout -f ${SHA}`,
      `git -C ${projectDir} submodule update --init --recursive`,
    ]);
  });

  it("only checks out when the cached HEAD already matches", async () => {
    const projectDir = path.join(cacheRoot, "Foo");
    fs.mkdirSync(projectDir);
    const fake = createFakeRunner((command) =>
      commandStartsWith(command, ["git", "-C", projectDir, "rev-parse"]) ? { stdout: `${SHA}\n` } : {},
    );
    const vcs = new GitVcs({ runner: fake.runner, platform: "Linux" });
    const log = new MemoryLog();

    await vcs.checkoutRevision({ project: project(), projectDir, commit: SHA, incremental: false, log });

    expect(fake.commands()).toEqual([
      `git -C ${projectDir} clean -ffdx`,
      `git -C ${projectDir} rev-parse HEAD`,
      `git -C ${projectDir} checkout -f ${SHA}`,
    ]);
    expect(log.lines).toContain(`current_sha: ${SHA}`);
  });

  it("unlocks, cleans and fetches on macOS when HEAD differs", async () => {
    const projectDir = path.join(cacheRoot, "Foo");
    fs.mkdirSync(projectDir);
    const fake = createFakeRunner((command) =>
      commandStartsWith(command, ["git", "-C", projectDir, "rev-parse"]) ? { stdout: `${OTHER_SHA}\n` } : {},
    );
    const vcs = new GitVcs({ runner: fake.runner, platform: "Darwin" });

    await vcs.checkoutRevision({
      project: project(),
      projectDir,
      commit: SHA,
      incremental: false,
      log: new MemoryLog(),
    });

    expect(fake.commands()).toEqual([
      `chflags -R nouchg ${projectDir}`,
      `git -C ${projectDir} clean -ffdx`,
      `git -C ${projectDir} rev-parse HEAD`,
      `git -C ${projectDir} fetch`,
      `git -C ${projectDir} checkout -f ${SHA}`,
      `git -C ${projectDir} submodule update --init --recursive`,
    ]);
  });

  it("keeps build products for incremental checkouts", async () => {
    const projectDir = path.join(cacheRoot, "Foo");
    fs.mkdirSync(projectDir);
    const fake = createFakeRunner((command) =>
      commandStartsWith(command, ["git", "-C", projectDir, "rev-parse"]) ? { stdout: `${SHA}\n` } : {},
    );
    const vcs = new GitVcs({ runner: fake.runner, platform: "Darwin" });

    await vcs.checkoutRevision({
      project: project(),
      projectDir,
      commit: SHA,
      incremental: true,
      log: new MemoryLog(),
    });

    expect(fake.commands()).toEqual([
      `git -C ${projectDir} rev-parse HEAD`,
      `git -C ${projectDir} checkout -f ${SHA}`,
    ]);
  });

  it("discards the checkout and clones again when the update fails", async () => {
    const projectDir = path.join(cacheRoot, "Foo");
    fs.mkdirSync(projectDir);
    fs.writeFileSync(path.join(projectDir, "stale.txt"), "stale\n");
    const fake = createFakeRunner((command) => {
      if (commandStartsWith(command, ["git", "-C", projectDir, "rev-parse"])) return { stdout: `${OTHER_SHA}\n` };
      if (commandStartsWith(command, ["git", "-C", projectDir, "fetch"])) return { exitCode: 128 };
      return {};
    });
    const vcs = new GitVcs({ runner: fake.runner, platform: "Linux" });
    const log = new MemoryLog();

    await vcs.checkoutRevision({ project: project(), projectDir, commit: SHA, incremental: false, log });

    expect(fake.commands().slice(3)).toEqual([
      `git clone ${URL} ${projectDir}`,
      `git -C ${projectDir} checkout -f ${SHA}`,
      `git -C ${projectDir} submodule update --init --recursive`,
    ]);
    expect(log.lines).toContain("warning: Unable to update. Falling back to a clone.");
    expect(fs.existsSync(path.join(projectDir, "stale.txt"))).toBe(false);
  });

  it("rejects repositories other than git", async () => {
    const fake = createFakeRunner();
    const vcs = new GitVcs({ runner: fake.runner, platform: "Linux" });

    const error = await vcs
      .checkoutRevision({
        project: project("Svn"),
        projectDir: path.join(cacheRoot, "Foo"),
        commit: SHA,
        incremental: false,
        log: new MemoryLog(),
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ message: "Unsupported repository: Svn" });
    expect(fake.requests).toHaveLength(0);
  });
});

describe("GitVcs.switchRevision", () => {
  it("checks out without cleaning and updates submodules", async () => {
    const fake = createFakeRunner();
    const vcs = new GitVcs({ runner: fake.runner, platform: "Darwin" });

    await vcs.switchRevision({ projectDir: "/cache/Foo", commit: SHA, log: new MemoryLog() });

    expect(fake.commands()).toEqual([
      `git -C /cache/Foo checkout ${SHA}`,
      "git -C /cache/Foo submodule update --init --recursive",
    ]);
  });
});

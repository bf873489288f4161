import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import {
  COMMIT_A,
  COMMIT_B,
  commandFailure,
  createHarness,
  packageProject,
} from "../../../__tests__/helpers/fake-ports.js";
import { ConfigError } from "../../../core/errors.js";
import type { ProjectAction } from "../../../core/project-index.js";

import { classifyLeaf, runCompatAction } from "./action-runner.js";

const VERSION = { version: "5.0", commit: COMMIT_A };
const PACKAGE_ACTION: ProjectAction = { action: "BuildSwiftPackage", configuration: "release" };

function logFiles(rootDir: string): string[] {
  return fs.readdirSync(path.join(rootDir, "logs")).sort();
}

// =============================================================================
// TESTS
// =============================================================================

describe("runCompatAction", () => {
  it("checks out, builds and passes", async () => {
    const h = createHarness();
    const env = { ctx: h.ctx, ports: h.ports };

    const result = await runCompatAction(env, {
      project: packageProject(),
      version: VERSION,
      action: PACKAGE_ACTION,
    });

    expect(result).toEqual({
      type: "action",
      kind: "PASS",
      message: "PASS: Foo, 5.0, 012345, Swift Package",
    });
    expect(h.vcs.checkouts[0]).toMatchObject({
      projectDir: path.join(h.rootDir, "cache", "Foo"),
      commit: COMMIT_A,
      incremental: false,
    });
    expect(h.buildTool.requests[0]).toMatchObject({
      swiftVersion: "5.0",
      incremental: false,
      stripResourcePhases: true,
    });
    expect(logFiles(h.rootDir)).toEqual(["PASS_Foo_5.0_BuildSwiftPackage.log"]);
    expect(h.lines).toEqual(["PASS: Foo, 5.0, 012345, Swift Package"]);
    expect(h.events.events[0]).toMatchObject({ type: "action.result", project: "Foo", kind: "PASS" });
  });

  it("turns an expected failure into XFAIL and keeps the command output in the log", async () => {
    const h = createHarness({}, () => {
      throw commandFailure();
    });

    const result = await runCompatAction(
      { ctx: h.ctx, ports: h.ports },
      {
        project: packageProject(),
        version: VERSION,
        action: { ...PACKAGE_ACTION, xfail: { issue: "SR-1234 crash in parser", compatibility: "5.0" } },
      },
    );

    expect(result?.message).toBe("XFAIL: SR-1234, Foo, 5.0, 012345, Swift Package");
    const log = fs.readFileSync(path.join(h.rootDir, "logs", "XFAIL_Foo_5.0_BuildSwiftPackage.log"), "utf8");
    expect(log).toBe("Command exited with 1: swift build\n");
  });

  it("reports an unexpected pass", async () => {
    const h = createHarness();

    const result = await runCompatAction(
      { ctx: h.ctx, ports: h.ports },
      {
        project: packageProject(),
        version: VERSION,
        action: { ...PACKAGE_ACTION, xfail: [{ issue: "SR-9", platform: "Linux" }, { issue: "SR-1", branch: "main" }] },
      },
    );

    expect(result).toMatchObject({ kind: "UPASS", message: "UPASS: SR-1, Foo, 5.0, 012345, Swift Package" });
  });

  it("fails when no rule matches the context", async () => {
    const h = createHarness({}, () => {
      throw commandFailure();
    });

    const result = await runCompatAction(
      { ctx: h.ctx, ports: h.ports },
      {
        project: packageProject(),
        version: VERSION,
        action: { ...PACKAGE_ACTION, xfail: { issue: "SR-9", platform: "Linux" } },
      },
    );

    expect(result).toMatchObject({ kind: "FAIL", message: "FAIL: Foo, 5.0, 012345, Swift Package" });
  });

  it("never expects checkout failures", async () => {
    const h = createHarness();
    h.vcs.failingCommits.add(COMMIT_A);

    const result = await runCompatAction(
      { ctx: h.ctx, ports: h.ports },
      {
        project: packageProject(),
        version: VERSION,
        action: { ...PACKAGE_ACTION, xfail: { issue: "SR-1" } },
      },
    );

    expect(result).toMatchObject({ kind: "FAIL", message: "FAIL: Foo, 5.0, 012345, Swift Package" });
    expect(h.buildTool.requests).toHaveLength(0);
  });

  it("names the scheme and destination of xcode actions", async () => {
    const h = createHarness();

    const result = await runCompatAction(
      { ctx: h.ctx, ports: h.ports },
      {
        project: packageProject(),
        version: VERSION,
        action: {
          action: "BuildXcodeWorkspaceScheme",
          workspace: "App.xcworkspace",
          scheme: "App",
          destination: "generic/platform=iOS",
        },
      },
    );

    expect(result?.message).toBe("PASS: Foo, 5.0, 012345, App, generic/platform=iOS");
    expect(logFiles(h.rootDir)).toEqual(["PASS_Foo_5.0_BuildXcodeWorkspaceScheme_App_generic-platform-iOS.log"]);
  });

  it("skips older versions with only-latest and removes their log", async () => {
    const h = createHarness({ only_latest_versions: true });
    const project = packageProject({
      compatibility: [
        { version: "4.2", commit: COMMIT_B },
        { version: "5.0", commit: COMMIT_A },
      ],
    });

    const result = await runCompatAction(
      { ctx: h.ctx, ports: h.ports },
      { project, version: project.compatibility[0], action: PACKAGE_ACTION },
    );

    expect(result).toBeNull();
    expect(logFiles(h.rootDir)).toEqual([]);
    expect(h.vcs.checkouts).toHaveLength(0);
    expect(h.lines).toEqual([]);
  });

  it("rejects a malformed revision before checking out", async () => {
    const h = createHarness();

    await expect(
      runCompatAction(
        { ctx: h.ctx, ports: h.ports },
        { project: packageProject(), version: { version: "5.0", commit: "abc123" }, action: PACKAGE_ACTION },
      ),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(h.vcs.checkouts).toHaveLength(0);
    expect(logFiles(h.rootDir)).toEqual(["Foo_5.0_BuildSwiftPackage.log"]);
  });

  it("marks the log FAIL when an unexpected error escapes the leaf", async () => {
    const h = createHarness({}, () => {
      throw new Error("disk on fire");
    });

    await expect(
      runCompatAction(
        { ctx: h.ctx, ports: h.ports },
        { project: packageProject(), version: VERSION, action: PACKAGE_ACTION },
      ),
    ).rejects.toThrow("disk on fire");
    expect(logFiles(h.rootDir)).toEqual(["FAIL_Foo_5.0_BuildSwiftPackage.log"]);
    const log = fs.readFileSync(path.join(h.rootDir, "logs", "FAIL_Foo_5.0_BuildSwiftPackage.log"), "utf8");
    expect(log.trimEnd().split("\n").pop()).toBe("error: disk on fire");
    expect(h.lines).toEqual([]);
  });

  it("treats an xfail rule on configuration without one as fatal", async () => {
    const h = createHarness();

    await expect(
      runCompatAction(
        { ctx: h.ctx, ports: h.ports },
        {
          project: packageProject(),
          version: VERSION,
          action: { action: "TestSwiftPackage", xfail: { issue: "SR-2", configuration: "debug" } },
        },
      ),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(h.vcs.checkouts).toHaveLength(0);
  });

  it("builds in the configured language mode without cleaning when asked", async () => {
    const h = createHarness({ swift_version: "4", skip_clean: true, strip_resource_phases: false });

    await runCompatAction(
      { ctx: h.ctx, ports: h.ports },
      { project: packageProject(), version: VERSION, action: PACKAGE_ACTION },
    );

    expect(h.vcs.checkouts[0].incremental).toBe(true);
    expect(h.buildTool.requests[0]).toMatchObject({
      swiftVersion: "4",
      incremental: true,
      stripResourcePhases: false,
    });
  });
});

describe("classifyLeaf", () => {
  it("covers the four outcomes", () => {
    expect(classifyLeaf("x", true, null).message).toBe("PASS: x");
    expect(classifyLeaf("x", false, null).message).toBe("FAIL: x");
    expect(classifyLeaf("x", false, "SR-1").message).toBe("XFAIL: SR-1, x");
    expect(classifyLeaf("x", true, "SR-1").message).toBe("UPASS: SR-1, x");
  });
});

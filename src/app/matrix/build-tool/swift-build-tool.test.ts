import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { commandStartsWith, createFakeRunner, MemoryLog } from "../../../__tests__/helpers/fake-runner.js";
import { ConfigError } from "../../../core/errors.js";
import type { ProjectAction, ProjectEntry } from "../../../core/project-index.js";

import {
  substituteFields,
  swiftVersionSetting,
  SwiftBuildTool,
  wrapInSandbox,
  type SwiftBuildToolOptions,
} from "./swift-build-tool.js";
import { TimeReporter } from "./time-reporter.js";

// =============================================================================
// HELPERS
// =============================================================================

const SWIFTC = "/tc/usr/bin/swiftc";

const SIGNING = [
  "CODE_SIGN_IDENTITY=",
  "CODE_SIGNING_REQUIRED=NO",
  "ENTITLEMENTS_REQUIRED=NO",
  "ENABLE_BITCODE=NO",
  "INDEX_ENABLE_DATA_STORE=NO",
  "GCC_TREAT_WARNINGS_AS_ERRORS=NO",
  "SWIFT_TREAT_WARNINGS_AS_ERRORS=NO",
];

function project(overrides: Partial<ProjectEntry> = {}): ProjectEntry {
  return {
    path: "Foo",
    repository: "Git",
    url: "https://example.invalid/foo.git",
    branch: "main",
    compatibility: [],
    actions: [],
    ...overrides,
  };
}

function buildTool(
  respond: Parameters<typeof createFakeRunner>[0],
  options: Partial<SwiftBuildToolOptions> = {},
) {
  const fake = createFakeRunner(respond);
  const tool = new SwiftBuildTool({
    runner: fake.runner,
    platform: "Darwin",
    swiftc: SWIFTC,
    swiftBranch: "main",
    ...options,
  });
  return { tool, fake };
}

function request(action: ProjectAction, overrides: { incremental?: boolean; swiftVersion?: string } = {}) {
  return {
    project: project(),
    action,
    projectDir: "/work/Foo",
    swiftVersion: overrides.swiftVersion,
    incremental: overrides.incremental ?? false,
    stripResourcePhases: false,
    log: new MemoryLog(),
  };
}

// =============================================================================
// TESTS
// =============================================================================

describe("SwiftBuildTool packages", () => {
  it("cleans then builds with the language mode and added flags", async () => {
    const { tool, fake } = buildTool(undefined, { addedSwiftFlags: "-Onone  -g" });

    await tool.dispatch(
      request({ action: "BuildSwiftPackage", configuration: "release" }, { swiftVersion: "4" }),
    );

    expect(fake.commands()).toEqual([
      "/tc/usr/bin/swift package --disable-sandbox --package-path /work/Foo clean",
      "/tc/usr/bin/swift build --disable-sandbox --package-path /work/Foo --verbose --configuration release -Xswiftc -swift-version -Xswiftc 4 -Xswiftc -Onone -Xswiftc -g",
    ]);
    expect(fake.requests[1]).toMatchObject({
      timeoutMs: 3_600_000,
      env: { DYLD_LIBRARY_PATH: "/tc/usr/lib/swift/macosx", SWIFT_EXEC: SWIFTC },
    });
  });

  it("skips the clean when incremental and the sandbox flag on old branches", async () => {
    const { tool, fake } = buildTool(undefined, {
      swiftBranch: "swift-3.1-branch",
      buildConfig: "debug",
      overrideSwiftExec: "/other/swiftc",
    });

    await tool.dispatch(
      request({ action: "BuildSwiftPackage", configuration: "release" }, { incremental: true }),
    );

    expect(fake.commands()).toEqual([
      "/tc/usr/bin/swift build --package-path /work/Foo --verbose --configuration debug",
    ]);
    expect(fake.requests[0].env).toEqual({
      DYLD_LIBRARY_PATH: "/tc/usr/lib/swift/macosx",
      SWIFT_EXEC: "/other/swiftc",
    });
  });

  it("runs package tests", async () => {
    const { tool, fake } = buildTool(undefined);

    await tool.dispatch(request({ action: "TestSwiftPackage" }));

    expect(fake.commands()).toEqual([
      "/tc/usr/bin/swift package --disable-sandbox --package-path /work/Foo clean",
      "/tc/usr/bin/swift test --disable-sandbox -C /work/Foo --verbose",
    ]);
  });

  it("rejects a package build with no configuration", async () => {
    const { tool, fake } = buildTool(undefined);

    await expect(
      tool.dispatch(request({ action: "BuildSwiftPackage" }, { incremental: true })),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(fake.requests).toHaveLength(0);
  });

  it("wraps package commands in the package sandbox profile", async () => {
    const { tool, fake } = buildTool(undefined, {
      platform: "Linux",
      sandboxProfilePackage: "/profiles/pkg.profile",
      sandboxProfileXcodebuild: "/profiles/xcode.profile",
    });

    await tool.dispatch(request({ action: "TestSwiftPackage" }, { incremental: true }));

    expect(fake.requests[0].command.slice(0, 7)).toEqual([
      "firejail",
      "--quiet",
      "--profile=/profiles/pkg.profile",
      "--private=.",
      "--overlay-tmpfs",
      "--dns=8.8.8.8",
      "/tc/usr/bin/swift",
    ]);
  });
});

describe("SwiftBuildTool xcode", () => {
  it("builds a workspace scheme into the repository build directory", async () => {
    const timeReporter = new TimeReporter("/tmp/times.json");
    const { tool, fake } = buildTool(
      (command) =>
        commandStartsWith(command, ["git", "-C", "/work/Foo", "rev-parse"]) ? { stdout: "/work/Foo\n" } : {},
      { timeReporter },
    );

    await tool.dispatch(
      request(
        {
          action: "BuildXcodeWorkspaceScheme",
          workspace: "App.xcworkspace",
          scheme: "App",
          destination: "generic/platform=iOS",
          configuration: "Release",
        },
        { swiftVersion: "5" },
      ),
    );

    expect(fake.requests).toHaveLength(2);
    expect(fake.requests[0].command).toEqual(["git", "-C", "/work/Foo", "rev-parse", "--show-toplevel"]);
    expect(fake.requests[1].command).toEqual([
      "xcodebuild",
      "clean",
      "build",
      "-workspace",
      "/work/Foo/App.xcworkspace",
      "-scheme",
      "App",
      "-destination",
      "generic/platform=iOS",
      "-derivedDataPath",
      "/work/Foo/build",
      ...SIGNING,
      `SWIFT_EXEC=${SWIFTC}`,
      "-IDEPackageSupportDisableManifestSandbox=YES",
      "-configuration",
      "Release",
      "SWIFT_VERSION=5",
      "OTHER_SWIFT_FLAGS=$(OTHER_SWIFT_FLAGS) -swift-version 5",
    ]);
    expect(Object.keys(timeReporter.snapshot())).toEqual(["App.compile_time"]);
  });

  it("builds pretargets first and falls back to a build directory beside the project", async () => {
    const { tool, fake } = buildTool(
      (command) => (commandStartsWith(command, ["git"]) ? { exitCode: 128 } : {}),
      { buildConfig: "debug", addedXcodebuildFlags: "-jobs 2 'OTHER_LDFLAGS={path} x'" },
    );

    await tool.dispatch(
      request({
        action: "BuildXcodeProjectTarget",
        project: "sub/App.xcodeproj",
        target: "App",
        destination: "generic/platform=watchOS",
        pretargets: ["Lib"],
        environment: { FOO: "bar" },
      }),
    );

    const flags = [
      `SWIFT_EXEC=${SWIFTC}`,
      "-IDEPackageSupportDisableManifestSandbox=YES",
      "-configuration",
      "Debug",
      "-jobs",
      "2",
      "OTHER_LDFLAGS=Foo x",
    ];
    expect(fake.requests).toHaveLength(3);
    expect(fake.requests[1].command).toEqual([
      "xcodebuild",
      "clean",
      "build",
      "-project",
      "/work/Foo/sub/App.xcodeproj",
      "-destination",
      "generic/platform=watchOS",
      "-target",
      "Lib",
      "SYMROOT=/work/Foo/sub/build",
      "FOO=bar",
      ...SIGNING,
      ...flags,
      "ARCHS=armv7k",
    ]);
    expect(fake.requests[2].command).toEqual([
      "xcodebuild",
      "build",
      "-project",
      "/work/Foo/sub/App.xcodeproj",
      "-target",
      "App",
      "-destination",
      "generic/platform=watchOS",
      "SYMROOT=/work/Foo/sub/build",
      "FOO=bar",
      ...SIGNING,
      ...flags,
      "ARCHS=armv7k",
    ]);
  });

  it("keeps an explicit SYMROOT from the action environment", async () => {
    const { tool, fake } = buildTool(undefined);

    await tool.dispatch(
      request(
        {
          action: "BuildXcodeProjectTarget",
          project: "App.xcodeproj",
          target: "App",
          destination: "generic/platform=macOS",
          environment: { SYMROOT: "/custom" },
          clean_build: false,
        },
        { incremental: false },
      ),
    );

    expect(fake.requests[1].command.slice(0, 9)).toEqual([
      "xcodebuild",
      "build",
      "-project",
      "/work/Foo/App.xcodeproj",
      "-target",
      "App",
      "-destination",
      "generic/platform=macOS",
      "SYMROOT=/custom",
    ]);
  });

  it("runs tests under the xcodebuild sandbox profile", async () => {
    const { tool, fake } = buildTool(undefined, {
      sandboxProfileXcodebuild: "/profiles/xcode.sb",
      sandboxProfilePackage: "/profiles/pkg.sb",
    });

    await tool.dispatch(
      request(
        {
          action: "TestXcodeProjectScheme",
          project: "App.xcodeproj",
          scheme: "AppTests",
          destination: "platform=iOS Simulator,name=iPhone 15",
        },
        { incremental: true },
      ),
    );

    expect(fake.requests).toHaveLength(1);
    expect(fake.requests[0].command).toEqual([
      "sandbox-exec",
      "-f",
      "/profiles/xcode.sb",
      "xcodebuild",
      "test",
      "-project",
      "/work/Foo/App.xcodeproj",
      "-scheme",
      "AppTests",
      "-destination",
      "platform=iOS Simulator,name=iPhone 15",
      "SWIFT_LIBRARY_PATH=/tc/usr/lib/swift/iphonesimulator",
      "INDEX_ENABLE_DATA_STORE=NO",
      "GCC_TREAT_WARNINGS_AS_ERRORS=NO",
      `SWIFT_EXEC=${SWIFTC}`,
      "-IDEPackageSupportDisableManifestSandbox=YES",
    ]);
  });

  it("strips resource phases from every project file before building", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "swift-build-tool-"));
    fs.mkdirSync(path.join(dir, "App.xcodeproj"));
    fs.writeFileSync(path.join(dir, "App.xcodeproj", "project.pbxproj"), "// pbx\n");
    const { tool, fake } = buildTool(undefined);

    await tool.dispatch({
      ...request({
        action: "BuildXcodeProjectTarget",
        project: "App.xcodeproj",
        target: "App",
        destination: "generic/platform=macOS",
      }),
      projectDir: dir,
      stripResourcePhases: true,
    });

    expect(fake.requests[0].command).toEqual([
      "perl",
      "-i",
      "-00ne",
      "print unless /Begin PBXResourcesBuildPhase/",
      path.join(dir, "App.xcodeproj", "project.pbxproj"),
    ]);
    expect(fake.requests[1].command[0]).toBe("git");
  });

  it("rejects unknown fields in added flags", async () => {
    const { tool } = buildTool(undefined, { addedSwiftFlags: "-D{nope}" });

    await expect(
      tool.dispatch(
        request({
          action: "BuildXcodeProjectTarget",
          project: "App.xcodeproj",
          target: "App",
          destination: "generic/platform=macOS",
        }),
      ),
    ).rejects.toThrow("Unknown field {nope}");
  });
});

describe("build state", () => {
  const { tool } = buildTool(undefined);

  it("locates package and xcode build directories", () => {
    expect(tool.buildStatePath("/work/Foo", { action: "BuildSwiftPackage" })).toBe("/work/Foo/.build");
    expect(
      tool.buildStatePath("/work/Foo", { action: "BuildXcodeProjectTarget", project: "sub/App.xcodeproj" }),
    ).toBe("/work/Foo/sub/build");
  });

  it("ignores tool bookkeeping files", () => {
    expect(tool.ignoredDifferences({ action: "BuildSwiftPackage" })).toContain("build.db");
    expect(tool.ignoredDifferences({ action: "BuildXcodeWorkspaceScheme" })).toContain("Logs");
  });
});

describe("helpers", () => {
  it("maps version labels to language modes", () => {
    expect(swiftVersionSetting("4")).toBe("4");
    expect(swiftVersionSetting("4.2")).toBe("4.2");
    expect(swiftVersionSetting("5.1")).toBe("5");
  });

  it("substitutes known fields", () => {
    expect(substituteFields("-D{path}_{scheme}", { path: "Foo", scheme: "App" })).toBe("-DFoo_App");
  });

  it("leaves commands alone without a profile or on other hosts", () => {
    expect(wrapInSandbox(["make"], undefined, "Darwin")).toEqual(["make"]);
    expect(wrapInSandbox(["make"], "/p", "Windows")).toEqual(["make"]);
  });
});

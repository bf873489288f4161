/**
 * SwiftBuildTool assembles `swift build|test` and `xcodebuild` invocations for index actions.
 * Purpose: default BuildTool for the CLI.
 * Assumptions: the toolchain layout is `<prefix>/bin/swiftc` with `swift` beside it and the
 *   runtime under `<prefix>/lib/swift/<platform>`.
 * Usage: new SwiftBuildTool({ runner, platform, swiftc, ... }).dispatch(request)
 */

import path from "node:path";

import fg from "fast-glob";

import type { CommandRunner } from "../../../core/command-runner.js";
import { CommandFailure, ConfigError } from "../../../core/errors.js";
import type { ProjectAction, ProjectEntry } from "../../../core/project-index.js";
import { splitShellWords, type PlatformName } from "../../../core/utils.js";

import {
  parseActionKind,
  type ActionKind,
  type BuildRequest,
  type BuildTool,
} from "./build-tool.js";
import type { TimeReporter } from "./time-reporter.js";

// =============================================================================
// TYPES
// =============================================================================

export type SwiftBuildToolOptions = {
  runner: CommandRunner;
  platform: PlatformName;
  swiftc: string;
  swiftBranch: string;
  buildConfig?: "debug" | "release";
  sandboxProfileXcodebuild?: string;
  sandboxProfilePackage?: string;
  /** Extra compiler flags; `{field}` is replaced from the project and action. */
  addedSwiftFlags?: string;
  addedXcodebuildFlags?: string;
  overrideSwiftExec?: string;
  timeReporter?: TimeReporter;
  maxRetries?: number;
};

type XcodeActionKind = Extract<ActionKind, { tool: "xcode" }>;

type XcodeTarget = {
  projectPath: string;
  target: string;
  destination: string;
  pretargets: string[];
  environment: Record<string, string>;
  flags: string[];
  kind: XcodeActionKind;
  cleanBuild: boolean;
};

const PACKAGE_TIMEOUT_MS = 60 * 60 * 1000;

// Old branches whose package manager predates --disable-sandbox.
const LEGACY_BRANCHES = new Set(["swift-3.0-branch", "swift-3.1-branch"]);

const STDLIB_PLATFORM_DIRS: ReadonlyArray<[string, string]> = [
  ["macOS", "macosx"],
  ["iOS", "iphonesimulator"],
  ["tvOS", "appletvsimulator"],
  ["watchOS", "watchsimulator"],
];

const SIGNING_OVERRIDES = [
  "CODE_SIGN_IDENTITY=",
  "CODE_SIGNING_REQUIRED=NO",
  "ENTITLEMENTS_REQUIRED=NO",
  "ENABLE_BITCODE=NO",
  "INDEX_ENABLE_DATA_STORE=NO",
  "GCC_TREAT_WARNINGS_AS_ERRORS=NO",
  "SWIFT_TREAT_WARNINGS_AS_ERRORS=NO",
];

const PACKAGE_IGNORED = ["ModuleCache", "build.db", "master.swiftdeps", "master.swiftdeps~"];
const XCODE_IGNORED = [
  "ModuleCache",
  "Logs",
  "info.plist",
  "dgph",
  "dgph~",
  "master.swiftdeps",
  "master.swiftdeps~",
];

// =============================================================================
// BUILD TOOL
// =============================================================================

export class SwiftBuildTool implements BuildTool {
  constructor(private readonly options: SwiftBuildToolOptions) {}

  async dispatch(request: BuildRequest): Promise<void> {
    const kind = parseActionKind(request.action.action);
    const fields = substitutionFields(request.project, request.action);

    if (kind.tool === "package") {
      const addedSwiftFlags = this.options.addedSwiftFlags
        ? substituteFields(this.options.addedSwiftFlags, fields).split(/\s+/).filter(Boolean)
        : [];
      if (kind.verb === "Build") {
        await this.buildPackage(request, addedSwiftFlags);
      } else {
        await this.testPackage(request, addedSwiftFlags);
      }
      return;
    }

    const target = this.xcodeTarget(request, kind, fields);
    if (request.stripResourcePhases) {
      await this.stripResourcePhases(request);
    }
    if (kind.verb === "Build") {
      await this.buildXcode(request, target);
    } else {
      await this.testXcode(request, target);
    }
  }

  buildStatePath(projectDir: string, action: ProjectAction): string {
    const kind = parseActionKind(action.action);
    if (kind.tool === "package") {
      return path.join(projectDir, ".build");
    }
    const container = requireField(action, kind.container);
    return path.join(path.dirname(path.join(projectDir, container)), "build");
  }

  ignoredDifferences(action: ProjectAction): readonly string[] {
    return parseActionKind(action.action).tool === "package" ? PACKAGE_IGNORED : XCODE_IGNORED;
  }

  // ===========================================================================
  // PACKAGES
  // ===========================================================================

  private get swift(): string {
    return path.join(path.dirname(this.options.swiftc), "swift");
  }

  private get swiftExec(): string {
    return this.options.overrideSwiftExec ?? this.options.swiftc;
  }

  private async cleanPackage(request: BuildRequest): Promise<void> {
    const command = this.withSandboxFlag([this.swift, "package", "--package-path", request.projectDir, "clean"]);
    await this.run(command, request, { sandboxProfile: this.options.sandboxProfilePackage });
  }

  private async buildPackage(request: BuildRequest, addedSwiftFlags: string[]): Promise<void> {
    if (!request.incremental) {
      await this.cleanPackage(request);
    }

    const configuration = this.options.buildConfig ?? request.action.configuration;
    if (!configuration) {
      throw new ConfigError(
        `${request.project.path}: BuildSwiftPackage needs a 'configuration' field or --build-config`,
      );
    }

    const command = this.withSandboxFlag([
      this.swift,
      "build",
      "--package-path",
      request.projectDir,
      "--verbose",
      "--configuration",
      configuration,
    ]);
    if (request.swiftVersion) {
      const version = swiftVersionSetting(request.swiftVersion);
      command.push("-Xswiftc", "-swift-version", "-Xswiftc", version);
    }
    for (const flag of addedSwiftFlags) {
      command.push("-Xswiftc", flag);
    }

    await this.run(command, request, {
      sandboxProfile: this.options.sandboxProfilePackage,
      timeoutMs: PACKAGE_TIMEOUT_MS,
      env: {
        DYLD_LIBRARY_PATH: stdlibPlatformPath(this.options.swiftc, "macOS"),
        SWIFT_EXEC: this.swiftExec,
      },
    });
  }

  private async testPackage(request: BuildRequest, addedSwiftFlags: string[]): Promise<void> {
    if (!request.incremental) {
      await this.cleanPackage(request);
    }

    const command = this.withSandboxFlag([this.swift, "test", "-C", request.projectDir, "--verbose"]);
    for (const flag of addedSwiftFlags) {
      command.push("-Xswiftc", flag);
    }

    await this.run(command, request, {
      sandboxProfile: this.options.sandboxProfilePackage,
      timeoutMs: PACKAGE_TIMEOUT_MS,
      env: { SWIFT_EXEC: this.swiftExec },
    });
  }

  private withSandboxFlag(command: string[]): string[] {
    if (LEGACY_BRANCHES.has(this.options.swiftBranch)) return command;
    return [...command.slice(0, 2), "--disable-sandbox", ...command.slice(2)];
  }

  // ===========================================================================
  // XCODE
  // ===========================================================================

  private xcodeTarget(
    request: BuildRequest,
    kind: XcodeActionKind,
    fields: Record<string, string>,
  ): XcodeTarget {
    const { action } = request;
    const flags = [`SWIFT_EXEC=${this.swiftExec}`, "-IDEPackageSupportDisableManifestSandbox=YES"];

    if (this.options.buildConfig === "debug") {
      flags.push("-configuration", "Debug");
    } else if (this.options.buildConfig === "release") {
      flags.push("-configuration", "Release");
    } else if (action.configuration) {
      flags.push("-configuration", action.configuration);
    }

    const otherSwiftFlags: string[] = [];
    if (request.swiftVersion) {
      const version = swiftVersionSetting(request.swiftVersion);
      otherSwiftFlags.push("-swift-version", version);
      flags.push(`SWIFT_VERSION=${version}`);
    }
    if (this.options.addedSwiftFlags) {
      otherSwiftFlags.push(substituteFields(this.options.addedSwiftFlags, fields));
    }
    if (otherSwiftFlags.length > 0) {
      flags.push(`OTHER_SWIFT_FLAGS=${["$(OTHER_SWIFT_FLAGS)", ...otherSwiftFlags].join(" ")}`);
    }

    if (this.options.addedXcodebuildFlags) {
      flags.push(...splitShellWords(substituteFields(this.options.addedXcodebuildFlags, fields)));
    }

    return {
      projectPath: path.join(request.projectDir, requireField(action, kind.container)),
      target: requireField(action, kind.selector),
      destination: requireField(action, "destination"),
      pretargets: action.pretargets ?? [],
      environment: action.environment ?? {},
      flags,
      kind,
      cleanBuild: action.clean_build ?? true,
    };
  }

  private async buildXcode(request: BuildRequest, target: XcodeTarget): Promise<void> {
    const buildDir = await this.xcodeBuildDir(request, target);

    if (target.pretargets.length > 0) {
      const verbs: string[] = [];
      if (target.cleanBuild && !request.incremental) verbs.push("clean");
      verbs.push("build");
      const pretargetParams = target.pretargets.flatMap((pretarget) => [
        selectorParam(target.kind),
        pretarget,
      ]);
      await this.run(
        [
          "xcodebuild",
          ...verbs,
          containerParam(target.kind),
          target.projectPath,
          "-destination",
          target.destination,
          ...pretargetParams,
          ...directoryOverrides(target, buildDir),
          ...SIGNING_OVERRIDES,
          ...target.flags,
          ...watchOsArchs(target.destination),
        ],
        request,
        { sandboxProfile: this.options.sandboxProfileXcodebuild },
      );
    }

    const verbs: string[] = [];
    if (target.cleanBuild && !request.incremental && target.pretargets.length === 0) {
      verbs.push("clean");
    }
    verbs.push("build");

    const startedAt = Date.now();
    await this.run(
      [
        "xcodebuild",
        ...verbs,
        containerParam(target.kind),
        target.projectPath,
        selectorParam(target.kind),
        target.target,
        "-destination",
        target.destination,
        ...directoryOverrides(target, buildDir),
        ...SIGNING_OVERRIDES,
        ...target.flags,
        ...watchOsArchs(target.destination),
      ],
      request,
      { sandboxProfile: this.options.sandboxProfileXcodebuild },
    );

    this.options.timeReporter?.update(target.target, (Date.now() - startedAt) / 1000);
  }

  private async testXcode(request: BuildRequest, target: XcodeTarget): Promise<void> {
    await this.run(
      [
        "xcodebuild",
        ...(request.incremental ? ["test"] : ["clean", "test"]),
        containerParam(target.kind),
        target.projectPath,
        selectorParam(target.kind),
        target.target,
        "-destination",
        target.destination,
        `SWIFT_LIBRARY_PATH=${stdlibPlatformPath(this.options.swiftc, target.destination)}`,
        "INDEX_ENABLE_DATA_STORE=NO",
        "GCC_TREAT_WARNINGS_AS_ERRORS=NO",
        ...target.flags,
      ],
      request,
      { sandboxProfile: this.options.sandboxProfileXcodebuild },
    );
  }

  // Builds land in `<repository root>/build`; outside a git checkout, beside the project file.
  private async xcodeBuildDir(request: BuildRequest, target: XcodeTarget): Promise<string> {
    const projectParent = path.dirname(target.projectPath);
    try {
      const toplevel = await this.options.runner.output(
        ["git", "-C", projectParent, "rev-parse", "--show-toplevel"],
        { log: request.log, signal: request.signal },
      );
      return path.join(toplevel.trimEnd(), "build");
    } catch (err) {
      if (!(err instanceof CommandFailure)) throw err;
      return path.join(projectParent, "build");
    }
  }

  private async stripResourcePhases(request: BuildRequest): Promise<void> {
    const pbxprojFiles = await fg("**/project.pbxproj", {
      cwd: request.projectDir,
      absolute: true,
      dot: true,
    });
    for (const file of pbxprojFiles.sort()) {
      await this.run(
        ["perl", "-i", "-00ne", "print unless /Begin PBXResourcesBuildPhase/", file],
        request,
        {},
      );
    }
  }

  // ===========================================================================
  // EXECUTION
  // ===========================================================================

  private async run(
    command: string[],
    request: BuildRequest,
    opts: { sandboxProfile?: string; timeoutMs?: number; env?: Record<string, string> },
  ): Promise<void> {
    await this.options.runner.run(wrapInSandbox(command, opts.sandboxProfile, this.options.platform), {
      log: request.log,
      signal: request.signal,
      timeoutMs: opts.timeoutMs,
      env: opts.env,
      maxRetries: this.options.maxRetries,
    });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function wrapInSandbox(
  command: string[],
  profile: string | undefined,
  platform: PlatformName,
): string[] {
  if (!profile) return command;
  if (platform === "Darwin") {
    return ["sandbox-exec", "-f", profile, ...command];
  }
  if (platform === "Linux") {
    return [
      "firejail",
      "--quiet",
      `--profile=${profile}`,
      "--private=.",
      "--overlay-tmpfs",
      "--dns=8.8.8.8",
      ...command,
    ];
  }
  return command;
}

/**
 * The `-swift-version` value for a version label: the major version, except that 4.2 is
 * passed through in full.
 */
export function swiftVersionSetting(label: string): string {
  const normalized = label.includes(".") ? label : `${label}.0`;
  const dot = normalized.indexOf(".");
  const major = normalized.slice(0, dot);
  const minor = normalized.slice(dot + 1);
  if (Number(major) === 4 && Number.parseFloat(minor) === 2) {
    return normalized;
  }
  return major;
}

export function stdlibPlatformPath(swiftc: string, destination: string): string {
  const entry = STDLIB_PLATFORM_DIRS.find(([key]) => destination.includes(key));
  if (!entry) {
    throw new ConfigError(`No runtime library directory known for destination ${destination}`);
  }
  return path.join(path.dirname(path.dirname(swiftc)), "lib", "swift", entry[1]);
}

/** Replaces `{field}` with the project's (or else the action's) string field. */
export function substituteFields(template: string, fields: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = fields[name];
    if (value === undefined) {
      throw new ConfigError(`Unknown field {${name}} in added flags: ${template}`);
    }
    return value;
  });
}

function substitutionFields(project: ProjectEntry, action: ProjectAction): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const source of [action, project]) {
    for (const [key, value] of Object.entries(source)) {
      if (typeof value === "string") fields[key] = value;
    }
  }
  return fields;
}

function requireField(action: ProjectAction, field: string): string {
  const value = action[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`Action ${action.action} is missing its '${field}' field`);
  }
  return value;
}

function containerParam(kind: XcodeActionKind): string {
  return kind.container === "workspace" ? "-workspace" : "-project";
}

function selectorParam(kind: XcodeActionKind): string {
  return kind.selector === "scheme" ? "-scheme" : "-target";
}

function directoryOverrides(target: XcodeTarget, buildDir: string): string[] {
  const overrides: string[] = [];
  if (target.kind.selector === "scheme") {
    overrides.push("-derivedDataPath", buildDir);
  } else if (!("SYMROOT" in target.environment)) {
    overrides.push(`SYMROOT=${buildDir}`);
  }
  for (const [key, value] of Object.entries(target.environment)) {
    overrides.push(`${key}=${value}`);
  }
  return overrides;
}

function watchOsArchs(destination: string): string[] {
  return destination === "generic/platform=watchOS" ? ["ARCHS=armv7k"] : [];
}

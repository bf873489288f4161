import { InvalidArgumentError, type Command } from "commander";

// =============================================================================
// PARSERS
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off"]);

export function parseBool(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_WORDS.has(normalized)) return true;
  if (FALSE_WORDS.has(normalized)) return false;
  throw new InvalidArgumentError(`Expected a boolean, got "${value}".`);
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

// =============================================================================
// OPTION GROUPS
// =============================================================================

/** Options shared by `run` and `incremental`. Defaults live in the config schema, not here. */
export function addToolchainOptions(command: Command): Command {
  return command
    .option("--config <path>", "YAML file with defaults for any option below")
    .option("--swiftc <path>", "Compiler under test")
    .option("--projects <path>", "Project index (JSON)")
    .option("--swift-version <version>", "Language mode to build in (default: each version label)")
    .option("--swift-branch <branch>", "Branch of the toolchain, matched by xfail rules (default: main)")
    .option("--job-type <type>", "Job type matched by xfail rules (default: source-compat)")
    .option("--build-config <config>", "Force debug or release builds")
    .option("--include-repos <predicate>", "Only run projects matching the predicate", collect)
    .option("--exclude-repos <predicate>", "Skip projects matching the predicate", collect)
    .option("--include-actions <predicate>", "Only run actions matching the predicate", collect)
    .option("--exclude-actions <predicate>", "Skip actions matching the predicate", collect)
    .option("--sandbox-profile-xcodebuild <path>", "Sandbox profile for xcodebuild commands")
    .option("--sandbox-profile-package <path>", "Sandbox profile for package commands")
    .option("--add-swift-flags <flags>", "Extra compiler flags; {field} is replaced from the project")
    .option("--add-xcodebuild-flags <flags>", "Extra xcodebuild arguments; {field} is replaced")
    .option("--override-swift-exec <path>", "Compiler used for builds instead of --swiftc")
    .option("--strip-resource-phases [bool]", "Strip resource phases from Xcode projects", parseBool)
    .option("--default-timeout <seconds>", "Deadline for each command", parsePositiveInt)
    .option("--max-retries <n>", "Attempts per command", parsePositiveInt)
    .option("-j, --jobs <n>", "Projects built in parallel (default: CPU count)", parsePositiveInt)
    .option("--project-cache-path <path>", "Where project checkouts are kept")
    .option("--log-dir <path>", "Where leaf logs and the run event log are written")
    .option("--report-time-path <path>", "Write Xcode compile times as JSON")
    .option("--verbose", "Stream command output instead of writing leaf logs")
    .option("--debug", "Show stack traces and error causes");
}

export function addVersionOptions(command: Command): Command {
  return command
    .option("--include-versions <predicate>", "Only run versions matching the predicate", collect)
    .option("--exclude-versions <predicate>", "Skip versions matching the predicate", collect)
    .option("--skip-clean", "Build incrementally without cleaning checkouts")
    .option("--only-latest-versions", "Only run the newest version of each project");
}

export function addDeterminismOptions(command: Command): Command {
  return command
    .option("--verify-determinism", "Compare each incremental build with a full build")
    .option("--expect-determinism", "Fail when they differ")
    .option("--settle-ms <ms>", "Pause around each build (default: 2000)", parseNonNegativeInt);
}

// =============================================================================
// CONFIG OVERRIDES
// =============================================================================

const NON_CONFIG_OPTIONS = new Set(["config", "debug"]);

/** Commander's camelCase option values as snake_case config keys; unset options are dropped. */
export function toConfigOverrides(opts: Record<string, unknown>): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(opts)) {
    if (value === undefined || NON_CONFIG_OPTIONS.has(key)) continue;
    overrides[key.replace(/[A-Z]/g, (ch) => `_${ch.toLowerCase()}`)] = value;
  }
  return overrides;
}

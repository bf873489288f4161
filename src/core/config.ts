import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import yaml from "js-yaml";
import { z, type ZodIssue } from "zod";

import { ConfigError } from "./errors.js";

// =============================================================================
// SCHEMA
// =============================================================================

const PredicateListSchema = z.array(z.string().min(1)).default([]);

export const MatrixConfigSchema = z.object({
  // Toolchain under test
  swiftc: z.string().min(1),
  swift_version: z.string().min(1).optional(),
  override_swift_exec: z.string().min(1).optional(),

  // Project index and selection
  projects: z.string().min(1),
  include_repos: PredicateListSchema,
  exclude_repos: PredicateListSchema,
  include_versions: PredicateListSchema,
  exclude_versions: PredicateListSchema,
  include_actions: PredicateListSchema,
  exclude_actions: PredicateListSchema,
  only_latest_versions: z.boolean().default(false),

  // Xfail context
  swift_branch: z.string().min(1).default("main"),
  job_type: z.string().min(1).default("source-compat"),
  build_config: z.enum(["debug", "release"]).optional(),

  // Build behaviour
  skip_clean: z.boolean().default(false),
  strip_resource_phases: z.boolean().default(true),
  sandbox_profile_xcodebuild: z.string().min(1).optional(),
  sandbox_profile_package: z.string().min(1).optional(),
  add_swift_flags: z.string().default(""),
  add_xcodebuild_flags: z.string().default(""),

  // Execution
  default_timeout: z.number().int().positive().default(600),
  max_retries: z.number().int().positive().default(1),
  jobs: z.number().int().positive().optional(),

  // Output
  project_cache_path: z.string().min(1).default("project_cache"),
  log_dir: z.string().min(1).default("."),
  report_time_path: z.string().min(1).optional(),
  verbose: z.boolean().default(false),

  // Incremental determinism checks
  verify_determinism: z.boolean().default(false),
  expect_determinism: z.boolean().default(false),
  settle_ms: z.number().int().nonnegative().default(2000),
});

type ParsedMatrixConfig = z.infer<typeof MatrixConfigSchema>;

/** Fully resolved: absolute paths, worker count decided. */
export type MatrixConfig = Omit<ParsedMatrixConfig, "jobs"> & { jobs: number };

export type ResolveConfigInput = {
  /** Values from CLI flags; undefined entries fall through to the file and defaults. */
  overrides: Record<string, unknown>;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

// =============================================================================
// RESOLUTION
// =============================================================================

export function resolveMatrixConfig(input: ResolveConfigInput): MatrixConfig {
  const env = input.env ?? process.env;
  const cwd = input.cwd ?? process.cwd();

  const fromFile = input.configPath ? loadConfigFile(input.configPath, env) : {};
  const merged: Record<string, unknown> = { ...fromFile };
  for (const [key, value] of Object.entries(input.overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = MatrixConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const source = input.configPath ? ` (${path.resolve(cwd, input.configPath)})` : "";
    throw new ConfigError(
      `Invalid run configuration${source}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const cfg = parsed.data;
  return {
    ...cfg,
    swiftc: path.resolve(cwd, cfg.swiftc),
    projects: path.resolve(cwd, cfg.projects),
    project_cache_path: privateWorkspacePath(cfg.project_cache_path, env, cwd),
    log_dir: path.resolve(cwd, cfg.log_dir),
    report_time_path: cfg.report_time_path ? path.resolve(cwd, cfg.report_time_path) : undefined,
    jobs: cfg.jobs ?? Math.max(1, os.cpus().length),
  };
}

/**
 * CI hosts set WORKSPACE; checkouts then live beside it in a private workspace
 * (`<parent of parent>/workspace-private/<name>/<p>`).
 */
export function privateWorkspacePath(p: string, env: NodeJS.ProcessEnv, cwd: string): string {
  const workspace = env.WORKSPACE;
  if (!workspace) {
    return path.resolve(cwd, p);
  }
  return path.resolve(
    cwd,
    path.dirname(path.dirname(workspace)),
    "workspace-private",
    path.basename(workspace),
    p,
  );
}

// =============================================================================
// CONFIG FILE
// =============================================================================

export function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const absolutePath = path.resolve(configPath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read run config at ${absolutePath}`, err);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML config at ${absolutePath}: ${detail}`, err);
  }

  if (doc === undefined || doc === null) {
    return {};
  }
  if (typeof doc !== "object" || Array.isArray(doc)) {
    throw new ConfigError(`Run config at ${absolutePath} must be a mapping`);
  }

  const expanded = expandEnv(doc, { file: absolutePath, trail: [], env });
  return isRecord(expanded) ? expanded : {};
}

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }));
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// INTERNALS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

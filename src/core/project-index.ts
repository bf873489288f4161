import fs from "node:fs";
import path from "node:path";

import { z, type ZodIssue } from "zod";

import { ConfigError } from "./errors.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const COMMIT_PATTERN = /^[0-9a-fA-F]{40}$/;
const VERSION_LABEL_PATTERN = /^\d+(\.\d+)*$/;

const StringOrListSchema = z.union([z.string(), z.array(z.string())]);

const CommitSchema = z
  .string()
  .regex(COMMIT_PATTERN, "commit must be a full 40-character hexadecimal revision");

export const XfailRuleSchema = z
  .object({
    issue: z.string().min(1),
    compatibility: StringOrListSchema.optional(),
    branch: StringOrListSchema.optional(),
    platform: StringOrListSchema.optional(),
    configuration: StringOrListSchema.optional(),
    job: StringOrListSchema.optional(),
  })
  .passthrough();

export const XfailSpecSchema = z.union([XfailRuleSchema, z.array(XfailRuleSchema)]);

export const ActionSchema = z
  .object({
    action: z.string().min(1),
    configuration: z.string().optional(),
    workspace: z.string().optional(),
    project: z.string().optional(),
    scheme: z.string().optional(),
    target: z.string().optional(),
    destination: z.string().optional(),
    environment: z.record(z.string()).optional(),
    pretargets: z.array(z.string()).optional(),
    clean_build: z.boolean().optional(),
    xfail: XfailSpecSchema.optional(),
  })
  .passthrough();

export const VersionSchema = z
  .object({
    version: z.string().regex(VERSION_LABEL_PATTERN, "version must be a dot-separated number"),
    commit: CommitSchema,
  })
  .passthrough();

export const IncrementalSequenceSchema = z.object({
  commits: z.array(CommitSchema).min(1),
  limit: z.record(z.string()).optional(),
});

export const ProjectEntrySchema = z
  .object({
    path: z.string().min(1),
    repository: z.string().min(1),
    url: z.string().min(1),
    branch: z.string().min(1),
    maintainer: z.string().optional(),
    platforms: z.array(z.string()).optional(),
    compatibility: z.array(VersionSchema),
    actions: z.array(ActionSchema),
    incremental: z.record(IncrementalSequenceSchema).optional(),
  })
  .passthrough();

export const ProjectIndexSchema = z.array(ProjectEntrySchema);

export type XfailRule = z.infer<typeof XfailRuleSchema>;
export type XfailSpec = z.infer<typeof XfailSpecSchema>;
export type ProjectAction = z.infer<typeof ActionSchema>;
export type ProjectVersion = z.infer<typeof VersionSchema>;
export type IncrementalSequence = z.infer<typeof IncrementalSequenceSchema>;
export type ProjectEntry = z.infer<typeof ProjectEntrySchema>;
export type ProjectIndex = z.infer<typeof ProjectIndexSchema>;

// =============================================================================
// LOADING
// =============================================================================

export function loadProjectIndex(indexPath: string): ProjectIndex {
  const absolutePath = path.resolve(indexPath);

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read project index at ${absolutePath}`, err);
  }

  return parseProjectIndex(raw, absolutePath);
}

export function parseProjectIndex(raw: string, source = "<inline>"): ProjectIndex {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse project index at ${source}: ${detail}`, err);
  }

  const parsed = ProjectIndexSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid project index at ${source}:\n${formatIssues(parsed.error.issues, doc)}`,
      parsed.error,
    );
  }

  assertUniquePaths(parsed.data, source);
  return parsed.data;
}

/** Re-checked at every leaf so programmatic callers get the same guarantee as the loader. */
export function assertCommitRevision(commit: string, context: string): void {
  if (!COMMIT_PATTERN.test(commit)) {
    throw new ConfigError(
      `Invalid commit revision for ${context}: ${JSON.stringify(commit)} (expected 40 hex characters)`,
    );
  }
}

/** Numeric comparison of dot-separated version labels ("4.10" > "4.2"). */
export function compareVersionLabels(a: string, b: string): number {
  const left = a.split(".").map(Number);
  const right = b.split(".").map(Number);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function latestVersionLabel(project: ProjectEntry): string | undefined {
  const labels = project.compatibility.map((version) => version.version);
  const sorted = labels.sort(compareVersionLabels);
  return sorted.length > 0 ? sorted[sorted.length - 1] : undefined;
}

// =============================================================================
// FORMATTING
// =============================================================================

/** Canonical on-disk form of an index: sorted by path, two-space indentation. */
export function formatProjectIndex(raw: string, source = "<inline>"): string {
  parseProjectIndex(raw, source);

  const doc: unknown = JSON.parse(raw);
  if (!Array.isArray(doc)) {
    throw new ConfigError(`Project index at ${source} must be a JSON array`);
  }

  const sorted = [...doc].sort((a: unknown, b: unknown) => {
    const left = entryPath(a);
    const right = entryPath(b);
    return left < right ? -1 : left > right ? 1 : 0;
  });

  return `${JSON.stringify(sorted, null, 2)}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function entryPath(entry: unknown): string {
  if (entry && typeof entry === "object" && "path" in entry && typeof entry.path === "string") {
    return entry.path;
  }
  return "";
}

function assertUniquePaths(index: ProjectIndex, source: string): void {
  const seen = new Set<string>();
  for (const entry of index) {
    if (seen.has(entry.path)) {
      throw new ConfigError(`Duplicate project path ${JSON.stringify(entry.path)} in ${source}`);
    }
    seen.add(entry.path);
  }
}

function formatIssues(issues: ZodIssue[], doc: unknown): string {
  return issues
    .map((issue) => {
      const location = describeLocation(issue.path, doc);

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

// Prefixes the zod path with the project's `path` so errors point at a named entry.
function describeLocation(issuePath: (string | number)[], doc: unknown): string {
  if (issuePath.length === 0) return "<root>";

  const [first, ...rest] = issuePath;
  if (typeof first !== "number" || !Array.isArray(doc)) return issuePath.join(".");

  const name = entryPath(doc[first]);
  const head = name ? `${first} (${name})` : `${first}`;
  return rest.length > 0 ? `${head}.${rest.join(".")}` : head;
}

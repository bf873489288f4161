import { ConfigError } from "./errors.js";
import type { XfailRule, XfailSpec } from "./project-index.js";

export type XfailContext = {
  compatibility: string;
  branch: string;
  platform: string;
  job: string;
  /** CLI build configuration, falling back to the action's own; only needed by some rules. */
  configuration?: string;
};

type MatchField = "compatibility" | "branch" | "platform" | "job" | "configuration";

const CONTEXT_FIELDS: readonly Exclude<MatchField, "configuration">[] = [
  "compatibility",
  "branch",
  "platform",
  "job",
];

/**
 * Returns the issue id (first token of `issue`) of the first rule matching the context,
 * or null when the outcome is not expected to fail.
 */
export function resolveXfail(spec: XfailSpec | undefined, context: XfailContext): string | null {
  if (spec === undefined) return null;

  const rules = Array.isArray(spec) ? spec : [spec];
  for (const rule of rules) {
    if (ruleMatches(rule, context)) {
      return issueId(rule);
    }
  }
  return null;
}

export function issueId(rule: XfailRule): string {
  return rule.issue.trim().split(/\s+/)[0];
}

function ruleMatches(rule: XfailRule, context: XfailContext): boolean {
  if (rule.configuration !== undefined) {
    if (context.configuration === undefined) {
      throw new ConfigError(
        `xfail rule ${JSON.stringify(rule.issue)} constrains 'configuration' but none was ` +
          "supplied via --build-config or the action's 'configuration' field",
      );
    }
    if (!fieldMatches(rule.configuration, context.configuration.toLowerCase())) return false;
  }

  return CONTEXT_FIELDS.every((field) => fieldMatches(rule[field], context[field]));
}

function fieldMatches(expected: string | string[] | undefined, actual: string): boolean {
  if (expected === undefined) return true;
  return Array.isArray(expected) ? expected.includes(actual) : expected === actual;
}

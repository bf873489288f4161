/*
Purpose: the PASS / FAIL / XFAIL / UPASS taxonomy and how outcomes compose up the dispatch tree.
Assumptions: results are plain immutable values; composites only ever grow by producing new values.
Usage: addResult(createComposite("version"), actionResult("PASS", "PASS: ...")); resultKind(r).
*/

// =============================================================================
// TYPES
// =============================================================================

export type ResultKind = "PASS" | "FAIL" | "XFAIL" | "UPASS";

/** Highest precedence first. A composite takes the first kind that has any child. */
export const KIND_PRECEDENCE: readonly ResultKind[] = ["FAIL", "UPASS", "XFAIL", "PASS"];

export type CompositeLevel = "version" | "project" | "project-list";

export type ActionResult = {
  type: "action";
  kind: ResultKind;
  message: string;
};

export type KindBuckets = Record<ResultKind, readonly Result[]>;

export type CompositeResult = {
  type: "composite";
  level: CompositeLevel;
  buckets: KindBuckets;
};

export type Result = ActionResult | CompositeResult;

export type KindCounts = Record<ResultKind, number>;

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function actionResult(kind: ResultKind, message: string): ActionResult {
  return { type: "action", kind, message };
}

export function createComposite(level: CompositeLevel): CompositeResult {
  return { type: "composite", level, buckets: emptyBuckets() };
}

/** Buckets the child by its own effective kind. */
export function addResult(composite: CompositeResult, child: Result): CompositeResult {
  const kind = resultKind(child);
  return {
    ...composite,
    buckets: { ...composite.buckets, [kind]: [...composite.buckets[kind], child] },
  };
}

/** Concatenates corresponding buckets; the level of `a` is kept. */
export function mergeResults(a: CompositeResult, b: CompositeResult): CompositeResult {
  const buckets = emptyBuckets();
  for (const kind of KIND_PRECEDENCE) {
    buckets[kind] = [...a.buckets[kind], ...b.buckets[kind]];
  }
  return { type: "composite", level: a.level, buckets };
}

// =============================================================================
// QUERIES
// =============================================================================

export function resultKind(result: Result): ResultKind {
  if (result.type === "action") return result.kind;

  for (const kind of KIND_PRECEDENCE) {
    if (result.buckets[kind].length > 0) return kind;
  }
  return "PASS";
}

/** Direct children, in precedence bucket order. */
export function childResults(composite: CompositeResult): Result[] {
  return KIND_PRECEDENCE.flatMap((kind) => composite.buckets[kind]);
}

/** Every leaf under `result`, depth first. */
export function leafResults(result: Result): ActionResult[] {
  if (result.type === "action") return [result];
  return childResults(result).flatMap(leafResults);
}

export function countLeaves(result: Result): KindCounts {
  const counts: KindCounts = { PASS: 0, FAIL: 0, XFAIL: 0, UPASS: 0 };
  for (const leaf of leafResults(result)) {
    counts[leaf.kind] += 1;
  }
  return counts;
}

/** A run succeeds when nothing failed and nothing unexpectedly passed. */
export function isSuccessfulKind(kind: ResultKind): boolean {
  return kind === "PASS" || kind === "XFAIL";
}

// =============================================================================
// SUMMARY
// =============================================================================

const RULE = "=".repeat(40);

export function formatSummary(result: CompositeResult): string {
  const leaves = leafResults(result);
  const byKind = (kind: ResultKind) => leaves.filter((leaf) => leaf.kind === kind);

  const xfails = byKind("XFAIL");
  const upasses = byKind("UPASS");
  const fails = byKind("FAIL");
  const passes = byKind("PASS");

  const lines: string[] = [];
  const section = (title: string, items: ActionResult[]) => {
    if (items.length === 0) return;
    lines.push(RULE, title, ...items.map((item) => `  ${item.message}`));
  };

  section("XFailures:", xfails);
  section("UPasses:", upasses);
  section("Failures:", fails);

  lines.push(
    RULE,
    "Action Summary:",
    `     Passed: ${passes.length}`,
    `     Failed: ${fails.length}`,
    `    XFailed: ${xfails.length}`,
    `    UPassed: ${upasses.length}`,
    `      Total: ${leaves.length}`,
    RULE,
    "Repository Summary:",
    `      Total: ${childResults(result).length}`,
    RULE,
    `Result: ${resultKind(result)}`,
    RULE,
  );

  return lines.join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function emptyBuckets(): Record<ResultKind, Result[]> {
  return { FAIL: [], UPASS: [], XFAIL: [], PASS: [] };
}

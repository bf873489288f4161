import { describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { compilePredicates, evaluatePredicate, included, parsePredicate } from "./predicate.js";

const project = { path: "Alamofire", repository: "Git", branch: "main" };
const action = {
  action: "BuildXcodeWorkspaceScheme",
  workspace: "Alamofire.xcworkspace",
  scheme: "Alamofire iOS",
  configuration: "Release",
};

function matches(source: string, entity: Record<string, unknown>): boolean {
  return evaluatePredicate(parsePredicate(source), entity);
}

describe("evaluatePredicate", () => {
  it("compares fields with string literals", () => {
    expect(matches(`path == "Alamofire"`, project)).toBe(true);
    expect(matches(`path == 'Kingfisher'`, project)).toBe(false);
    expect(matches(`path != "Kingfisher"`, project)).toBe(true);
  });

  it("supports list and tuple membership", () => {
    expect(matches(`configuration in ["Debug", "Release"]`, action)).toBe(true);
    expect(matches(`configuration not in ("Debug", "Release")`, action)).toBe(false);
    expect(matches(`"iOS" in scheme`, action)).toBe(true);
  });

  it("combines with and, or, not and parentheses", () => {
    expect(matches(`action == "BuildSwiftPackage" or scheme == "Alamofire iOS"`, action)).toBe(true);
    expect(matches(`not (configuration == "Release" and scheme == "Alamofire iOS")`, action)).toBe(
      false,
    );
    expect(matches(`not configuration == "Debug"`, action)).toBe(true);
  });

  it("binds and before or", () => {
    expect(matches(`path == "x" and path == "y" or branch == "main"`, project)).toBe(true);
    expect(matches(`branch == "main" or path == "x" and path == "y"`, project)).toBe(true);
  });

  it("supports startswith and endswith on fields", () => {
    expect(matches(`action.startswith("Build")`, action)).toBe(true);
    expect(matches(`action.endswith("Target")`, action)).toBe(false);
  });

  it("treats missing fields as absent", () => {
    expect(matches(`destination == "generic/platform=iOS"`, action)).toBe(false);
    expect(matches(`destination != "generic/platform=iOS"`, action)).toBe(true);
    expect(matches(`destination in ["a"]`, action)).toBe(false);
    expect(matches(`destination.startswith("generic")`, action)).toBe(false);
  });

  it("only binds the entity's own string fields", () => {
    expect(matches(`constructor == "Object"`, project)).toBe(false);
    expect(matches(`platforms == "Darwin"`, { platforms: ["Darwin"] })).toBe(false);
  });

  it("reads Object.prototype names as fields, not literals", () => {
    expect(matches(`constructor == "x"`, { constructor: "x" })).toBe(true);
    expect(matches(`toString`, { path: "B" })).toBe(false);
    expect(included({ path: "B" }, compilePredicates(["toString"]), [])).toBe(false);
    expect(matches(`True and not false`, project)).toBe(true);
  });
});

describe("parsePredicate", () => {
  it("rejects anything outside the predicate grammar", () => {
    expect(() => parsePredicate(`path.toUpperCase("x")`)).toThrow(ConfigError);
    expect(() => parsePredicate(`__import__("os").system("true")`)).toThrow(ConfigError);
    expect(() => parsePredicate(`path = "x"`)).toThrow(ConfigError);
    expect(() => parsePredicate(`path == "x" path`)).toThrow(ConfigError);
  });

  it("reports the column of the problem", () => {
    expect(() => parsePredicate(`path == "open`)).toThrow(
      `Invalid predicate "path == \\"open" at column 9: unterminated string literal`,
    );
  });
});

describe("included", () => {
  it("includes everything when there are no predicates", () => {
    expect(included(project, [], [])).toBe(true);
  });

  it("lets exclusion win over inclusion", () => {
    const [inc] = compilePredicates([`path == "Alamofire"`]);
    const [exc] = compilePredicates([`branch == "main"`]);

    expect(included(project, [inc], [exc])).toBe(false);
  });

  it("requires any include to match when includes are present", () => {
    const includes = compilePredicates([`path == "Kingfisher"`, `path == "Alamofire"`]);

    expect(included(project, includes, [])).toBe(true);
    expect(included({ path: "Other" }, includes, [])).toBe(false);
  });
});

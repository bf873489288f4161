/*
Purpose: include/exclude predicates over index entities (projects, versions, actions).
Assumptions: predicates are short boolean expressions written on the command line, e.g.
  `path == "Alamofire"`, `action.startswith("Build") and not configuration in ["debug"]`.
  They are parsed once into an AST; evaluation only ever sees the entity's own string fields.
Usage: const inc = compilePredicates(["version == '5.0'"]); included(entity, inc, []);
*/

import { ConfigError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type PredicateEntity = Readonly<Record<string, unknown>>;

export type StringMethod = "startswith" | "endswith";

export type PredicateNode =
  | { type: "literal"; value: string | boolean }
  | { type: "list"; items: PredicateNode[] }
  | { type: "field"; name: string }
  | { type: "method"; field: string; method: StringMethod; argument: string }
  | { type: "compare"; op: "==" | "!=" | "in" | "not in"; left: PredicateNode; right: PredicateNode }
  | { type: "not"; operand: PredicateNode }
  | { type: "and" | "or"; left: PredicateNode; right: PredicateNode };

export type Predicate = {
  source: string;
  ast: PredicateNode;
};

type Token =
  | { type: "string"; value: string; pos: number }
  | { type: "ident"; value: string; pos: number }
  | { type: "op"; value: "==" | "!="; pos: number }
  | { type: "punct"; value: "(" | ")" | "[" | "]" | "," | "."; pos: number }
  | { type: "end"; pos: number };

/** Absent fields evaluate to `undefined`; they never equal or belong to anything. */
type Value = string | boolean | undefined | Value[];

const STRING_METHODS: readonly StringMethod[] = ["startswith", "endswith"];
const BOOLEAN_LITERALS = new Map<string, boolean>([
  ["true", true],
  ["True", true],
  ["false", false],
  ["False", false],
]);
const KEYWORDS = new Set(["and", "or", "not", "in"]);

// =============================================================================
// PUBLIC API
// =============================================================================

export function parsePredicate(source: string): Predicate {
  const parser = new PredicateParser(source, tokenize(source));
  return { source, ast: parser.parse() };
}

export function compilePredicates(sources: readonly string[]): Predicate[] {
  return sources.map(parsePredicate);
}

export function evaluatePredicate(predicate: Predicate, entity: PredicateEntity): boolean {
  return truthy(evaluate(predicate.ast, entity));
}

/**
 * Exclusion wins over inclusion; an empty include list includes everything that is
 * not excluded.
 */
export function included(
  entity: PredicateEntity,
  includes: readonly Predicate[],
  excludes: readonly Predicate[],
): boolean {
  if (excludes.some((predicate) => evaluatePredicate(predicate, entity))) {
    return false;
  }
  if (includes.length === 0) {
    return true;
  }
  return includes.some((predicate) => evaluatePredicate(predicate, entity));
}

// =============================================================================
// TOKENIZER
// =============================================================================

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i += 1;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const start = i;
      let value = "";
      i += 1;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === "\\" && i + 1 < source.length) {
          i += 1;
        }
        value += source[i];
        i += 1;
      }
      if (i >= source.length) {
        throw syntaxError(source, start, "unterminated string literal");
      }
      i += 1;
      tokens.push({ type: "string", value, pos: start });
      continue;
    }

    if ((ch === "=" || ch === "!") && source[i + 1] === "=") {
      tokens.push({ type: "op", value: ch === "=" ? "==" : "!=", pos: i });
      i += 2;
      continue;
    }

    if (ch === "(" || ch === ")" || ch === "[" || ch === "]" || ch === "," || ch === ".") {
      tokens.push({ type: "punct", value: ch, pos: i });
      i += 1;
      continue;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
    if (ident) {
      tokens.push({ type: "ident", value: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }

    throw syntaxError(source, i, `unexpected character ${JSON.stringify(ch)}`);
  }

  tokens.push({ type: "end", pos: source.length });
  return tokens;
}

// =============================================================================
// PARSER
// =============================================================================

class PredicateParser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): PredicateNode {
    const node = this.parseOr();
    const next = this.peek();
    if (next.type !== "end") {
      throw syntaxError(this.source, next.pos, "unexpected trailing input");
    }
    return node;
  }

  private parseOr(): PredicateNode {
    let left = this.parseAnd();
    while (this.matchKeyword("or")) {
      left = { type: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): PredicateNode {
    let left = this.parseNot();
    while (this.matchKeyword("and")) {
      left = { type: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): PredicateNode {
    if (this.matchKeyword("not")) {
      return { type: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): PredicateNode {
    const left = this.parseOperand();
    const next = this.peek();

    if (next.type === "op") {
      this.index += 1;
      return { type: "compare", op: next.value, left, right: this.parseOperand() };
    }
    if (this.matchKeyword("in")) {
      return { type: "compare", op: "in", left, right: this.parseOperand() };
    }
    if (this.isKeyword(this.peek(), "not") && this.isKeyword(this.peek(1), "in")) {
      this.index += 2;
      return { type: "compare", op: "not in", left, right: this.parseOperand() };
    }
    return left;
  }

  private parseOperand(): PredicateNode {
    const token = this.advance();

    if (token.type === "string") {
      return { type: "literal", value: token.value };
    }

    if (token.type === "punct" && token.value === "[") {
      return { type: "list", items: this.parseItems("]") };
    }

    if (token.type === "punct" && token.value === "(") {
      const inner = this.parseOr();
      if (this.matchPunct(",")) {
        // Parenthesised tuple: ("a", "b")
        return { type: "list", items: [inner, ...this.parseItems(")")] };
      }
      this.expectPunct(")");
      return inner;
    }

    if (token.type === "ident" && !KEYWORDS.has(token.value)) {
      const boolean = BOOLEAN_LITERALS.get(token.value);
      if (boolean !== undefined) {
        return { type: "literal", value: boolean };
      }
      if (this.matchPunct(".")) {
        return this.parseMethod(token.value);
      }
      return { type: "field", name: token.value };
    }

    throw syntaxError(this.source, token.pos, "expected a string, list, field or '('");
  }

  private parseMethod(field: string): PredicateNode {
    const methodToken = this.advance();
    const method = STRING_METHODS.find(
      (candidate) => methodToken.type === "ident" && methodToken.value === candidate,
    );
    if (!method) {
      throw syntaxError(
        this.source,
        methodToken.pos,
        `only ${STRING_METHODS.join(", ")} may be called on a field`,
      );
    }

    this.expectPunct("(");
    const argument = this.advance();
    if (argument.type !== "string") {
      throw syntaxError(this.source, argument.pos, `${method} expects a string literal`);
    }
    this.expectPunct(")");

    return { type: "method", field, method, argument: argument.value };
  }

  // Items after the opening bracket, up to and including the closing one.
  private parseItems(close: "]" | ")"): PredicateNode[] {
    const items: PredicateNode[] = [];
    while (!this.matchPunct(close)) {
      items.push(this.parseOperand());
      if (!this.matchPunct(",")) {
        this.expectPunct(close);
        break;
      }
    }
    return items;
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "end") this.index += 1;
    return token;
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.type === "ident" && token.value === keyword;
  }

  private matchKeyword(keyword: string): boolean {
    if (!this.isKeyword(this.peek(), keyword)) return false;
    this.index += 1;
    return true;
  }

  private matchPunct(value: string): boolean {
    const token = this.peek();
    if (token.type !== "punct" || token.value !== value) return false;
    this.index += 1;
    return true;
  }

  private expectPunct(value: string): void {
    if (!this.matchPunct(value)) {
      throw syntaxError(this.source, this.peek().pos, `expected '${value}'`);
    }
  }
}

// =============================================================================
// EVALUATION
// =============================================================================

function evaluate(node: PredicateNode, entity: PredicateEntity): Value {
  switch (node.type) {
    case "literal":
      return node.value;
    case "list":
      return node.items.map((item) => evaluate(item, entity));
    case "field":
      return lookupField(entity, node.name);
    case "method": {
      const value = lookupField(entity, node.field);
      if (value === undefined) return false;
      return node.method === "startswith"
        ? value.startsWith(node.argument)
        : value.endsWith(node.argument);
    }
    case "compare":
      return compare(node.op, evaluate(node.left, entity), evaluate(node.right, entity));
    case "not":
      return !truthy(evaluate(node.operand, entity));
    case "and":
      return truthy(evaluate(node.left, entity)) && truthy(evaluate(node.right, entity));
    case "or":
      return truthy(evaluate(node.left, entity)) || truthy(evaluate(node.right, entity));
  }
}

function compare(op: "==" | "!=" | "in" | "not in", left: Value, right: Value): boolean {
  switch (op) {
    case "==":
      return valuesEqual(left, right);
    case "!=":
      return !valuesEqual(left, right);
    case "in":
      return contains(right, left);
    case "not in":
      return !contains(right, left);
  }
}

function valuesEqual(left: Value, right: Value): boolean {
  if (left === undefined || right === undefined) return false;
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right)) return false;
    return left.length === right.length && left.every((item, i) => valuesEqual(item, right[i]));
  }
  return left === right;
}

function contains(container: Value, needle: Value): boolean {
  if (needle === undefined) return false;
  if (Array.isArray(container)) {
    return container.some((item) => valuesEqual(item, needle));
  }
  if (typeof container === "string" && typeof needle === "string") {
    return container.includes(needle);
  }
  return false;
}

function truthy(value: Value): boolean {
  if (value === undefined) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "string") return value.length > 0;
  return value;
}

function lookupField(entity: PredicateEntity, name: string): string | undefined {
  if (!Object.prototype.hasOwnProperty.call(entity, name)) return undefined;
  const value = entity[name];
  return typeof value === "string" ? value : undefined;
}

function syntaxError(source: string, pos: number, detail: string): ConfigError {
  return new ConfigError(`Invalid predicate ${JSON.stringify(source)} at column ${pos + 1}: ${detail}`);
}

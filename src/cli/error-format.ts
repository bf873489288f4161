/*
Purpose: render a fatal error for the terminal, `error:` first and details indented below.
Assumptions: stderr is the default stream; color only on a TTY.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type DetailKind = Exclude<ErrorFormatLineKind, "title" | "message">;

const DETAIL_LABELS: Record<DetailKind, { label: string; styles: AnsiStyle[] }> = {
  hint: { label: "hint:", styles: ["yellow"] },
  name: { label: "name:", styles: ["dim"] },
  cause: { label: "cause:", styles: ["dim"] },
  stack: { label: "stack:", styles: ["dim"] },
};

const INDENT = "  ";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "message") {
    return indent(line.text, INDENT);
  }

  const { label, styles } = DETAIL_LABELS[line.kind];
  if (line.kind === "stack") {
    return `${INDENT}${format(label, styles)}\n${format(indent(line.text, INDENT.repeat(2)), styles)}`;
  }
  const text = line.kind === "hint" ? line.text : format(line.text, styles);
  return `${INDENT}${format(label, styles)} ${text}`;
}

function indent(value: string, prefix: string): string {
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}

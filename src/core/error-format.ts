/*
Purpose: turn unknown thrown values into structured lines for CLI output and logs.
Assumptions: errors may be anything; MatrixError subclasses carry an optional cause.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import { CommandFailure, ConfigError, MatrixError, RunAbortedError, WorkerCrashError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [{ kind: "title", text: resolveTitle(error) }];

  const message = formatErrorMessage(error);
  if (message.length > 0) {
    lines.push({ kind: "message", text: message });
  }

  const hint = resolveHint(error);
  if (hint) {
    lines.push({ kind: "hint", text: hint });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }
  if (error instanceof MatrixError && error.cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
  }
  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream?.isTTY) return false;
  if (options.useColor !== undefined) return options.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveTitle(error: unknown): string {
  if (error instanceof ConfigError) return "Invalid configuration";
  if (error instanceof CommandFailure) return error.timedOut ? "Command timed out" : "Command failed";
  if (error instanceof RunAbortedError) return "Run stopped";
  if (error instanceof WorkerCrashError) return `Worker crashed on ${error.subject}`;
  if (error instanceof MatrixError) return "Run failed";
  return "Unexpected error";
}

function resolveHint(error: unknown): string | undefined {
  if (error instanceof ConfigError) {
    return "Fix the project index or CLI options and re-run; no builds were classified.";
  }
  if (error instanceof RunAbortedError) {
    return "Logs of actions that finished are kept in the log directory.";
  }
  return undefined;
}

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import type { ResultKind } from "./result.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Which leaf of the matrix an event is about; every level below the run is optional. */
export type EventScope = {
  project?: string;
  action?: string;
  version?: string;
};

export type LogEvent = JsonObject &
  EventScope & {
    ts: string;
    type: string;
    run_id: string;
    payload?: JsonObject;
  };

export type LogEventInput = JsonObject &
  EventScope & {
    type: string;
    runId?: string;
    payload?: JsonObject;
    ts?: string | Date;
  };

type EventDefaults = EventScope & {
  runId?: string;
};

const SCOPE_FIELDS = ["project", "action", "version"] as const;

type LogFailureAction = "write" | "close";

export type MatrixEventType =
  | "matrix.start"
  | "matrix.complete"
  | "project.start"
  | "project.complete"
  | "action.result"
  | "worker.crash"
  | "incremental.state"
  | "determinism.mismatch";

/** Anything that run events can be sent to; the JSONL logger in production, arrays in tests. */
export type EventSink = {
  log(event: LogEventInput): void;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventSink {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, project, action, version, payload, ts, type, ...rest } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const scope: EventScope = { project, action, version };

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
    run_id: runId,
  };

  for (const field of SCOPE_FIELDS) {
    const value = scope[field] ?? defaults[field];
    if (value) {
      result[field] = value;
    }
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function runEventLogPath(logDir: string, runId: string): string {
  return path.join(logDir, `buildmatrix-${runId}.jsonl`);
}

/** One append-only event file per run, beside the leaf logs. */
export function openRunEventLog(logDir: string, runId: string): JsonlLogger {
  return new JsonlLogger(runEventLogPath(logDir, runId), { runId });
}

export function logMatrixEvent(
  sink: EventSink,
  type: MatrixEventType,
  fields: JsonObject & EventScope & { ts?: string | Date } = {},
): void {
  const { project, action, version, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (project !== undefined) event.project = project;
  if (action !== undefined) event.action = action;
  if (version !== undefined) event.version = version;
  if (ts !== undefined) event.ts = ts;

  sink.log(event);
}

export type ActionResultEvent = {
  project: string;
  action: string;
  /** Absent for incremental leaves, which span a commit sequence. */
  version?: string;
  kind: ResultKind;
  message: string;
};

export function logActionResult(sink: EventSink, leaf: ActionResultEvent): void {
  const { version, ...fields } = leaf;
  logMatrixEvent(sink, "action.result", version === undefined ? fields : { ...fields, version });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}

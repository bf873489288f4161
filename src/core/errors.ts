export class MatrixError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "MatrixError";
  }
}

// Fatal for the whole run: bad index data, unknown action kinds, malformed predicates.
export class ConfigError extends MatrixError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class CommandFailure extends MatrixError {
  constructor(
    public readonly command: readonly string[],
    public readonly exitStatus: number,
    public readonly timedOut = false,
  ) {
    super(
      timedOut
        ? `Command timed out (exit ${exitStatus}): ${command.join(" ")}`
        : `Command exited with ${exitStatus}: ${command.join(" ")}`,
    );
    this.name = "CommandFailure";
  }
}

export class WorkerCrashError extends MatrixError {
  constructor(
    public readonly subject: string,
    cause: unknown,
  ) {
    super(`worker crashed: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
    this.name = "WorkerCrashError";
  }
}

export class RunAbortedError extends MatrixError {
  constructor(message = "Run aborted", cause?: unknown) {
    super(message, cause);
    this.name = "RunAbortedError";
  }
}

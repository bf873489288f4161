export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

const STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Aborts the run on the first SIGINT/SIGTERM; running commands are killed through the
 * signal. A second signal falls back to Node's default handling.
 */
export function createRunStopSignalHandler(opts: {
  onSignal?: (signal: NodeJS.Signals) => void;
} = {}): RunStopSignalHandler {
  const controller = new AbortController();

  const handler = (signal: NodeJS.Signals): void => {
    cleanup();
    opts.onSignal?.(signal);
    controller.abort();
  };

  const cleanup = (): void => {
    for (const name of STOP_SIGNALS) {
      process.off(name, handler);
    }
  };

  for (const name of STOP_SIGNALS) {
    process.once(name, handler);
  }

  return { signal: controller.signal, cleanup };
}

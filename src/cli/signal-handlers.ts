export type RunStopSignalHandler = {
  // Aborted on the first SIGINT/SIGTERM: no new units start.
  signal: AbortSignal;
  // Aborted on the second: in-flight engine commands are interrupted.
  forceSignal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

export function createRunStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals, forced: boolean) => void } = {},
): RunStopSignalHandler {
  const controller = new AbortController();
  const forceController = new AbortController();
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  };

  const handleSignal = (signal: NodeJS.Signals): void => {
    const forced = controller.signal.aborted;
    try {
      opts.onSignal?.(signal, forced);
    } finally {
      if (!forced) {
        controller.abort(signal);
      } else {
        forceController.abort(signal);
        cleanup();
      }
    }
  };

  const onSigint = (): void => handleSignal("SIGINT");
  const onSigterm = (): void => handleSignal("SIGTERM");

  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  return {
    signal: controller.signal,
    forceSignal: forceController.signal,
    cleanup,
    isStopped: () => controller.signal.aborted,
  };
}

// src/signals.ts
// SIGINT/SIGTERM handling for a scan run: the first signal aborts the run's
// AbortSignal and invokes onSignal (the checkpoint flush); listeners are then removed.

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  stoppedBy: () => NodeJS.Signals | null;
};

export function createStopSignalHandler(
  opts: { onSignal?: (signal: NodeJS.Signals) => void } = {}
): StopSignalHandler {
  const controller = new AbortController();
  let received: NodeJS.Signals | null = null;
  let cleaned = false;

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  };

  const handleSignal = (signal: NodeJS.Signals): void => {
    received = signal;
    try {
      opts.onSignal?.(signal);
    } finally {
      if (!controller.signal.aborted) {
        controller.abort(signal);
      }
      cleanup();
    }
  };

  const onSigint = (): void => handleSignal('SIGINT');
  const onSigterm = (): void => handleSignal('SIGTERM');

  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  return {
    signal: controller.signal,
    cleanup,
    stoppedBy: () => received,
  };
}

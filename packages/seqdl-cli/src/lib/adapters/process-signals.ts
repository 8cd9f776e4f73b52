import type { SignalHandler } from "../ports/signal-handler.js";

/** Conventional exit status for a process stopped by SIGINT */
const INTERRUPTED_EXIT_CODE = 130;

/**
 * Create a signal handler for SIGINT/SIGTERM.
 * The first signal runs the registered callbacks so the run can wind down;
 * a second one exits immediately.
 */
export function createProcessSignalHandler(
  exit: (code: number) => void = (code) => process.exit(code)
): SignalHandler {
  const handlers: Array<() => void> = [];
  let interrupted = false;

  const handleSignal = () => {
    if (interrupted) {
      exit(INTERRUPTED_EXIT_CODE);
      return;
    }
    interrupted = true;
    for (const handler of handlers) handler();
  };

  return {
    onInterrupt(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}

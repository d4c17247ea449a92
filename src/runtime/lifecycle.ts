import type { ClockPort } from "../ports/sys/ClockPort";

export interface LifecycleHandlers {
  suspended(): void;
  resumed(now: number): void;
}

export interface SignalHost {
  readonly pid: number;
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
  kill(pid: number, signal: NodeJS.Signals): unknown;
}

/**
 * Ctrl+Z / `fg` become suspended/resumed events. Handling SIGTSTP replaces the
 * default stop, so the handler stops the process itself with SIGSTOP.
 */
export function watchProcessLifecycle(
  handlers: LifecycleHandlers,
  clock: ClockPort,
  host: SignalHost = process
): () => void {
  const onStop = () => {
    handlers.suspended();
    host.kill(host.pid, "SIGSTOP");
  };
  const onContinue = () => {
    handlers.resumed(clock.now());
  };

  host.on("SIGTSTP", onStop);
  host.on("SIGCONT", onContinue);

  return () => {
    host.off("SIGTSTP", onStop);
    host.off("SIGCONT", onContinue);
  };
}

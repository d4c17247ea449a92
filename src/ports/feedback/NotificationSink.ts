import type { PhaseNotification } from "../../domain/timers/Timer";

export interface NotificationSink {
  /** Prepares output for a running session. Best effort; callers log rejections. */
  activate(): Promise<void>;
  notify(kind: PhaseNotification): void;
}

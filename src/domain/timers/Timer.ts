export type Phase = "WORK" | "REST";

export type PhaseNotification = "phase-end-work" | "round-complete";

export interface TimerSettings {
  workDuration: number;
  restDuration: number;
}

export interface TimerSnapshot {
  phase: Phase;
  remaining: number;
  round: number;
  running: boolean;
  progressFraction: number;
  workDuration: number;
  restDuration: number;
  display: string;
}

export const DEFAULT_TIMER_SETTINGS: TimerSettings = {
  workDuration: 180,
  restDuration: 60,
};

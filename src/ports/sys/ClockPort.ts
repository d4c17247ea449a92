export interface TickHandle {
  /** Stops the schedule. No tick is delivered once this returns. */
  cancel(): void;
}

export interface ClockPort {
  now(): number;
  every(intervalMs: number, onTick: () => void): TickHandle;
}
